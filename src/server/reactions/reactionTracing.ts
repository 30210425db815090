import type { Ring } from '../../shared/engine/Ring';
import type { RingListener } from '../../shared/engine/ringListener';
import {
  setReactionDebugLogger,
  type ReactionDebugLogger,
} from '../../shared/engine/reactionDebug';
import { describeToken } from '../../shared/types/token';
import { config } from '../config';
import { logger as defaultLogger } from '../utils/logger';

/**
 * Listener that logs every ring event at debug level.
 */
export function createReactionTraceListener(logger: ReactionDebugLogger = defaultLogger): RingListener {
  return {
    onInsert(index, token) {
      logger.debug('Token inserted', { index, token: describeToken(token) });
    },
    onReaction(counterclockwiseIndex, centerIndex, clockwiseIndex, result, resultIndex) {
      logger.debug('Tokens fused', {
        counterclockwiseIndex,
        centerIndex,
        clockwiseIndex,
        result: describeToken(result),
        resultIndex,
      });
    },
    onRemove(index) {
      logger.debug('Token removed', { index });
    },
  };
}

/** Undoes {@link attachReactionTracing}. */
export type DetachReactionTracing = () => void;

/**
 * Attach reaction tracing to `ring` when enabled by config
 * (FUSION_RING_TRACE_REACTIONS) or by `force`.
 *
 * The engine's collapse and chain diagnostics go through a single
 * process-wide debug logger, so while tracing is attached every ring in the
 * process reports its fusions to `logger`, not only `ring`.
 *
 * @returns a function that removes the listener and clears the engine debug
 *   logger, or null when tracing is off
 */
export function attachReactionTracing(
  ring: Ring,
  { logger = defaultLogger, force = false }: { logger?: ReactionDebugLogger; force?: boolean } = {}
): DetachReactionTracing | null {
  if (!force && !config.reactions.trace) {
    return null;
  }

  const listener = createReactionTraceListener(logger);
  ring.addListener(listener);
  setReactionDebugLogger(logger);

  return () => {
    ring.removeListener(listener);
    setReactionDebugLogger(null);
  };
}
