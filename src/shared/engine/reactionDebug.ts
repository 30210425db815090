/**
 * Minimal sink for reaction tracing. A winston logger satisfies it, so the
 * server side can hand its logger straight in; the shared engine never
 * imports a logging library itself.
 */
export interface ReactionDebugLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Global debug logger - set this to trace collapse loops and chains */
export let REACTION_DEBUG_LOGGER: ReactionDebugLogger | null = null;

/**
 * Set the reaction debug logger.
 * @param logger Logger implementation or null to disable
 */
export function setReactionDebugLogger(logger: ReactionDebugLogger | null): void {
  REACTION_DEBUG_LOGGER = logger;
}
