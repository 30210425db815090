import type { Token } from '../types/token';
import { indexOutOfRange } from './errors';

/**
 * A center index and its two ring-adjacent neighbours, captured from the
 * ring at construction time.
 *
 * Contexts are snapshots: any structural change to the ring invalidates
 * them, and a fresh one must be built from the new contents.
 */
export interface ReactionContext {
  readonly counterclockwiseIndex: number;
  readonly counterclockwiseToken: Token;
  readonly centerIndex: number;
  readonly centerToken: Token;
  readonly clockwiseIndex: number;
  readonly clockwiseToken: Token;
}

export function createReactionContext(
  tokens: readonly Token[],
  centerIndex: number
): ReactionContext {
  const count = tokens.length;
  if (!Number.isInteger(centerIndex) || centerIndex < 0 || centerIndex >= count) {
    throw indexOutOfRange('Reaction context center', centerIndex, count - 1, 'ReactionContext');
  }

  const counterclockwiseIndex = (centerIndex - 1 + count) % count;
  const clockwiseIndex = (centerIndex + 1) % count;

  return Object.freeze({
    counterclockwiseIndex,
    counterclockwiseToken: tokens[counterclockwiseIndex],
    centerIndex,
    centerToken: tokens[centerIndex],
    clockwiseIndex,
    clockwiseToken: tokens[clockwiseIndex],
  });
}

/**
 * True when both neighbours are the same slot, i.e. the ring holds one or
 * two tokens and no fusion can take place.
 */
export function isDegenerate(context: ReactionContext): boolean {
  return context.counterclockwiseIndex === context.clockwiseIndex;
}
