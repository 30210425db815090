/**
 * Numeric constants of the fusion rules.
 *
 * These are game-balance values rather than tuning knobs; changing any of
 * them changes which boards are reachable.
 */

/**
 * A board holds 1 to 18 tokens. Inserting a 19th token that does not react
 * ends the game; deciding that is the game loop's job, not the ring's.
 */
export const MAX_RING_SIZE = 18;

/** Dark-accelerator fusion of two accelerators yields this catalog entry. */
export const DARK_BOTH_ACCELERATORS_RESULT = 4;

/** Added to the (larger) numbered neighbour in a dark-accelerator fusion. */
export const DARK_FUSION_BONUS = 3;

/** Added to the neighbour number when an accelerator is the center. */
export const ACCELERATOR_FUSION_BONUS = 1;

/** Added to the center number when the flanking pair is smaller than it. */
export const CENTER_FUSION_BONUS = 1;

/** Added to the flanking number when it is at least the center number. */
export const FLANK_FUSION_BONUS = 2;

export function isRingOverflowing(count: number): boolean {
  return count > MAX_RING_SIZE;
}
