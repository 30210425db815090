import type { TokenCatalog } from '../catalog/ElementCatalog';
import {
  isAccelerator,
  isDarkAccelerator,
  isNumbered,
  sameToken,
  describeToken,
  type NumberedToken,
  type Token,
} from '../types/token';
import { EngineErrorCode, InvalidState } from './errors';
import type { ReactionContext } from './reactionContext';
import {
  ACCELERATOR_FUSION_BONUS,
  CENTER_FUSION_BONUS,
  DARK_BOTH_ACCELERATORS_RESULT,
  DARK_FUSION_BONUS,
  FLANK_FUSION_BONUS,
} from './rulesConfig';

export type ReactionRuleName = 'dark_accelerator' | 'accelerator';

/**
 * A fusion strategy. The rule set is closed: {@link DARK_ACCELERATOR_RULE}
 * starts a reaction around a dark accelerator, {@link ACCELERATOR_RULE}
 * starts one around an accelerator and drives every continuation.
 *
 * Both rules assume the ring holds at least three tokens; the collapse loop
 * checks that before asking.
 */
export interface ReactionRule {
  readonly name: ReactionRuleName;
  isApplicable(context: ReactionContext): boolean;
  /**
   * Token produced by fusing the three entries. Only valid where
   * `isApplicable` holds.
   *
   * @throws InvalidState if the tokens could not have passed `isApplicable`
   * @throws CatalogError if the resulting number is past the catalog
   */
  react(
    counterclockwise: Token,
    center: Token,
    clockwise: Token,
    catalog: TokenCatalog
  ): NumberedToken;
}

function notApplicable(
  rule: ReactionRuleName,
  counterclockwise: Token,
  center: Token,
  clockwise: Token
): InvalidState {
  const tokens = [counterclockwise, center, clockwise].map(describeToken).join(' ');
  return new InvalidState(
    EngineErrorCode.STATE_RULE_NOT_APPLICABLE,
    `The ${rule} rule does not apply to ${tokens}`,
    { rule, tokens },
    'ReactionRules'
  );
}

/**
 * Fuses any two neighbours of a dark accelerator.
 *
 * An accelerator neighbour contributes no number of its own. The result for
 * a single accelerator neighbour is not documented by the game and is kept
 * as "other neighbour + 3".
 */
export const DARK_ACCELERATOR_RULE: ReactionRule = Object.freeze({
  name: 'dark_accelerator' as const,

  isApplicable(context: ReactionContext): boolean {
    return isDarkAccelerator(context.centerToken);
  },

  react(
    counterclockwise: Token,
    center: Token,
    clockwise: Token,
    catalog: TokenCatalog
  ): NumberedToken {
    if (isAccelerator(counterclockwise) && isAccelerator(clockwise)) {
      return catalog.lookup(DARK_BOTH_ACCELERATORS_RESULT);
    }
    if (isAccelerator(counterclockwise) && isNumbered(clockwise)) {
      return catalog.lookup(clockwise.number + DARK_FUSION_BONUS);
    }
    if (isNumbered(counterclockwise) && isAccelerator(clockwise)) {
      return catalog.lookup(counterclockwise.number + DARK_FUSION_BONUS);
    }
    if (isNumbered(counterclockwise) && isNumbered(clockwise)) {
      return catalog.lookup(Math.max(counterclockwise.number, clockwise.number) + DARK_FUSION_BONUS);
    }
    // A second dark accelerator as neighbour.
    throw notApplicable('dark_accelerator', counterclockwise, center, clockwise);
  },
});

/**
 * Fuses equal numbered neighbours around an accelerator or, while a
 * reaction continues, around any numbered token.
 *
 * With a numbered center the outcome is asymmetric: a flanking pair smaller
 * than the center gives center + 1, anything else gives flank + 2.
 */
export const ACCELERATOR_RULE: ReactionRule = Object.freeze({
  name: 'accelerator' as const,

  isApplicable(context: ReactionContext): boolean {
    const { counterclockwiseToken, centerToken, clockwiseToken } = context;
    return (
      isNumbered(counterclockwiseToken) &&
      isNumbered(clockwiseToken) &&
      !isDarkAccelerator(centerToken) &&
      sameToken(counterclockwiseToken, clockwiseToken)
    );
  },

  react(
    counterclockwise: Token,
    center: Token,
    clockwise: Token,
    catalog: TokenCatalog
  ): NumberedToken {
    if (
      !isNumbered(counterclockwise) ||
      !isNumbered(clockwise) ||
      !sameToken(counterclockwise, clockwise)
    ) {
      throw notApplicable('accelerator', counterclockwise, center, clockwise);
    }

    const adjacent = counterclockwise.number;

    if (isAccelerator(center)) {
      return catalog.lookup(adjacent + ACCELERATOR_FUSION_BONUS);
    }
    if (isNumbered(center)) {
      return adjacent < center.number
        ? catalog.lookup(center.number + CENTER_FUSION_BONUS)
        : catalog.lookup(adjacent + FLANK_FUSION_BONUS);
    }
    throw notApplicable('accelerator', counterclockwise, center, clockwise);
  },
});

export const REACTION_RULES: readonly ReactionRule[] = [DARK_ACCELERATOR_RULE, ACCELERATOR_RULE];
