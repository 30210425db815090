import { CatalogError, InvalidState } from '../../src/shared/engine/errors';
import { createReactionContext } from '../../src/shared/engine/reactionContext';
import {
  ACCELERATOR_RULE,
  DARK_ACCELERATOR_RULE,
  REACTION_RULES,
} from '../../src/shared/engine/reactionRules';
import { ACCELERATOR, DARK_ACCELERATOR } from '../../src/shared/types/token';
import { catalog, el, tokenOf, type RingItem } from '../utils/fixtures';

function contextOf(...items: [RingItem, RingItem, RingItem]) {
  return createReactionContext(items.map(tokenOf), 1);
}

describe('reaction rules', () => {
  it('exposes exactly the two rules, dark accelerator first', () => {
    expect(REACTION_RULES.map((rule) => rule.name)).toEqual(['dark_accelerator', 'accelerator']);
  });

  describe('DARK_ACCELERATOR_RULE', () => {
    it('applies only around a dark accelerator', () => {
      expect(DARK_ACCELERATOR_RULE.isApplicable(contextOf(1, '(+)', 5))).toBe(true);
      expect(DARK_ACCELERATOR_RULE.isApplicable(contextOf('+', '(+)', '+'))).toBe(true);
      expect(DARK_ACCELERATOR_RULE.isApplicable(contextOf(1, '+', 1))).toBe(false);
      expect(DARK_ACCELERATOR_RULE.isApplicable(contextOf(1, 2, 1))).toBe(false);
    });

    it('gives entry 4 for two accelerator neighbours', () => {
      expect(DARK_ACCELERATOR_RULE.react(ACCELERATOR, DARK_ACCELERATOR, ACCELERATOR, catalog)).toBe(
        el(4)
      );
    });

    it('adds 3 to the numbered neighbour when the other is an accelerator', () => {
      expect(DARK_ACCELERATOR_RULE.react(ACCELERATOR, DARK_ACCELERATOR, el(10), catalog)).toBe(el(13));
      expect(DARK_ACCELERATOR_RULE.react(el(10), DARK_ACCELERATOR, ACCELERATOR, catalog)).toBe(el(13));
    });

    it('adds 3 to the larger of two numbered neighbours', () => {
      expect(DARK_ACCELERATOR_RULE.react(el(2), DARK_ACCELERATOR, el(9), catalog)).toBe(el(12));
      expect(DARK_ACCELERATOR_RULE.react(el(9), DARK_ACCELERATOR, el(2), catalog)).toBe(el(12));
    });

    it('rejects a dark accelerator neighbour', () => {
      expect(() =>
        DARK_ACCELERATOR_RULE.react(DARK_ACCELERATOR, DARK_ACCELERATOR, el(1), catalog)
      ).toThrow(InvalidState);
      expect(() =>
        DARK_ACCELERATOR_RULE.react(el(1), DARK_ACCELERATOR, DARK_ACCELERATOR, catalog)
      ).toThrow('The dark_accelerator rule does not apply to H[1] (+) (+)');
    });

    it('surfaces catalog overflow', () => {
      expect(() => DARK_ACCELERATOR_RULE.react(el(116), DARK_ACCELERATOR, el(1), catalog)).toThrow(
        CatalogError
      );
    });
  });

  describe('ACCELERATOR_RULE', () => {
    it('applies around equal numbered neighbours', () => {
      expect(ACCELERATOR_RULE.isApplicable(contextOf(3, '+', 3))).toBe(true);
      expect(ACCELERATOR_RULE.isApplicable(contextOf(3, 7, 3))).toBe(true);
    });

    it('does not apply to unequal or special neighbours', () => {
      expect(ACCELERATOR_RULE.isApplicable(contextOf(3, '+', 4))).toBe(false);
      expect(ACCELERATOR_RULE.isApplicable(contextOf('+', '+', '+'))).toBe(false);
      expect(ACCELERATOR_RULE.isApplicable(contextOf('(+)', '+', '(+)'))).toBe(false);
      expect(ACCELERATOR_RULE.isApplicable(contextOf('+', 3, 3))).toBe(false);
    });

    it('does not apply around a dark accelerator', () => {
      expect(ACCELERATOR_RULE.isApplicable(contextOf(3, '(+)', 3))).toBe(false);
    });

    it('gives neighbour + 1 around an accelerator', () => {
      expect(ACCELERATOR_RULE.react(el(6), ACCELERATOR, el(6), catalog)).toBe(el(7));
    });

    it('gives center + 1 when the neighbours are smaller than the center', () => {
      expect(ACCELERATOR_RULE.react(el(2), el(9), el(2), catalog)).toBe(el(10));
    });

    it('gives neighbour + 2 when the neighbours are not smaller', () => {
      expect(ACCELERATOR_RULE.react(el(9), el(2), el(9), catalog)).toBe(el(11));
      expect(ACCELERATOR_RULE.react(el(5), el(5), el(5), catalog)).toBe(el(7));
    });

    it('rejects neighbours it could not have accepted', () => {
      expect(() => ACCELERATOR_RULE.react(el(1), ACCELERATOR, el(2), catalog)).toThrow(
        'The accelerator rule does not apply to H[1] + He[2]'
      );
      expect(() => ACCELERATOR_RULE.react(ACCELERATOR, ACCELERATOR, ACCELERATOR, catalog)).toThrow(
        InvalidState
      );
      expect(() => ACCELERATOR_RULE.react(el(1), DARK_ACCELERATOR, el(1), catalog)).toThrow(
        InvalidState
      );
    });

    it('surfaces catalog overflow', () => {
      expect(() => ACCELERATOR_RULE.react(el(118), ACCELERATOR, el(118), catalog)).toThrow(
        'No catalog entry numbered 119 (catalog holds 1..118)'
      );
    });
  });
});
