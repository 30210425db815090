import type { TokenCatalog } from '../catalog/ElementCatalog';
import {
  describeToken,
  isAccelerator,
  isDarkAccelerator,
  sameToken,
  tokenKey,
  type NumberedToken,
  type Token,
} from '../types/token';
import {
  EngineErrorCode,
  indexOutOfRange,
  InvalidArgument,
  InvalidState,
} from './errors';
import { formatRing } from './notation';
import { createReactionContext, isDegenerate, type ReactionContext } from './reactionContext';
import { REACTION_DEBUG_LOGGER } from './reactionDebug';
import { ACCELERATOR_RULE, DARK_ACCELERATOR_RULE, type ReactionRule } from './reactionRules';
import type { RingListener } from './ringListener';
import { toRingSnapshot, tokensFromSnapshot, type RingSnapshot } from './ringSnapshot';
import { isRingOverflowing } from './rulesConfig';

interface CollapseOutcome {
  /** Context around the last result, or the starting context if nothing fused. */
  context: ReactionContext;
  fusions: number;
}

/**
 * The board: a circular sequence of tokens, mutated in place by inserts and
 * removes and by the reactions those trigger.
 *
 * Index `i + 1 (mod count)` is clockwise from `i`. The ring never becomes
 * empty. It does not decide what gets inserted or removed; duplicating or
 * deleting a token is expressed by the caller as a plain insert or remove.
 *
 * At most one dark accelerator is expected on the ring, and only while it
 * holds one or two tokens (a dark accelerator on a larger ring would already
 * have reacted). The ring relies on that when it ignores dark accelerators
 * after a remove, but does not enforce it.
 *
 * Not safe for concurrent use; every operation, including arbitrarily long
 * cascades, completes before it returns.
 */
export class Ring {
  private readonly contents: Token[];
  private readonly listeners: RingListener[] = [];
  private readonly catalog: TokenCatalog;
  private isRehearsal = false;

  /**
   * @throws InvalidArgument if `initialContents` is empty or contains
   *   null/undefined, or if `catalog` is missing
   */
  constructor(initialContents: readonly Token[], catalog: TokenCatalog) {
    const candidate: unknown = initialContents;
    if (!Array.isArray(candidate)) {
      throw new InvalidArgument(
        EngineErrorCode.ARGUMENT_INVALID_CONTENTS,
        'Ring requires an array of initial tokens'
      );
    }
    if (initialContents.length === 0) {
      throw new InvalidArgument(
        EngineErrorCode.ARGUMENT_INVALID_CONTENTS,
        'Ring requires at least one token'
      );
    }
    const nullIndex = initialContents.findIndex((token) => token == null);
    if (nullIndex >= 0) {
      throw new InvalidArgument(
        EngineErrorCode.ARGUMENT_INVALID_CONTENTS,
        `Initial contents contain null at index ${nullIndex}`,
        { index: nullIndex }
      );
    }
    if (catalog == null) {
      throw new InvalidArgument(EngineErrorCode.ARGUMENT_MISSING_CATALOG, 'Ring requires a catalog');
    }

    this.contents = [...initialContents];
    this.catalog = catalog;
  }

  /**
   * Rebuild a ring from {@link Ring.toJSON} output. No reactions run.
   *
   * @throws InvalidArgument if the snapshot is malformed
   */
  static fromSnapshot(snapshot: unknown, catalog: TokenCatalog): Ring {
    return new Ring(tokensFromSnapshot(snapshot, catalog), catalog);
  }

  /** Number of tokens; always at least 1. */
  count(): number {
    return this.contents.length;
  }

  at(index: number): Token {
    this.assertIndex('Read', index, this.count() - 1);
    return this.contents[index];
  }

  /** Copy of the current sequence in index order. */
  tokens(): Token[] {
    return [...this.contents];
  }

  /** More tokens than a board may hold; the game is over unless this resolves. */
  isOverflowing(): boolean {
    return isRingOverflowing(this.count());
  }

  addListener(listener: RingListener): void {
    this.assertListener(listener);
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener);
    }
  }

  removeListener(listener: RingListener): void {
    this.assertListener(listener);
    const index = this.listeners.indexOf(listener);
    if (index >= 0) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Insert `token` before position `index`, then run whatever reactions it
   * triggers. Inserting at `count()` places the token between the last
   * entry and entry 0.
   *
   * A dark accelerator is handled first: the inserted one, else one
   * counterclockwise of the insert, else one clockwise of it. Otherwise an
   * inserted accelerator reacts in place. Chain propagation follows in every
   * case.
   *
   * @throws InvalidArgument if `token` is null/undefined
   * @throws IndexOutOfRange if `index` is not in [0, count()]
   * @throws CatalogError if the cascade produces a number past the catalog;
   *   the ring is left as it was and no listener is called
   */
  insert(token: Token, index: number): void {
    if (token == null) {
      throw new InvalidArgument(EngineErrorCode.ARGUMENT_MISSING_TOKEN, 'Cannot insert a missing token');
    }
    this.assertIndex('Insert', index, this.count());

    this.rehearsal().applyInsert(token, index);
    this.applyInsert(token, index);
  }

  /**
   * Remove the token at `index`, then run whatever reactions close the gap.
   *
   * Only an accelerator that ends up at the vacated position is checked
   * (chain propagation then covers its neighbours). Dark accelerators are
   * not re-checked: on a ring small enough to hold one, a remove cannot
   * bring it next to a new pair.
   *
   * @throws InvalidState if this is the last token
   * @throws IndexOutOfRange if `index` is not in [0, count())
   * @throws CatalogError as for {@link insert}
   */
  remove(index: number): void {
    if (this.count() === 1) {
      throw new InvalidState(
        EngineErrorCode.STATE_RING_WOULD_BE_EMPTY,
        'The ring must not become empty',
        { index },
        'Ring'
      );
    }
    this.assertIndex('Remove', index, this.count() - 1);

    this.rehearsal().applyRemove(index);
    this.applyRemove(index);
  }

  /**
   * Rotation-invariant, order-sensitive equality: true iff some rotation of
   * this ring's sequence matches `other`'s token for token.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Ring)) return false;
    if (other === this) return true;

    const n = this.count();
    if (other.count() !== n) return false;

    for (let shift = 0; shift < n; shift++) {
      if (this.matchesRotation(other, shift)) return true;
    }
    return false;
  }

  /**
   * Hash consistent with {@link equals}: computed over the sorted token keys,
   * so every rotation hashes alike (and so do some unequal rings).
   */
  hashCode(): number {
    const keys = this.contents.map(tokenKey).sort((a, b) => a - b);
    return keys.reduce((hash, key) => (Math.imul(31, hash) + key) | 0, 1);
  }

  toJSON(): RingSnapshot {
    return toRingSnapshot(this.contents);
  }

  toString(): string {
    return formatRing(this.contents);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Reactions
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * A listener-less copy of this ring. Moves are played on it first, so a
   * move that fails partway through never touches this ring.
   */
  private rehearsal(): Ring {
    const copy = new Ring(this.contents, this.catalog);
    copy.isRehearsal = true;
    return copy;
  }

  private applyInsert(token: Token, index: number): void {
    this.contents.splice(index, 0, token);
    this.listeners.forEach((listener) => listener.onInsert(index, token));

    let context = this.contextAt(index);

    if (isDarkAccelerator(token)) {
      context = this.collapse(context, DARK_ACCELERATOR_RULE).context;
    } else if (isDarkAccelerator(context.counterclockwiseToken)) {
      context = this.collapse(
        this.contextAt(context.counterclockwiseIndex),
        DARK_ACCELERATOR_RULE
      ).context;
    } else if (isDarkAccelerator(context.clockwiseToken)) {
      context = this.collapse(this.contextAt(context.clockwiseIndex), DARK_ACCELERATOR_RULE).context;
    } else if (isAccelerator(token)) {
      context = this.collapse(context, ACCELERATOR_RULE).context;
    }

    this.propagateChain(context);
  }

  private applyRemove(index: number): void {
    this.contents.splice(index, 1);
    this.listeners.forEach((listener) => listener.onRemove(index));

    // The clockwise neighbour slid into `index`, unless the last slot went.
    let context = this.contextAt(index === this.count() ? index - 1 : index);

    if (isAccelerator(context.centerToken)) {
      context = this.collapse(context, ACCELERATOR_RULE).context;
    }

    this.propagateChain(context);
  }

  private contextAt(centerIndex: number): ReactionContext {
    return createReactionContext(this.contents, centerIndex);
  }

  /**
   * Fuse at `start` while `rule` (and then the accelerator rule) applies.
   * Only the first step may be a dark-accelerator fusion; every continuation
   * is an ordinary cascade around the previous result.
   */
  private collapse(start: ReactionContext, rule: ReactionRule): CollapseOutcome {
    let context = start;
    let activeRule = rule;
    let fusions = 0;

    while (!isDegenerate(context) && activeRule.isApplicable(context)) {
      const result = activeRule.react(
        context.counterclockwiseToken,
        context.centerToken,
        context.clockwiseToken,
        this.catalog
      );
      context = this.applyFusion(context, result, activeRule);
      fusions++;
      activeRule = ACCELERATOR_RULE;
    }

    return { context, fusions };
  }

  /**
   * Replace the three entries of `context` with `result`. Two indices
   * disappear; the result lands at the center, shifted down once for each
   * removed neighbour that sat below it.
   */
  private applyFusion(
    context: ReactionContext,
    result: NumberedToken,
    rule: ReactionRule
  ): ReactionContext {
    const { counterclockwiseIndex, centerIndex, clockwiseIndex } = context;
    const resultIndex =
      centerIndex -
      (counterclockwiseIndex < centerIndex ? 1 : 0) -
      (clockwiseIndex < centerIndex ? 1 : 0);

    this.contents.splice(Math.max(counterclockwiseIndex, clockwiseIndex), 1);
    this.contents.splice(Math.min(counterclockwiseIndex, clockwiseIndex), 1);
    this.contents[resultIndex] = result;

    this.listeners.forEach((listener) =>
      listener.onReaction(counterclockwiseIndex, centerIndex, clockwiseIndex, result, resultIndex)
    );

    if (!this.isRehearsal) {
      REACTION_DEBUG_LOGGER?.debug('Fusion', {
        rule: rule.name,
        counterclockwiseIndex,
        centerIndex,
        clockwiseIndex,
        result: describeToken(result),
        resultIndex,
        ring: this.toString(),
      });
    }

    return this.contextAt(resultIndex);
  }

  /**
   * After a move settles, an accelerator next to the last result may now
   * have a pair to fuse. React there, counterclockwise first, and keep
   * following the new result until no neighbour is an accelerator.
   *
   * Each round either fuses (the ring shrinks by two) or stops. An
   * accelerator that cannot fuse here never becomes able to by looking at
   * its accelerator neighbours, so stopping is the only way out.
   */
  private propagateChain(start: ReactionContext): void {
    let context = start;

    for (;;) {
      let acceleratorIndex: number;
      if (isAccelerator(context.counterclockwiseToken)) {
        acceleratorIndex = context.counterclockwiseIndex;
      } else if (isAccelerator(context.clockwiseToken)) {
        acceleratorIndex = context.clockwiseIndex;
      } else {
        return;
      }

      const outcome = this.collapse(this.contextAt(acceleratorIndex), ACCELERATOR_RULE);
      if (outcome.fusions === 0) {
        if (!this.isRehearsal) {
          REACTION_DEBUG_LOGGER?.debug('Chain halted at an accelerator that cannot fuse', {
            acceleratorIndex,
            ring: this.toString(),
          });
        }
        return;
      }
      context = outcome.context;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════════════

  private matchesRotation(other: Ring, shift: number): boolean {
    const n = this.contents.length;
    for (let i = 0; i < n; i++) {
      if (!sameToken(this.contents[(i + shift) % n], other.contents[i])) {
        return false;
      }
    }
    return true;
  }

  private assertIndex(operation: string, index: number, upperBound: number): void {
    if (!Number.isInteger(index) || index < 0 || index > upperBound) {
      throw indexOutOfRange(operation, index, upperBound);
    }
  }

  private assertListener(listener: RingListener): void {
    if (listener == null) {
      throw new InvalidArgument(EngineErrorCode.ARGUMENT_MISSING_LISTENER, 'Listener must not be null');
    }
  }
}
