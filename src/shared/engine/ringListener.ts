import type { NumberedToken, Token } from '../types/token';

/**
 * Observer of structural changes to a {@link Ring}.
 *
 * Callbacks run synchronously, inline with the mutating call and in
 * registration order. Implementations must not throw and must not call
 * back into the ring; the ring does not guard against either.
 */
export interface RingListener {
  /**
   * A token was spliced in, before any reaction it triggers.
   *
   * @param index position in [0, count()] as measured before the insert
   */
  onInsert(index: number, token: Token): void;

  /**
   * Three entries fused into one. The consumed indices are positions before
   * the fusion; `resultIndex` is the position of the result after it.
   */
  onReaction(
    counterclockwiseIndex: number,
    centerIndex: number,
    clockwiseIndex: number,
    result: NumberedToken,
    resultIndex: number
  ): void;

  /**
   * A token was spliced out, before any reaction it triggers.
   *
   * @param index position in [0, count()) as measured before the remove
   */
  onRemove(index: number): void;
}

export type RingEvent =
  | { type: 'insert'; index: number; token: Token }
  | {
      type: 'reaction';
      counterclockwiseIndex: number;
      centerIndex: number;
      clockwiseIndex: number;
      result: NumberedToken;
      resultIndex: number;
    }
  | { type: 'remove'; index: number };

export type ReactionEvent = Extract<RingEvent, { type: 'reaction' }>;

/**
 * Listener that keeps every event in order. Handy for replaying a move onto
 * external state (UI, score) and for asserting on cascades.
 */
export class RingEventRecorder implements RingListener {
  private readonly recorded: RingEvent[] = [];

  /** Copy of the recorded events, oldest first. */
  get events(): RingEvent[] {
    return [...this.recorded];
  }

  reactions(): ReactionEvent[] {
    return this.recorded.filter((e): e is ReactionEvent => e.type === 'reaction');
  }

  clear(): void {
    this.recorded.length = 0;
  }

  onInsert(index: number, token: Token): void {
    this.recorded.push({ type: 'insert', index, token });
  }

  onReaction(
    counterclockwiseIndex: number,
    centerIndex: number,
    clockwiseIndex: number,
    result: NumberedToken,
    resultIndex: number
  ): void {
    this.recorded.push({
      type: 'reaction',
      counterclockwiseIndex,
      centerIndex,
      clockwiseIndex,
      result,
      resultIndex,
    });
  }

  onRemove(index: number): void {
    this.recorded.push({ type: 'remove', index });
  }
}
