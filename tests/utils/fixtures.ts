/**
 * Test Fixtures and Utilities
 * Common catalog, token and ring helpers for the reaction engine tests
 */

import fs from 'fs';
import path from 'path';
import { catalogFromCsv } from '../../src/shared/catalog/catalogCsv';
import { Ring } from '../../src/shared/engine/Ring';
import { RingEventRecorder, type RingEvent } from '../../src/shared/engine/ringListener';
import {
  ACCELERATOR,
  DARK_ACCELERATOR,
  tokenKey,
  type NumberedToken,
  type Token,
} from '../../src/shared/types/token';

export const ELEMENTS_CSV_PATH = path.resolve(__dirname, '../../data/elements.csv');

/**
 * The bundled element catalog (1 H ... 118 Og).
 */
export const catalog = catalogFromCsv(fs.readFileSync(ELEMENTS_CSV_PATH, 'utf8'));

/**
 * Ring entry shorthand: a catalog number, `'+'` for the accelerator or
 * `'(+)'` for the dark accelerator.
 */
export type RingItem = number | '+' | '(+)';

/**
 * Element helper - the catalog entry numbered `n`
 */
export function el(n: number): NumberedToken {
  return catalog.lookup(n);
}

export function tokenOf(item: RingItem): Token {
  if (item === '+') return ACCELERATOR;
  if (item === '(+)') return DARK_ACCELERATOR;
  return el(item);
}

/**
 * Builds a ring over the bundled catalog, e.g. `ring(1, '+', 3)`.
 */
export function ring(...items: RingItem[]): Ring {
  return new Ring(items.map(tokenOf), catalog);
}

/**
 * Ring contents as token keys: catalog numbers, -1 for `+`, -2 for `(+)`.
 */
export function keysOf(r: Ring): number[] {
  return r.tokens().map(tokenKey);
}

/**
 * Builds a ring with a recorder already attached.
 */
export function recordedRing(...items: RingItem[]): { ring: Ring; recorder: RingEventRecorder } {
  const r = ring(...items);
  const recorder = new RingEventRecorder();
  r.addListener(recorder);
  return { ring: r, recorder };
}

export function insertEvent(index: number, item: RingItem): RingEvent {
  return { type: 'insert', index, token: tokenOf(item) };
}

export function removeEvent(index: number): RingEvent {
  return { type: 'remove', index };
}

export function reactionEvent(
  counterclockwiseIndex: number,
  centerIndex: number,
  clockwiseIndex: number,
  resultNumber: number,
  resultIndex: number
): RingEvent {
  return {
    type: 'reaction',
    counterclockwiseIndex,
    centerIndex,
    clockwiseIndex,
    result: el(resultNumber),
    resultIndex,
  };
}

/**
 * Runs `fn` and returns what it threw, for asserting on error fields.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
