import type { ElementCatalog } from '../catalog/ElementCatalog';
import {
  ACCELERATOR,
  DARK_ACCELERATOR,
  describeToken,
  type NumberedToken,
  type Token,
} from '../types/token';
import { EngineErrorCode, InvalidArgument, isCatalogError } from './errors';

/**
 * Shared ring-notation helpers.
 *
 * A ring is written as its tokens in index order, separated by whitespace:
 *
 *   H[1] + He[2] (+) Li[3]
 *
 * `+` is the accelerator and `(+)` the dark accelerator. When parsing, an
 * element may also be written as a bare number (`3`) or a bare symbol
 * (`Li`). The notation is meant for logs, fixtures and debugging tools; it
 * carries no rotation information beyond the order it was written in.
 */

export type NotationCatalog = Pick<ElementCatalog, 'lookup' | 'findBySymbol'>;

const QUALIFIED_ELEMENT = /^([A-Za-z]+)\[(\d+)\]$/;
const BARE_NUMBER = /^\d+$/;
const BARE_SYMBOL = /^[A-Za-z]+$/;

export function formatToken(token: Token): string {
  return describeToken(token);
}

export function formatRing(tokens: readonly Token[]): string {
  return tokens.map(formatToken).join(' ');
}

function invalidNotation(message: string, position: number, text: string): InvalidArgument {
  return new InvalidArgument(
    EngineErrorCode.ARGUMENT_INVALID_NOTATION,
    message,
    { position, text },
    'Notation'
  );
}

function lookupAt(
  catalog: NotationCatalog,
  number: number,
  position: number,
  text: string
): NumberedToken {
  try {
    return catalog.lookup(number);
  } catch (err) {
    if (isCatalogError(err)) {
      throw invalidNotation(`Token ${position}: no element numbered ${number}`, position, text);
    }
    throw err;
  }
}

/**
 * Parse a single token. `position` is 0-based and only used in errors.
 */
export function parseToken(text: string, catalog: NotationCatalog, position: number = 0): Token {
  if (text === '+') return ACCELERATOR;
  if (text === '(+)') return DARK_ACCELERATOR;

  const qualified = QUALIFIED_ELEMENT.exec(text);
  if (qualified) {
    const [, symbol, digits] = qualified;
    const token = lookupAt(catalog, Number(digits), position, text);
    if (token.symbol !== symbol) {
      throw invalidNotation(
        `Token ${position}: element ${token.number} is ${token.symbol}, not ${symbol}`,
        position,
        text
      );
    }
    return token;
  }

  if (BARE_NUMBER.test(text)) {
    return lookupAt(catalog, Number(text), position, text);
  }

  if (BARE_SYMBOL.test(text)) {
    const token = catalog.findBySymbol(text);
    if (!token) {
      throw invalidNotation(`Token ${position}: unknown symbol ${text}`, position, text);
    }
    return token;
  }

  throw invalidNotation(`Token ${position}: cannot parse "${text}"`, position, text);
}

export function parseRing(text: string, catalog: NotationCatalog): Token[] {
  const parts = text.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw invalidNotation('Ring notation is empty', 0, text);
  }
  return parts.map((part, i) => parseToken(part, catalog, i));
}
