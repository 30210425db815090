/**
 * Ring entries.
 *
 * A token is either a numbered element drawn from the catalog or one of the
 * two special markers. Tokens are compared by kind (and, for numbered
 * tokens, by number); object identity never matters, so a token that has
 * been copied, deserialized or looked up twice still compares equal.
 */

export type TokenKind = 'numbered' | 'accelerator' | 'dark_accelerator';

/**
 * A catalog element. Only `number` takes part in the rules; symbol, name and
 * color are display metadata owned by the catalog.
 */
export interface NumberedToken {
  readonly kind: 'numbered';
  /** Position in the catalog, starting at 1. */
  readonly number: number;
  readonly symbol: string;
  readonly name: string;
  /** Display color as `#rrggbb`. */
  readonly color: string;
}

/** Fuses its flanking neighbours when they are equal. */
export interface AcceleratorToken {
  readonly kind: 'accelerator';
}

/** Fuses its flanking neighbours unconditionally. */
export interface DarkAcceleratorToken {
  readonly kind: 'dark_accelerator';
}

export type Token = NumberedToken | AcceleratorToken | DarkAcceleratorToken;

export const ACCELERATOR: AcceleratorToken = Object.freeze({ kind: 'accelerator' });

export const DARK_ACCELERATOR: DarkAcceleratorToken = Object.freeze({ kind: 'dark_accelerator' });

/** Keys used when a token has to be projected to a single integer. */
export const ACCELERATOR_KEY = -1;
export const DARK_ACCELERATOR_KEY = -2;

export function isNumbered(token: Token): token is NumberedToken {
  return token.kind === 'numbered';
}

export function isAccelerator(token: Token): token is AcceleratorToken {
  return token.kind === 'accelerator';
}

export function isDarkAccelerator(token: Token): token is DarkAcceleratorToken {
  return token.kind === 'dark_accelerator';
}

/**
 * Handlers for each token kind; see {@link matchToken}.
 */
export interface TokenVisitor<R> {
  numbered(token: NumberedToken): R;
  accelerator(): R;
  darkAccelerator(): R;
}

export function matchToken<R>(token: Token, visitor: TokenVisitor<R>): R {
  switch (token.kind) {
    case 'numbered':
      return visitor.numbered(token);
    case 'accelerator':
      return visitor.accelerator();
    case 'dark_accelerator':
      return visitor.darkAccelerator();
    default: {
      const exhaustive: never = token;
      return exhaustive;
    }
  }
}

/**
 * Same entity: same kind, and the same catalog number for numbered tokens.
 */
export function sameToken(a: Token, b: Token): boolean {
  if (isNumbered(a) && isNumbered(b)) {
    return a.number === b.number;
  }
  return a.kind === b.kind;
}

/**
 * Integer projection of a token: its number, or a negative key for the
 * special markers. Used for hashing and snapshots.
 */
export function tokenKey(token: Token): number {
  return matchToken(token, {
    numbered: (t) => t.number,
    accelerator: () => ACCELERATOR_KEY,
    darkAccelerator: () => DARK_ACCELERATOR_KEY,
  });
}

/**
 * Display form: `Sym[n]` for elements, `+` for the accelerator and `(+)` for
 * the dark accelerator.
 */
export function describeToken(token: Token): string {
  return matchToken(token, {
    numbered: (t) => `${t.symbol}[${t.number}]`,
    accelerator: () => '+',
    darkAccelerator: () => '(+)',
  });
}
