import type { TokenCatalog } from '../catalog/ElementCatalog';
import {
  ACCELERATOR,
  ACCELERATOR_KEY,
  DARK_ACCELERATOR,
  DARK_ACCELERATOR_KEY,
  tokenKey,
  type Token,
} from '../types/token';
import { describeIssues, RingSnapshotSchema } from '../validation/schemas';
import { EngineErrorCode, InvalidArgument, isCatalogError } from './errors';

/**
 * JSON form of a ring: the token keys in index order. Numbered tokens are
 * stored by catalog number only; display metadata comes back from the
 * catalog on restore.
 */
export interface RingSnapshot {
  version: 1;
  tokens: number[];
}

export function toRingSnapshot(tokens: readonly Token[]): RingSnapshot {
  return { version: 1, tokens: tokens.map(tokenKey) };
}

function tokenFromKey(key: number, catalog: TokenCatalog): Token {
  if (key === ACCELERATOR_KEY) return ACCELERATOR;
  if (key === DARK_ACCELERATOR_KEY) return DARK_ACCELERATOR;
  return catalog.lookup(key);
}

/**
 * Validate an untrusted snapshot and resolve its keys against the catalog.
 *
 * @throws InvalidArgument if the value does not match the snapshot schema or
 *   names a number the catalog does not hold
 */
export function tokensFromSnapshot(value: unknown, catalog: TokenCatalog): Token[] {
  const result = RingSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgument(
      EngineErrorCode.ARGUMENT_INVALID_SNAPSHOT,
      'Ring snapshot is invalid',
      { issues: describeIssues(result.error) },
      'Snapshot'
    );
  }

  try {
    return result.data.tokens.map((key) => tokenFromKey(key, catalog));
  } catch (err) {
    if (isCatalogError(err)) {
      throw new InvalidArgument(
        EngineErrorCode.ARGUMENT_INVALID_SNAPSHOT,
        `Ring snapshot references an unknown element: ${err.message}`,
        { cause: err.toJSON() },
        'Snapshot'
      );
    }
    throw err;
  }
}
