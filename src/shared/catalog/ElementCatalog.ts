import type { NumberedToken } from '../types/token';
import { CatalogError, EngineErrorCode } from '../engine/errors';
import type { CatalogRow } from '../validation/schemas';

/**
 * The lookup surface the reaction engine depends on. Rules turn a computed
 * number into a token through `lookup`; nothing else about the catalog is
 * visible to the ring.
 */
export interface TokenCatalog {
  /**
   * @throws CatalogError if `number` is not an integer in [1, maxToken().number]
   */
  lookup(number: number): NumberedToken;
  maxToken(): NumberedToken;
}

/**
 * Static table of numbered tokens.
 *
 * Numbering is implicit by position: the rows must be numbered 1..n in
 * order. Entries are frozen and shared, so repeated lookups of the same
 * number return the same object.
 */
export class ElementCatalog implements TokenCatalog {
  private readonly entries: readonly NumberedToken[];
  private readonly bySymbol: ReadonlyMap<string, NumberedToken>;

  constructor(rows: readonly CatalogRow[]) {
    if (rows.length === 0) {
      throw new CatalogError(
        EngineErrorCode.CATALOG_INCONSISTENT,
        'Catalog requires at least one entry'
      );
    }

    const entries: NumberedToken[] = [];
    const bySymbol = new Map<string, NumberedToken>();

    rows.forEach((row, i) => {
      const expected = i + 1;
      if (row.number !== expected) {
        throw new CatalogError(
          EngineErrorCode.CATALOG_INCONSISTENT,
          `Catalog entry ${expected} is numbered ${row.number}`,
          { expected, actual: row.number }
        );
      }

      const symbol = row.symbol.trim();
      if (bySymbol.has(symbol)) {
        throw new CatalogError(
          EngineErrorCode.CATALOG_INCONSISTENT,
          `Duplicate catalog symbol ${symbol}`,
          { symbol, number: row.number }
        );
      }

      const entry: NumberedToken = Object.freeze({
        kind: 'numbered',
        number: row.number,
        symbol,
        name: row.name.trim(),
        color: row.color.toLowerCase(),
      });
      entries.push(entry);
      bySymbol.set(symbol, entry);
    });

    this.entries = entries;
    this.bySymbol = bySymbol;
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(number: number): NumberedToken {
    const entry = Number.isInteger(number) ? this.entries[number - 1] : undefined;
    if (!entry) {
      throw new CatalogError(
        EngineErrorCode.CATALOG_UNKNOWN_NUMBER,
        `No catalog entry numbered ${number} (catalog holds 1..${this.entries.length})`,
        { number, size: this.entries.length }
      );
    }
    return entry;
  }

  maxToken(): NumberedToken {
    return this.lookup(this.entries.length);
  }

  findBySymbol(symbol: string): NumberedToken | undefined {
    return this.bySymbol.get(symbol);
  }
}
