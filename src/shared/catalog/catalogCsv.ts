import { CatalogError, EngineErrorCode } from '../engine/errors';
import { CatalogRowSchema, describeIssues, type CatalogRow } from '../validation/schemas';
import { ElementCatalog } from './ElementCatalog';

/**
 * Parse catalog source text: one `number,symbol,name,#rrggbb` record per
 * line. Blank lines are skipped; line numbers in errors are 1-based.
 */
export function parseCatalogCsv(text: string): CatalogRow[] {
  const rows: CatalogRow[] = [];

  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') return;

    const lineNumber = i + 1;
    const fields = line.split(',');
    if (fields.length !== 4) {
      throw new CatalogError(
        EngineErrorCode.CATALOG_MALFORMED_ROW,
        `Catalog line ${lineNumber}: expected 4 fields, got ${fields.length}`,
        { lineNumber, line }
      );
    }

    const [number, symbol, name, color] = fields;
    const result = CatalogRowSchema.safeParse({ number, symbol, name, color });
    if (!result.success) {
      throw new CatalogError(
        EngineErrorCode.CATALOG_MALFORMED_ROW,
        `Catalog line ${lineNumber}: ${result.error.issues[0]?.message ?? 'invalid row'}`,
        { lineNumber, line, issues: describeIssues(result.error) }
      );
    }
    rows.push(result.data);
  });

  return rows;
}

export function catalogFromCsv(text: string): ElementCatalog {
  return new ElementCatalog(parseCatalogCsv(text));
}
