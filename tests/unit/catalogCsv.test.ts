import { catalogFromCsv, parseCatalogCsv } from '../../src/shared/catalog/catalogCsv';
import { CatalogError, EngineErrorCode } from '../../src/shared/engine/errors';
import { thrownBy } from '../utils/fixtures';

describe('catalog CSV', () => {
  it('parses one row per line, trimming fields', () => {
    const text = '1,Aa,Alpha,#aabbcc\r\n2, Bb , Beta ,#112233\n';

    expect(parseCatalogCsv(text)).toEqual([
      { number: 1, symbol: 'Aa', name: 'Alpha', color: '#aabbcc' },
      { number: 2, symbol: 'Bb', name: 'Beta', color: '#112233' },
    ]);
  });

  it('skips blank lines', () => {
    expect(parseCatalogCsv('\n1,Aa,Alpha,#aabbcc\n\n   \n')).toHaveLength(1);
  });

  it('reports the line of a row with the wrong field count', () => {
    const error = thrownBy(() => parseCatalogCsv('1,Aa,Alpha,#aabbcc\n2,Bb,Beta'));

    expect(error).toBeInstanceOf(CatalogError);
    expect(error).toMatchObject({
      code: EngineErrorCode.CATALOG_MALFORMED_ROW,
      message: 'Catalog line 2: expected 4 fields, got 3',
      context: { lineNumber: 2, line: '2,Bb,Beta' },
    });
  });

  it('reports rows that fail validation', () => {
    expect(() => parseCatalogCsv('1,A1,Alpha,#aabbcc')).toThrow(
      'Catalog line 1: Symbol can only contain letters'
    );
    expect(() => parseCatalogCsv('1,Aa,Alpha,red')).toThrow('Catalog line 1: Color must be #rrggbb');
    expect(() => parseCatalogCsv('1,Aa, ,#aabbcc')).toThrow('Catalog line 1: Name must not be empty');
  });

  it('rejects non-positive numbers', () => {
    expect(() => parseCatalogCsv('0,Aa,Alpha,#aabbcc')).toThrow(CatalogError);
  });

  it('builds a catalog whose numbering must run from 1', () => {
    expect(catalogFromCsv('1,Aa,Alpha,#aabbcc').size).toBe(1);
    expect(() => catalogFromCsv('2,Aa,Alpha,#aabbcc')).toThrow('Catalog entry 1 is numbered 2');
  });
});
