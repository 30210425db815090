import path from 'path';
import {
  getDefaultCatalog,
  loadElementCatalog,
} from '../../src/server/catalog/loadElementCatalog';
import { ELEMENTS_CSV_PATH } from '../utils/fixtures';

describe('loadElementCatalog', () => {
  it('reads a catalog file', () => {
    const catalog = loadElementCatalog(ELEMENTS_CSV_PATH);

    expect(catalog.size).toBe(118);
    expect(catalog.lookup(2).name).toBe('Helium');
  });

  it('fails for a missing file', () => {
    expect(() => loadElementCatalog(path.join(__dirname, 'no-such-catalog.csv'))).toThrow(
      /ENOENT/
    );
  });

  it('caches the default catalog', () => {
    const first = getDefaultCatalog();

    expect(first.size).toBe(118);
    expect(getDefaultCatalog()).toBe(first);
  });
});
