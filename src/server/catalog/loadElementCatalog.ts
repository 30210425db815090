import fs from 'fs';
import { catalogFromCsv } from '../../shared/catalog/catalogCsv';
import type { ElementCatalog } from '../../shared/catalog/ElementCatalog';
import { config } from '../config';
import { logger } from '../utils/logger';

let defaultCatalog: ElementCatalog | null = null;

/**
 * Read and validate a catalog CSV file.
 *
 * @throws CatalogError if the file content is malformed
 */
export function loadElementCatalog(filePath: string = config.catalog.path): ElementCatalog {
  const text = fs.readFileSync(filePath, 'utf8');
  const catalog = catalogFromCsv(text);
  logger.info('Element catalog loaded', { path: filePath, entries: catalog.size });
  return catalog;
}

/**
 * The process-wide catalog from `config.catalog.path`, read on first use.
 */
export function getDefaultCatalog(): ElementCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadElementCatalog();
  }
  return defaultCatalog;
}
