/**
 * Entitle Catalog — Catalog Loading
 *
 * Reads the bundled `data/services.json` (or an override path), validates
 * it, and builds the ServiceCatalog. This is the only file in the package
 * that touches the file system.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ServiceCatalog } from './catalog.js';
import { CatalogValidationError } from './types.js';
import { validateCatalogData } from './validator.js';

/** Absolute path of the catalog data file shipped with this package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../data/services.json', import.meta.url),
);

/**
 * Load and validate a catalog file.
 *
 * @param path - JSON file to read; defaults to the bundled catalog
 * @throws {CatalogValidationError} If the file content is not a valid catalog
 * @throws {SyntaxError} If the file is not JSON
 */
export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): ServiceCatalog {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = validateCatalogData(parsed);
  if (!result.ok) {
    throw new CatalogValidationError(result.errors);
  }
  return new ServiceCatalog(result.value);
}
