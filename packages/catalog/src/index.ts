/**
 * @entitle/catalog
 *
 * Service catalog: definition types, data validation, lookup and
 * enable/disable ordering.
 *
 * This package is the base layer of the Entitle type system. All other
 * packages depend on it; it has no internal dependencies.
 */

export type {
  ReleaseSeries,
  ServiceDefinition,
  ValidationError,
  ValidationResult,
} from './types.js';
export { CatalogValidationError, EntitleError } from './types.js';

export type { ListOptions } from './catalog.js';
export { ServiceCatalog } from './catalog.js';

export { validateCatalogData, validateServiceDefinition } from './validator.js';
export { DEFAULT_CATALOG_PATH, loadCatalog } from './load.js';
