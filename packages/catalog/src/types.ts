/**
 * Entitle Catalog — Core Type Definitions
 *
 * This module defines the service definition shape, the validation result
 * types shared by every package, and the base error class.
 *
 * These types are the base layer of the Entitle type system. The kernel
 * depends on this package; this package has no internal dependencies.
 */

// ---------------------------------------------------------------------------
// Service Definition
// ---------------------------------------------------------------------------

/**
 * A release series name as reported by os-release (e.g. `jammy`).
 * Availability is keyed by series, not by version number.
 */
export type ReleaseSeries = string;

/**
 * The complete, declarative description of one optional service.
 *
 * Definitions are loaded once from the bundled catalog data and never
 * mutated. Every field is required in the data file; the validator rejects
 * definitions with missing or mistyped fields.
 */
export interface ServiceDefinition {
  /** Unique key. Matched exactly and case-sensitively against requests. */
  readonly name: string;
  /** Human-readable title used in per-service messages. */
  readonly title: string;
  /** One-line description shown by `status`. */
  readonly description: string;
  /** Long-form text returned by the help query. */
  readonly help_text: string;
  /** Series → whether the service can be enabled on that series. */
  readonly available_by_release: Readonly<Record<ReleaseSeries, boolean>>;
  /** Beta services are hidden from requests unless beta access is allowed. */
  readonly is_beta: boolean;
  /** Enabled automatically on attach when entitled and available. */
  readonly enable_by_default: boolean;
  /** Services that must be enabled before this one. */
  readonly required_services: ReadonlyArray<string>;
  /** Enabling this service requires a reboot to take effect. */
  readonly reboot_on_enable: boolean;
  /** Whether the service can be enabled inside a container. */
  readonly container_supported: boolean;
}

// ---------------------------------------------------------------------------
// Validation Result
// ---------------------------------------------------------------------------

/** A single structural problem found while validating input data. */
export interface ValidationError {
  readonly message: string;
  /** Where the problem was found (e.g. `services[3].title`). */
  readonly context?: string | undefined;
}

/**
 * Result of validating untrusted data.
 * On success carries the narrowed value; on failure the full error list.
 */
export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Base class for every error the Entitle packages throw on purpose.
 *
 * `code` is a stable kebab-case identifier, the same vocabulary used for
 * message codes in structured output.
 */
export class EntitleError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = 'EntitleError';
  }
}

/** Thrown when the catalog data file does not describe valid services. */
export class CatalogValidationError extends EntitleError {
  readonly errors: ReadonlyArray<ValidationError>;

  constructor(errors: ReadonlyArray<ValidationError>) {
    super(
      'invalid-service-catalog',
      `Service catalog is invalid:\n` +
        errors.map((e) => `  ${e.context ?? '(root)'}: ${e.message}`).join('\n'),
    );
    this.errors = errors;
    this.name = 'CatalogValidationError';
  }
}
