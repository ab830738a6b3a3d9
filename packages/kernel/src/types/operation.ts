/**
 * Entitle Kernel — Operation Types
 *
 * Defines the request a single CLI invocation makes and the versioned result
 * it produces. The result is built once, rendered, and discarded; it is
 * never persisted.
 *
 * Field names are snake_case because OperationResult is serialized verbatim
 * as the JSON wire format.
 */

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/** Lifecycle actions the engine resolves. */
export type OperationAction = 'enable' | 'disable' | 'attach' | 'auto-attach' | 'detach' | 'refresh';

/** Actions that take a list of service names. */
export type ServiceAction = Extract<OperationAction, 'enable' | 'disable'>;

export type OutputFormat = 'text' | 'json';

/**
 * A single enable/disable request.
 *
 * `requested_names` is the raw operator input; de-duplication happens in the
 * request validator, not at construction.
 */
export interface OperationRequest {
  readonly action: ServiceAction;
  readonly requested_names: ReadonlyArray<string>;
  /** Resolve dependency prompts automatically. */
  readonly assume_yes: boolean;
  readonly format: OutputFormat;
  /** Treat beta services as known names. */
  readonly allow_beta: boolean;
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/** Wire schema version of OperationResult. */
export const SCHEMA_VERSION = '0.1' as const;

/** Scope of an ErrorEntry: the whole batch, or one named service. */
export enum ErrorType {
  System = 'system',
  Service = 'service',
}

export enum ResultStatus {
  Success = 'success',
  Failure = 'failure',
}

/**
 * One error or warning in the result.
 *
 * `service` is null for batch-level entries (type System). Warnings use the
 * same shape so machine consumers branch on `message_code` alike.
 */
export interface ErrorEntry {
  readonly message: string;
  readonly message_code: string;
  readonly service: string | null;
  readonly type: ErrorType;
}

export enum ServiceOutcomeStatus {
  Success = 'success',
  Failure = 'failure',
  Skipped = 'skipped',
}

/** What happened to one requested service during execution. */
export interface ServiceOutcome {
  readonly service_name: string;
  readonly status: ServiceOutcomeStatus;
}

/**
 * The aggregated report of one operation.
 *
 * Invariants:
 * - result is Failure iff errors or failed_services is non-empty
 * - processed_services and failed_services are disjoint, ordered as requested
 * - a gate-blocked result has both lists empty and exactly one System error
 */
export interface OperationResult {
  readonly _schema_version: typeof SCHEMA_VERSION;
  readonly result: ResultStatus;
  readonly processed_services: ReadonlyArray<string>;
  readonly failed_services: ReadonlyArray<string>;
  readonly errors: ReadonlyArray<ErrorEntry>;
  readonly warnings: ReadonlyArray<ErrorEntry>;
  readonly needs_reboot: boolean;
}
