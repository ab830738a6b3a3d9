/**
 * Entitle Kernel — Log Sink Interface
 *
 * Defines the injection point for operation log persistence.
 *
 * The kernel owns the contract (this interface) and the OperationLogger
 * class. Concrete implementations live in the runtime host layer and are
 * injected at construction time; the kernel never writes to disk directly.
 */

import type { OperationAction, ResultStatus } from '../types/operation.js';

/**
 * One record per completed operation.
 *
 * Carries codes rather than messages so log consumers branch on stable
 * identifiers.
 */
export interface OperationLogEntry {
  readonly timestamp: string;
  readonly action: OperationAction;
  readonly requested_names: ReadonlyArray<string>;
  readonly result: ResultStatus;
  readonly processed_services: ReadonlyArray<string>;
  readonly failed_services: ReadonlyArray<string>;
  readonly message_codes: ReadonlyArray<string>;
  readonly needs_reboot: boolean;
}

/**
 * A sink that receives and persists operation log entries.
 *
 * append() must complete before the operation returns. Implementations must
 * not silently discard entries.
 */
export interface LogSink {
  append(entry: OperationLogEntry): void;
}
