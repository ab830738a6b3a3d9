/**
 * Entitle Kernel — Operation Logger
 *
 * Records one entry per completed operation. If no sink is injected
 * (e.g., in tests), record() is a no-op.
 */

import type { OperationAction, OperationResult } from '../types/operation.js';
import type { LogSink, OperationLogEntry } from './log-sink.js';

export class OperationLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly now: () => string = () => new Date().toISOString(),
  ) {}

  /**
   * Build and forward the entry for a finished operation.
   *
   * @param requestedNames - Names as the operator gave them (before de-duplication)
   */
  record(action: OperationAction, requestedNames: ReadonlyArray<string>, result: OperationResult): void {
    if (this.sink === undefined) return;
    const entry: OperationLogEntry = {
      timestamp: this.now(),
      action,
      requested_names: [...requestedNames],
      result: result.result,
      processed_services: result.processed_services,
      failed_services: result.failed_services,
      message_codes: result.errors.map((e) => e.message_code),
      needs_reboot: result.needs_reboot,
    };
    this.sink.append(entry);
  }
}
