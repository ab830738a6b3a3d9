/**
 * Entitle Runtime Host — File-backed Operation Log Sink
 *
 * Implements the LogSink interface from @entitle/kernel by appending JSONL
 * entries to `<PRO_HOME>/logs/operations.jsonl`.
 *
 * This sink is synchronous: the write completes before the call returns.
 */

import { randomUUID } from 'node:crypto';
import type { LogSink, OperationLogEntry } from '@entitle/kernel';
import type { StateIO } from '../state/state-io.js';

export const OPERATIONS_LOG_FILENAME = 'operations.jsonl';

/**
 * Appends each operation log entry as a single JSONL line, tagged with a
 * random event_id.
 */
export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newEventId: () => string = randomUUID,
  ) {}

  append(entry: OperationLogEntry): void {
    const line = JSON.stringify({
      event_id: this.newEventId(),
      timestamp: entry.timestamp,
      action: entry.action,
      requested_names: entry.requested_names,
      result: entry.result,
      processed_services: entry.processed_services,
      failed_services: entry.failed_services,
      message_codes: entry.message_codes,
      needs_reboot: entry.needs_reboot,
    });
    this.stateIO.appendLine(OPERATIONS_LOG_FILENAME, line);
  }
}
