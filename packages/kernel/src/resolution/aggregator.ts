/**
 * Entitle Kernel — Result Aggregator
 *
 * Collects per-service outcomes, errors and warnings while an operation
 * runs and materializes the immutable OperationResult once at the end.
 *
 * The overall `result` is derived, never set: it is Failure exactly when an
 * error was recorded or a service failed.
 */

import type { ErrorEntry, OperationResult, ServiceOutcome } from '../types/operation.js';
import { ResultStatus, SCHEMA_VERSION, ServiceOutcomeStatus } from '../types/operation.js';

export class ResultAggregator {
  private readonly outcomes: ServiceOutcome[] = [];
  private readonly errors: ErrorEntry[] = [];
  private readonly warnings: ErrorEntry[] = [];
  private needsReboot = false;

  succeed(service: string): void {
    this.outcomes.push({ service_name: service, status: ServiceOutcomeStatus.Success });
  }

  /** Record a failed service together with the entry explaining it. */
  fail(service: string, error: ErrorEntry): void {
    this.outcomes.push({ service_name: service, status: ServiceOutcomeStatus.Failure });
    this.errors.push(error);
  }

  skip(service: string): void {
    this.outcomes.push({ service_name: service, status: ServiceOutcomeStatus.Skipped });
  }

  addError(error: ErrorEntry): void {
    this.errors.push(error);
  }

  addWarning(warning: ErrorEntry): void {
    this.warnings.push(warning);
  }

  requireReboot(): void {
    this.needsReboot = true;
  }

  /**
   * Fold another aggregator into this one. Successes, warnings and the
   * reboot flag always carry over; failures and errors only when
   * `withFailures` is set.
   */
  absorb(other: ResultAggregator, withFailures: boolean): void {
    for (const outcome of other.outcomes) {
      if (outcome.status === ServiceOutcomeStatus.Success) {
        this.outcomes.push(outcome);
      } else if (outcome.status === ServiceOutcomeStatus.Failure && withFailures) {
        this.outcomes.push(outcome);
      }
    }
    if (withFailures) {
      this.errors.push(...other.errors);
    }
    this.warnings.push(...other.warnings);
    if (other.needsReboot) {
      this.needsReboot = true;
    }
  }

  /** Outcomes recorded so far, in recording order. */
  serviceOutcomes(): ReadonlyArray<ServiceOutcome> {
    return [...this.outcomes];
  }

  build(): OperationResult {
    const processed = this.namesWith(ServiceOutcomeStatus.Success);
    const failed = this.namesWith(ServiceOutcomeStatus.Failure);
    const failure = this.errors.length > 0 || failed.length > 0;
    return {
      _schema_version: SCHEMA_VERSION,
      result: failure ? ResultStatus.Failure : ResultStatus.Success,
      processed_services: processed,
      failed_services: failed,
      errors: [...this.errors],
      warnings: [...this.warnings],
      needs_reboot: this.needsReboot,
    };
  }

  private namesWith(status: ServiceOutcomeStatus): ReadonlyArray<string> {
    return this.outcomes.filter((o) => o.status === status).map((o) => o.service_name);
  }
}

/** The result of a batch the Precondition Gate rejected. */
export function blockedResult(error: ErrorEntry): OperationResult {
  const aggregator = new ResultAggregator();
  aggregator.addError(error);
  return aggregator.build();
}
