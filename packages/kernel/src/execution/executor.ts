/**
 * Entitle Kernel — Action Executor
 *
 * Applies enable/disable to each eligible service, strictly sequentially and
 * in request order. There is no fail-fast: a failure is recorded against the
 * requested name and execution continues with the next one.
 *
 * Per-service checks run before the injected ServiceHandler is called:
 *
 *   enable   entitled → available on series → not already enabled →
 *            required services enabled (or enabled first with assumeYes)
 *   disable  currently enabled → no enabled dependents (or disabled first
 *            with assumeYes)
 *
 * The executor works on a private copy of the enabled-services list. The
 * caller's AttachmentState is never mutated; state() returns the next value.
 */

import type { ReleaseSeries, ServiceCatalog, ServiceDefinition } from '@entitle/catalog';
import type { AttachmentState } from '../types/attachment.js';
import type { HandlerContext, ServiceHandler } from '../types/handler.js';
import type { ErrorEntry, ServiceAction } from '../types/operation.js';
import { ErrorType } from '../types/operation.js';
import type { NamePartition } from '../validation/request-validator.js';
import type { ResultAggregator } from '../resolution/aggregator.js';
import { MessageCode, serviceEntry, systemEntry } from '../messages/templates.js';

export interface ExecutorOptions {
  readonly catalog: ServiceCatalog;
  readonly handler: ServiceHandler;
  readonly series: ReleaseSeries;
  /** Enable required services / disable dependents without failing. */
  readonly assumeYes: boolean;
}

export class ActionExecutor {
  private readonly enabled: string[];
  /** Services whose state this executor changed. */
  private readonly changed = new Set<string>();
  /** Requested names whose failure came from the handler, not a check. */
  private readonly handlerFailed = new Set<string>();
  private readonly ctx: HandlerContext;

  constructor(
    private readonly opts: ExecutorOptions,
    private readonly initial: AttachmentState,
    private readonly aggregator: ResultAggregator,
  ) {
    this.enabled = [...initial.enabled_services];
    this.ctx = { series: opts.series, assumeYes: opts.assumeYes };
  }

  /**
   * Execute a batch: every known name in order, then one batch-level error
   * for the unknown names (if any), even when known names succeeded.
   */
  async run(action: ServiceAction, partition: NamePartition): Promise<void> {
    for (const name of partition.known) {
      if (action === 'enable') {
        await this.enable(name);
      } else {
        await this.disable(name);
      }
    }
    if (partition.unknown.length > 0) {
      this.aggregator.addError(
        systemEntry(MessageCode.InvalidServiceOrFailure, { action, names: partition.unknown }),
      );
    }
  }

  /** Enable one requested service and record its outcome. */
  async enable(name: string): Promise<void> {
    this.handlerFailed.delete(name);
    // Already enabled earlier in this run as a required service.
    if (this.changed.has(name) && this.enabled.includes(name)) {
      this.aggregator.succeed(name);
      return;
    }
    const failure = await this.enableService(this.definition(name), name);
    this.record(name, failure);
  }

  /** Disable one requested service and record its outcome. */
  async disable(name: string): Promise<void> {
    this.handlerFailed.delete(name);
    if (this.changed.has(name) && !this.enabled.includes(name)) {
      this.aggregator.succeed(name);
      return;
    }
    const failure = await this.disableService(this.definition(name), name);
    this.record(name, failure);
  }

  isEnabled(name: string): boolean {
    return this.enabled.includes(name);
  }

  isEntitled(name: string): boolean {
    return this.initial.entitlements.includes(name);
  }

  /** Whether the last failure recorded for `name` was returned by the handler. */
  failedInHandler(name: string): boolean {
    return this.handlerFailed.has(name);
  }

  /**
   * The attachment state after execution.
   * Returns the initial object unchanged when no service changed state.
   */
  state(): AttachmentState {
    const before = this.initial.enabled_services;
    const same =
      before.length === this.enabled.length && before.every((n, i) => this.enabled[i] === n);
    return same ? this.initial : { ...this.initial, enabled_services: [...this.enabled] };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private record(name: string, failure: ErrorEntry | null): void {
    if (failure === null) {
      this.aggregator.succeed(name);
    } else {
      this.aggregator.fail(name, failure);
    }
  }

  /** @returns null on success, or the entry to attribute to `requestedBy` */
  private async enableService(def: ServiceDefinition, requestedBy: string): Promise<ErrorEntry | null> {
    const { catalog, series } = this.opts;
    const title = def.title;

    if (!this.initial.entitlements.includes(def.name)) {
      return serviceEntry(requestedBy, MessageCode.SubscriptionNotEntitled, { title });
    }
    if (!catalog.isAvailable(def.name, series)) {
      return serviceEntry(requestedBy, MessageCode.InapplicableReleaseSeries, { title, series });
    }
    if (this.enabled.includes(def.name)) {
      return serviceEntry(requestedBy, MessageCode.ServiceAlreadyEnabled, { title });
    }

    const missing = catalog.enableOrder(def.required_services.filter((r) => !this.enabled.includes(r)));
    const firstMissing = missing[0];
    if (firstMissing !== undefined && !this.opts.assumeYes) {
      return serviceEntry(requestedBy, MessageCode.RequiredServiceDisabled, {
        title,
        required: this.definition(firstMissing).title,
      });
    }
    for (const required of missing) {
      const requiredDef = this.definition(required);
      this.aggregator.addWarning(
        serviceEntry(requestedBy, MessageCode.EnablingRequiredService, { title: requiredDef.title }),
      );
      const failure = await this.enableService(requiredDef, requestedBy);
      if (failure !== null) return failure;
    }

    return this.invoke('enable', def, requestedBy);
  }

  private async disableService(def: ServiceDefinition, requestedBy: string): Promise<ErrorEntry | null> {
    const { catalog } = this.opts;

    if (!this.enabled.includes(def.name)) {
      return serviceEntry(requestedBy, MessageCode.ServiceAlreadyDisabled, { title: def.title });
    }

    const dependents = catalog.disableOrder(
      catalog.dependentsOf(def.name).filter((d) => this.enabled.includes(d)),
    );
    const firstDependent = dependents[0];
    if (firstDependent !== undefined && !this.opts.assumeYes) {
      return serviceEntry(requestedBy, MessageCode.DependentServiceEnabled, {
        title: def.title,
        dependent: this.definition(firstDependent).title,
      });
    }
    for (const dependent of dependents) {
      const dependentDef = this.definition(dependent);
      this.aggregator.addWarning(
        serviceEntry(requestedBy, MessageCode.DisablingDependentService, { title: dependentDef.title }),
      );
      const failure = await this.disableService(dependentDef, requestedBy);
      if (failure !== null) return failure;
    }

    return this.invoke('disable', def, requestedBy);
  }

  private async invoke(
    action: ServiceAction,
    def: ServiceDefinition,
    requestedBy: string,
  ): Promise<ErrorEntry | null> {
    const { handler } = this.opts;
    const outcome =
      action === 'enable' ? await handler.enable(def, this.ctx) : await handler.disable(def, this.ctx);

    if (!outcome.ok) {
      this.handlerFailed.add(requestedBy);
      return {
        message: outcome.message,
        message_code: outcome.message_code,
        service: requestedBy,
        type: ErrorType.Service,
      };
    }

    if (outcome.needsReboot) this.aggregator.requireReboot();
    for (const notice of outcome.warnings) {
      this.aggregator.addWarning({
        message: notice.message,
        message_code: notice.message_code,
        service: def.name,
        type: ErrorType.Service,
      });
    }

    if (action === 'enable') {
      this.enabled.push(def.name);
    } else {
      this.enabled.splice(this.enabled.indexOf(def.name), 1);
    }
    this.changed.add(def.name);
    return null;
  }

  /** @throws {Error} For a name missing from the catalog (programming fault) */
  private definition(name: string): ServiceDefinition {
    const def = this.opts.catalog.get(name);
    if (def === undefined) {
      throw new Error(`Service not in catalog: ${name}`);
    }
    return def;
  }
}
