/**
 * Entitle Service Manager — Service Manager
 *
 * Orchestrates one operation end to end:
 *
 *   acquire lock → read AttachmentState → resolve (kernel) →
 *   write state if it changed → log → release lock
 *
 * Read paths (help, status) take no lock. The manager holds no state of its
 * own between calls: every call reads the store afresh.
 */

import type { ReleaseSeries, ServiceCatalog } from '@entitle/catalog';
import type {
  AttachmentState,
  ContractClient,
  AutoAttachOptions,
  HelpInfo,
  InstanceTokenProvider,
  LogSink,
  OperationAction,
  OperationRequest,
  OutputFormat,
  Resolution,
  ResolutionContext,
  ServiceAction,
  ServiceHandler,
  StatusReport,
} from '@entitle/kernel';
import {
  OperationLogger,
  buildStatusReport,
  queryHelp,
  resolveAttach,
  resolveAutoAttach,
  resolveDetach,
  resolveRefresh,
  resolveServiceOperation,
} from '@entitle/kernel';
import type { AttachmentStore, OperationLock } from '@entitle/runtime-host';
import { withLock } from '@entitle/runtime-host';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceManagerDeps {
  readonly catalog: ServiceCatalog;
  readonly store: AttachmentStore;
  readonly handler: ServiceHandler;
  readonly contracts: ContractClient;
  /** Cloud identity for auto-attach. Without one, auto-attach reports an unsupported image. */
  readonly instance?: InstanceTokenProvider | undefined;
  readonly lock: OperationLock;
  readonly series: ReleaseSeries;
  /** Treat beta services as known for every request. Default: false. */
  readonly allowBeta?: boolean | undefined;
  readonly logSink?: LogSink | undefined;
  readonly now?: (() => string) | undefined;
}

export interface ServiceRequestOptions {
  readonly assumeYes?: boolean | undefined;
  readonly allowBeta?: boolean | undefined;
  readonly format?: OutputFormat | undefined;
}

export interface AttachRequestOptions {
  readonly autoEnable?: boolean | undefined;
}

const NO_INSTANCE: InstanceTokenProvider = {
  fetchInstanceToken: async () => null,
};

// ---------------------------------------------------------------------------
// ServiceManager
// ---------------------------------------------------------------------------

export class ServiceManager {
  private readonly logger: OperationLogger;

  constructor(private readonly deps: ServiceManagerDeps) {
    this.logger = deps.now === undefined
      ? new OperationLogger(deps.logSink)
      : new OperationLogger(deps.logSink, deps.now);
  }

  get series(): ReleaseSeries {
    return this.deps.series;
  }

  get catalog(): ServiceCatalog {
    return this.deps.catalog;
  }

  /**
   * Enable services by name.
   *
   * @throws {RequestValidationError} When `names` is empty
   * @throws {LockHeldError} When another operation is running
   */
  enable(names: ReadonlyArray<string>, opts?: ServiceRequestOptions): Promise<Resolution> {
    return this.serviceOperation('enable', names, opts);
  }

  /**
   * Disable services by name.
   *
   * @throws {RequestValidationError} When `names` is empty
   * @throws {LockHeldError} When another operation is running
   */
  disable(names: ReadonlyArray<string>, opts?: ServiceRequestOptions): Promise<Resolution> {
    return this.serviceOperation('disable', names, opts);
  }

  attach(token: string, opts?: AttachRequestOptions): Promise<Resolution> {
    return this.mutate('attach', [], async (ctx) => {
      // The contract server is not consulted for an already-attached machine.
      const contract = ctx.state.attached ? null : await this.deps.contracts.fetchContract(token);
      return resolveAttach({ token, autoEnable: opts?.autoEnable }, contract, ctx);
    });
  }

  /** Attach through the cloud instance identity instead of an operator token. */
  autoAttach(opts?: AutoAttachOptions): Promise<Resolution> {
    const instance = this.deps.instance ?? NO_INSTANCE;
    return this.mutate('auto-attach', [...(opts?.enable ?? []), ...(opts?.enableBeta ?? [])], (ctx) =>
      resolveAutoAttach(opts ?? {}, { instance, contracts: this.deps.contracts }, ctx),
    );
  }

  detach(): Promise<Resolution> {
    return this.mutate('detach', [], (ctx) => resolveDetach(ctx));
  }

  refresh(): Promise<Resolution> {
    return this.mutate('refresh', [], async (ctx) => {
      const token = ctx.state.contract?.token;
      const contract = token === undefined ? null : await this.deps.contracts.fetchContract(token);
      return resolveRefresh(contract, ctx);
    });
  }

  /** @throws {HelpNotFoundError} For a name the catalog does not know */
  help(name: string): HelpInfo {
    return queryHelp(name, this.deps.catalog, this.deps.series);
  }

  status(opts?: { readonly includeBeta?: boolean | undefined }): StatusReport {
    const includeBeta = opts?.includeBeta ?? this.deps.allowBeta;
    return buildStatusReport(this.deps.catalog, this.deps.store.read(), this.deps.series, {
      includeBeta,
    });
  }

  /** Current persisted state, read without the lock. */
  state(): AttachmentState {
    return this.deps.store.read();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private serviceOperation(
    action: ServiceAction,
    names: ReadonlyArray<string>,
    opts?: ServiceRequestOptions,
  ): Promise<Resolution> {
    const request: OperationRequest = {
      action,
      requested_names: names,
      assume_yes: opts?.assumeYes === true,
      format: opts?.format ?? 'text',
      allow_beta: opts?.allowBeta === true || this.deps.allowBeta === true,
    };
    return this.mutate(action, names, (ctx) => resolveServiceOperation(request, ctx));
  }

  private mutate(
    action: OperationAction,
    names: ReadonlyArray<string>,
    resolve: (ctx: ResolutionContext) => Promise<Resolution>,
  ): Promise<Resolution> {
    return withLock(this.deps.lock, `pro ${action}`, async () => {
      const state = this.deps.store.read();
      const resolution = await resolve({
        catalog: this.deps.catalog,
        state,
        series: this.deps.series,
        handler: this.deps.handler,
        now: this.deps.now,
      });
      if (resolution.state !== state) {
        this.deps.store.write(resolution.state);
      }
      this.logger.record(action, names, resolution.result);
      return resolution;
    });
  }
}
