/**
 * Entitle Kernel — Resolver
 *
 * Entry points that turn a request plus the current AttachmentState into an
 * OperationResult and the next AttachmentState. Each follows the same
 * two-phase shape:
 *
 *   1. Precondition Gate — on block, return one batch error and the
 *      unchanged state
 *   2. Action Executor — per-service reducer over eligible names
 *
 * Given a deterministic handler, resolution is a pure function of its
 * inputs. State is returned, never written: persistence is the caller's job.
 * The returned state is the same object as the input when nothing changed.
 */

import type { ReleaseSeries, ServiceCatalog } from '@entitle/catalog';
import type { AttachmentState, ContractInfo, ContractRecord } from '../types/attachment.js';
import { UNATTACHED_STATE } from '../types/attachment.js';
import type { ServiceHandler } from '../types/handler.js';
import type { OperationRequest, OperationResult } from '../types/operation.js';
import { MessageCode, serviceEntry, systemEntry } from '../messages/templates.js';
import { checkLifecycleGate, checkServiceGate } from '../validation/gate.js';
import {
  dedupeNames,
  partitionServiceNames,
  validateRequest,
} from '../validation/request-validator.js';
import { ActionExecutor } from '../execution/executor.js';
import { ResultAggregator, blockedResult } from './aggregator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolutionContext {
  readonly catalog: ServiceCatalog;
  readonly state: AttachmentState;
  readonly series: ReleaseSeries;
  readonly handler: ServiceHandler;
  /** Clock used for attach timestamps. Default: current time. */
  readonly now?: (() => string) | undefined;
}

export interface Resolution {
  readonly result: OperationResult;
  readonly state: AttachmentState;
}

export interface AttachOptions {
  readonly token: string;
  /** Enable the catalog's default services after attaching. Default: true. */
  readonly autoEnable?: boolean | undefined;
}

// ---------------------------------------------------------------------------
// enable / disable
// ---------------------------------------------------------------------------

/**
 * Resolve a batch enable/disable request.
 *
 * @throws {RequestValidationError} When the request names no services
 */
export async function resolveServiceOperation(
  request: OperationRequest,
  ctx: ResolutionContext,
): Promise<Resolution> {
  validateRequest(request);

  const names = dedupeNames(request.requested_names);
  const partition = partitionServiceNames(names, ctx.catalog, { allowBeta: request.allow_beta });

  const verdict = checkServiceGate(request.action, ctx.state, partition);
  if (!verdict.proceed) {
    return { result: blockedResult(verdict.error), state: ctx.state };
  }

  const aggregator = new ResultAggregator();
  const executor = makeExecutor(ctx, ctx.state, aggregator, request.assume_yes);
  await executor.run(request.action, partition);
  return { result: aggregator.build(), state: executor.state() };
}

// ---------------------------------------------------------------------------
// attach
// ---------------------------------------------------------------------------

/**
 * Attach the machine to `contract` (looked up by the caller from the token).
 *
 * A null contract means the token was not recognised. On success the
 * default services that are entitled and available are enabled; they form
 * the result's processed/failed lists.
 */
export async function resolveAttach(
  opts: AttachOptions,
  contract: ContractInfo | null,
  ctx: ResolutionContext,
): Promise<Resolution> {
  const verdict = checkLifecycleGate('attach', ctx.state);
  if (!verdict.proceed) {
    return { result: blockedResult(verdict.error), state: ctx.state };
  }
  if (contract === null) {
    return { result: blockedResult(systemEntry(MessageCode.AttachInvalidToken, {})), state: ctx.state };
  }

  const attached = attachedState(contract, opts.token, ctx);
  const aggregator = new ResultAggregator();
  const executor = makeExecutor(ctx, attached, aggregator, true);
  if (opts.autoEnable !== false) {
    await enableDefaults(executor, ctx);
  }
  return { result: aggregator.build(), state: executor.state() };
}

/** The state of a machine freshly attached to `contract`, nothing enabled. */
export function attachedState(
  contract: ContractInfo,
  token: string,
  ctx: ResolutionContext,
  instanceId?: string,
): AttachmentState {
  const now = ctx.now ?? (() => new Date().toISOString());
  const record: ContractRecord = { name: contract.contract_name, token, attached_at: now() };
  return {
    attached: true,
    entitlements: [...contract.entitlements],
    enabled_services: [],
    contract: instanceId === undefined ? record : { ...record, instance_id: instanceId },
  };
}

/** Enable the catalog defaults the new contract grants, in enable order. */
export async function enableDefaults(executor: ActionExecutor, ctx: ResolutionContext): Promise<void> {
  const defaults = ctx.catalog
    .defaultEnabled()
    .filter((n) => executor.isEntitled(n) && ctx.catalog.isAvailable(n, ctx.series));
  for (const name of ctx.catalog.enableOrder(defaults)) {
    await executor.enable(name);
  }
}

// ---------------------------------------------------------------------------
// detach
// ---------------------------------------------------------------------------

/**
 * Disable every enabled service (dependents first) and reset to unattached.
 *
 * The machine is detached even when a service fails to disable; the failure
 * is reported in the result.
 */
export async function resolveDetach(ctx: ResolutionContext): Promise<Resolution> {
  const verdict = checkLifecycleGate('detach', ctx.state);
  if (!verdict.proceed) {
    return { result: blockedResult(verdict.error), state: ctx.state };
  }

  const aggregator = new ResultAggregator();
  const executor = makeExecutor(ctx, ctx.state, aggregator, true);
  const enabled = ctx.state.enabled_services.filter((n) => ctx.catalog.has(n));
  for (const name of ctx.catalog.disableOrder(enabled)) {
    await executor.disable(name);
  }
  return { result: aggregator.build(), state: UNATTACHED_STATE };
}

// ---------------------------------------------------------------------------
// refresh
// ---------------------------------------------------------------------------

/**
 * Apply a freshly fetched contract to an attached machine.
 *
 * A null contract means the stored token no longer resolves. Enabled
 * services the new contract does not grant are disabled, each with a
 * warning.
 */
export async function resolveRefresh(
  contract: ContractInfo | null,
  ctx: ResolutionContext,
): Promise<Resolution> {
  const verdict = checkLifecycleGate('refresh', ctx.state);
  if (!verdict.proceed) {
    return { result: blockedResult(verdict.error), state: ctx.state };
  }
  if (contract === null) {
    return {
      result: blockedResult(systemEntry(MessageCode.RefreshContractFailure, {})),
      state: ctx.state,
    };
  }

  const aggregator = new ResultAggregator();
  const executor = makeExecutor(ctx, ctx.state, aggregator, true);
  const lost = ctx.state.enabled_services.filter(
    (n) => ctx.catalog.has(n) && !contract.entitlements.includes(n),
  );
  for (const name of ctx.catalog.disableOrder(lost)) {
    const def = ctx.catalog.get(name);
    if (def === undefined || !executor.isEnabled(name)) continue;
    aggregator.addWarning(
      serviceEntry(name, MessageCode.ServiceNoLongerEntitled, { title: def.title }),
    );
    await executor.disable(name);
  }

  const after = executor.state();
  const previous = ctx.state.contract;
  return {
    result: aggregator.build(),
    state: {
      ...after,
      entitlements: [...contract.entitlements],
      contract: previous === null ? null : { ...previous, name: contract.contract_name },
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function makeExecutor(
  ctx: ResolutionContext,
  state: AttachmentState,
  aggregator: ResultAggregator,
  assumeYes: boolean,
): ActionExecutor {
  return new ActionExecutor(
    { catalog: ctx.catalog, handler: ctx.handler, series: ctx.series, assumeYes },
    state,
    aggregator,
  );
}
