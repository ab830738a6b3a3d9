/**
 * Entitle Kernel — Auto-attach
 *
 * Attaches a cloud instance using the token its identity provides, then
 * enables either the catalog defaults or an explicit list of services.
 *
 *   1. Instance token: null means the image does not support auto-attach
 *   2. Instance check: attached on the same instance is a no-op error;
 *      attached on a different instance detaches first
 *   3. Attach with the contract behind the instance token
 *   4. Enable rounds: services whose handler failed are retried, up to
 *      `retries` rounds in total
 *
 * Beta services must come through `enableBeta`; naming one in `enable`
 * fails the request after attaching, with nothing enabled.
 */

import type { ContractClient, InstanceTokenProvider } from '../types/handler.js';
import { ResultStatus, ServiceOutcomeStatus } from '../types/operation.js';
import { MessageCode, systemEntry } from '../messages/templates.js';
import { dedupeNames, partitionServiceNames } from '../validation/request-validator.js';
import { ResultAggregator, blockedResult } from './aggregator.js';
import type { Resolution, ResolutionContext } from './resolver.js';
import { attachedState, enableDefaults, makeExecutor, resolveDetach } from './resolver.js';

export const DEFAULT_AUTO_ATTACH_RETRIES = 3;

export interface AutoAttachOptions {
  /** Non-beta services to enable instead of the catalog defaults. */
  readonly enable?: ReadonlyArray<string> | undefined;
  /** Beta services to enable. */
  readonly enableBeta?: ReadonlyArray<string> | undefined;
  /** Enable rounds before giving up. Default: DEFAULT_AUTO_ATTACH_RETRIES. */
  readonly retries?: number | undefined;
}

export interface AutoAttachSources {
  readonly instance: InstanceTokenProvider;
  readonly contracts: ContractClient;
}

export async function resolveAutoAttach(
  opts: AutoAttachOptions,
  sources: AutoAttachSources,
  ctx: ResolutionContext,
): Promise<Resolution> {
  const instance = await sources.instance.fetchInstanceToken();
  if (instance === null) {
    const error = ctx.state.attached
      ? systemEntry(MessageCode.AlreadyAttached, { contract: ctx.state.contract?.name ?? '' })
      : systemEntry(MessageCode.UnsupportedAutoAttach, {});
    return { result: blockedResult(error), state: ctx.state };
  }

  const aggregator = new ResultAggregator();
  let base = ctx.state;
  if (ctx.state.attached) {
    if (ctx.state.contract?.instance_id === instance.instance_id) {
      return {
        result: blockedResult(
          systemEntry(MessageCode.AlreadyAttachedOnInstance, { instanceId: instance.instance_id }),
        ),
        state: ctx.state,
      };
    }
    const detached = await resolveDetach(ctx);
    if (detached.result.result === ResultStatus.Failure) {
      return {
        result: blockedResult(systemEntry(MessageCode.DetachAutomationFailure, {})),
        state: detached.state,
      };
    }
    aggregator.addWarning(systemEntry(MessageCode.ReattachingOnNewInstance, {}));
    base = detached.state;
  }

  const contract = await sources.contracts.fetchContract(instance.token);
  if (contract === null) {
    aggregator.addError(systemEntry(MessageCode.AttachInvalidToken, {}));
    return { result: aggregator.build(), state: base };
  }
  let state = attachedState(contract, instance.token, ctx, instance.instance_id);

  const enable = opts.enable ?? [];
  const enableBeta = opts.enableBeta ?? [];
  if (enable.length === 0 && enableBeta.length === 0) {
    const executor = makeExecutor(ctx, state, aggregator, true);
    await enableDefaults(executor, ctx);
    return { result: aggregator.build(), state: executor.state() };
  }

  const beta = enable.filter((name) => ctx.catalog.get(name)?.is_beta === true);
  if (beta.length > 0) {
    aggregator.addError(systemEntry(MessageCode.BetaServiceFound, { names: beta }));
    return { result: aggregator.build(), state };
  }

  const names = dedupeNames([...enable, ...enableBeta]);
  const { known, unknown } = partitionServiceNames(names, ctx.catalog, { allowBeta: true });
  const limit = Math.max(1, opts.retries ?? DEFAULT_AUTO_ATTACH_RETRIES);
  const settled = new Set<string>();

  for (let round = 1; ; round++) {
    const roundResult = new ResultAggregator();
    const executor = makeExecutor(ctx, state, roundResult, true);
    for (const name of known) {
      if (settled.has(name)) {
        roundResult.skip(name);
      } else {
        await executor.enable(name);
      }
    }
    state = executor.state();
    for (const outcome of roundResult.serviceOutcomes()) {
      if (outcome.status === ServiceOutcomeStatus.Success) settled.add(outcome.service_name);
    }

    const failed = roundResult
      .serviceOutcomes()
      .filter((o) => o.status === ServiceOutcomeStatus.Failure)
      .map((o) => o.service_name);
    const retryable =
      unknown.length === 0 && failed.length > 0 && failed.every((n) => executor.failedInHandler(n));

    if (retryable && round < limit) {
      aggregator.absorb(roundResult, false);
      continue;
    }

    aggregator.absorb(roundResult, true);
    if (unknown.length > 0) {
      aggregator.addError(
        systemEntry(MessageCode.InvalidServiceOrFailure, { action: 'enable', names: unknown }),
      );
    }
    if (retryable) {
      aggregator.addError(systemEntry(MessageCode.FullAutoAttachError, { attempts: limit }));
    }
    return { result: aggregator.build(), state };
  }
}
