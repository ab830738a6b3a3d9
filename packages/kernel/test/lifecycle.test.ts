/**
 * Entitle Kernel — Attach / Detach / Refresh Tests
 *
 *   LIFE-U1: attach records the contract and enables entitled defaults
 *   LIFE-U2: attach skips defaults unavailable on the series, or all with autoEnable off
 *   LIFE-U3: attach is blocked when attached or when the token is unknown
 *   LIFE-U4: detach disables dependents first and resets state
 *   LIFE-U5: detach and refresh are blocked when unattached
 *   LIFE-U6: refresh disables services the contract no longer grants
 *   LIFE-U7: refresh fails when the contract cannot be fetched
 *   LIFE-U8: auto-attach needs an instance token from the image
 *   LIFE-U9: auto-attach is a no-op error on the instance it attached on
 *   LIFE-U10: auto-attach on a new instance detaches and re-attaches
 *   LIFE-U11: auto-attach without lists enables the defaults
 *   LIFE-U12: beta names belong in the beta list
 *   LIFE-U13: unknown names are reported after the known ones are enabled
 *   LIFE-U14: handler failures are retried; later rounds skip settled names
 *   LIFE-U15: exhausted retries end in full-auto-attach-error
 *   LIFE-U16: check failures are not retried
 */

import { describe, it, expect } from 'vitest';
import type { ServiceDefinition } from '@entitle/catalog';
import type {
  AttachmentState,
  AutoAttachSources,
  ContractInfo,
  HandlerOutcome,
  InstanceToken,
} from '../src/index.js';
import {
  UNATTACHED_STATE,
  resolveAttach,
  resolveAutoAttach,
  resolveDetach,
  resolveRefresh,
} from '../src/index.js';
import { FIXED_NOW, RecordingHandler, attachedState, makeContext } from './fixtures.js';

const CONTRACT: ContractInfo = {
  contract_name: 'test-contract',
  entitlements: ['esm-apps', 'esm-infra', 'livepatch', 'fips'],
};

describe('resolveAttach', () => {
  it('LIFE-U1: attaches and enables entitled default services', async () => {
    const handler = new RecordingHandler();
    const { result, state } = await resolveAttach(
      { token: 'test-token' },
      CONTRACT,
      makeContext(UNATTACHED_STATE, 'jammy', handler),
    );

    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(state).toEqual({
      attached: true,
      entitlements: ['esm-apps', 'esm-infra', 'livepatch', 'fips'],
      enabled_services: ['esm-apps', 'esm-infra', 'livepatch'],
      contract: { name: 'test-contract', token: 'test-token', attached_at: '2026-01-01T00:00:00.000Z' },
    });
    expect(handler.calls).toEqual(['enable:esm-apps', 'enable:esm-infra', 'enable:livepatch']);
  });

  it('LIFE-U2: skips defaults unavailable on the series', async () => {
    const { result } = await resolveAttach({ token: 'test-token' }, CONTRACT, makeContext(UNATTACHED_STATE, 'noble'));
    expect(result.processed_services).toEqual(['esm-apps', 'livepatch']);
  });

  it('LIFE-U2: enables nothing with autoEnable off', async () => {
    const { result, state } = await resolveAttach(
      { token: 'test-token', autoEnable: false },
      CONTRACT,
      makeContext(),
    );
    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual([]);
    expect(state.attached).toBe(true);
    expect(state.enabled_services).toEqual([]);
  });

  it('LIFE-U3: is blocked on an attached machine', async () => {
    const ctx = makeContext(attachedState());
    const { result, state } = await resolveAttach({ token: 'test-token' }, CONTRACT, ctx);

    expect(result.errors).toEqual([
      {
        message:
          "This machine is already attached to 'test-contract'\n" +
          'To use a different subscription first run: sudo pro detach.',
        message_code: 'already-attached',
        service: null,
        type: 'system',
      },
    ]);
    expect(state).toBe(ctx.state);
  });

  it('LIFE-U3: rejects an unknown token', async () => {
    const ctx = makeContext();
    const { result, state } = await resolveAttach({ token: 'bad-token' }, null, ctx);

    expect(result.result).toBe('failure');
    expect(result.errors.map((e) => e.message_code)).toEqual(['attach-invalid-token']);
    expect(state).toBe(ctx.state);
  });
});

describe('resolveDetach', () => {
  it('LIFE-U4: disables dependents first and resets the state', async () => {
    const handler = new RecordingHandler();
    const { result, state } = await resolveDetach(
      makeContext(attachedState(['esm-apps', 'esm-infra', 'ros']), 'focal', handler),
    );

    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual(['ros', 'esm-apps', 'esm-infra']);
    expect(handler.calls).toEqual(['disable:ros', 'disable:esm-apps', 'disable:esm-infra']);
    expect(state).toEqual(UNATTACHED_STATE);
  });

  it('LIFE-U4: still detaches when a service fails to disable', async () => {
    const handler = new RecordingHandler(new Set(['esm-infra']));
    const { result, state } = await resolveDetach(
      makeContext(attachedState(['esm-infra']), 'jammy', handler),
    );

    expect(result.failed_services).toEqual(['esm-infra']);
    expect(state.attached).toBe(false);
  });

  it('LIFE-U5: is blocked on an unattached machine', async () => {
    const { result } = await resolveDetach(makeContext());
    expect(result.errors).toEqual([
      {
        message: 'This machine is not attached to an Ubuntu Pro subscription.\nSee https://ubuntu.com/pro',
        message_code: 'unattached',
        service: null,
        type: 'system',
      },
    ]);
  });
});

describe('resolveRefresh', () => {
  it('LIFE-U6: disables services no longer granted', async () => {
    const { result, state } = await resolveRefresh(
      { contract_name: 'renamed-contract', entitlements: ['esm-apps', 'esm-infra'] },
      makeContext(attachedState(['esm-apps', 'esm-infra', 'ros']), 'focal'),
    );

    expect(result.processed_services).toEqual(['ros']);
    expect(result.warnings).toEqual([
      {
        message: 'ROS ESM Security Updates is no longer included in your subscription and was disabled.',
        message_code: 'service-no-longer-entitled',
        service: 'ros',
        type: 'service',
      },
    ]);
    expect(state.entitlements).toEqual(['esm-apps', 'esm-infra']);
    expect(state.enabled_services).toEqual(['esm-apps', 'esm-infra']);
    expect(state.contract).toEqual({
      name: 'renamed-contract',
      token: 'test-token',
      attached_at: '2026-01-01T00:00:00.000Z',
    });
  });

  it('LIFE-U6: disables enabled dependents of a service no longer granted', async () => {
    const { result, state } = await resolveRefresh(
      { contract_name: 'test-contract', entitlements: ['esm-infra', 'ros'] },
      makeContext(attachedState(['esm-apps', 'esm-infra', 'ros']), 'focal'),
    );

    expect(result.processed_services).toEqual(['esm-apps']);
    expect(result.warnings.map((w) => w.message_code)).toEqual([
      'service-no-longer-entitled',
      'disabling-dependent-service',
    ]);
    expect(state.enabled_services).toEqual(['esm-infra']);
  });

  it('LIFE-U5: is blocked on an unattached machine', async () => {
    const { result } = await resolveRefresh(CONTRACT, makeContext());
    expect(result.errors.map((e) => e.message_code)).toEqual(['unattached']);
  });

  it('LIFE-U7: fails when the contract cannot be fetched', async () => {
    const ctx = makeContext(attachedState());
    const { result, state } = await resolveRefresh(null, ctx);

    expect(result.errors).toEqual([
      {
        message: 'Unable to refresh your subscription',
        message_code: 'refresh-contract-failure',
        service: null,
        type: 'system',
      },
    ]);
    expect(state).toBe(ctx.state);
  });
});

// ---------------------------------------------------------------------------
// auto-attach
// ---------------------------------------------------------------------------

const INSTANCE: InstanceToken = { instance_id: 'i-test-1', token: 'instance-token' };

const INSTANCE_CONTRACT: ContractInfo = {
  contract_name: 'test-contract',
  entitlements: ['esm-apps', 'esm-infra', 'livepatch', 'fips-updates', 'realtime-kernel'],
};

function sources(instance: InstanceToken | null = INSTANCE): AutoAttachSources {
  return {
    instance: { fetchInstanceToken: async () => instance },
    contracts: {
      fetchContract: async (token) => (token === 'instance-token' ? INSTANCE_CONTRACT : null),
    },
  };
}

function attachedOn(instanceId: string, enabled: ReadonlyArray<string> = []): AttachmentState {
  return {
    ...attachedState(enabled),
    contract: { name: 'test-contract', token: 'test-token', attached_at: FIXED_NOW(), instance_id: instanceId },
  };
}

/** Fails the first `failures` enable calls for `name`, then succeeds. */
class FlakyHandler extends RecordingHandler {
  private remaining: number;

  constructor(
    private readonly name: string,
    failures: number,
  ) {
    super();
    this.remaining = failures;
  }

  override async enable(service: ServiceDefinition): Promise<HandlerOutcome> {
    const outcome = await super.enable(service);
    if (service.name === this.name && this.remaining > 0) {
      this.remaining--;
      return { ok: false, message: `failed ${service.name}`, message_code: 'test-handler-failure' };
    }
    return outcome;
  }
}

describe('resolveAutoAttach', () => {
  it('LIFE-U8: an image without instance support is refused', async () => {
    const ctx = makeContext();
    const { result, state } = await resolveAutoAttach({}, sources(null), ctx);

    expect(result.errors).toEqual([
      {
        message: 'Auto-attach image support is not available on this image\nSee: https://ubuntu.com/pro',
        message_code: 'unsupported-auto-attach',
        service: null,
        type: 'system',
      },
    ]);
    expect(state).toBe(ctx.state);
  });

  it('LIFE-U8: an attached machine without an instance token stays attached', async () => {
    const ctx = makeContext(attachedState());
    const { result, state } = await resolveAutoAttach({}, sources(null), ctx);

    expect(result.errors.map((e) => e.message_code)).toEqual(['already-attached']);
    expect(state).toBe(ctx.state);
  });

  it('LIFE-U9: is blocked when attached on the same instance', async () => {
    const handler = new RecordingHandler();
    const ctx = makeContext(attachedOn('i-test-1', ['esm-infra']), 'jammy', handler);
    const { result, state } = await resolveAutoAttach({}, sources(), ctx);

    expect(result.errors).toEqual([
      {
        message: "Skipping attach: Instance 'i-test-1' is already attached.",
        message_code: 'already-attached-on-instance',
        service: null,
        type: 'system',
      },
    ]);
    expect(state).toBe(ctx.state);
    expect(handler.calls).toEqual([]);
  });

  it('LIFE-U10: detaches from the old instance before attaching', async () => {
    const handler = new RecordingHandler();
    const { result, state } = await resolveAutoAttach(
      {},
      sources(),
      makeContext(attachedOn('i-old', ['esm-infra']), 'jammy', handler),
    );

    expect(handler.calls).toEqual(['disable:esm-infra', 'enable:esm-apps', 'enable:esm-infra', 'enable:livepatch']);
    expect(result.result).toBe('success');
    expect(result.warnings).toEqual([
      {
        message: 'Re-attaching Ubuntu Pro subscription on new instance',
        message_code: 'reattaching-on-new-instance',
        service: null,
        type: 'system',
      },
    ]);
    expect(state.contract).toEqual({
      name: 'test-contract',
      token: 'instance-token',
      attached_at: '2026-01-01T00:00:00.000Z',
      instance_id: 'i-test-1',
    });
  });

  it('LIFE-U10: a failed detach stops the re-attach', async () => {
    const handler = new RecordingHandler(new Set(['esm-infra']));
    const { result, state } = await resolveAutoAttach(
      {},
      sources(),
      makeContext(attachedOn('i-old', ['esm-infra']), 'jammy', handler),
    );

    expect(result.errors.map((e) => e.message_code)).toEqual(['detach-automation-failure']);
    expect(handler.calls).toEqual(['disable:esm-infra']);
    expect(state).toEqual(UNATTACHED_STATE);
  });

  it('LIFE-U11: enables the entitled defaults without lists', async () => {
    const { result, state } = await resolveAutoAttach({}, sources(), makeContext());

    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(state.enabled_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(state.contract?.instance_id).toBe('i-test-1');
  });

  it('LIFE-U12: a beta name in the enable list fails after attaching', async () => {
    const handler = new RecordingHandler();
    const { result, state } = await resolveAutoAttach(
      { enable: ['esm-infra', 'realtime-kernel'] },
      sources(),
      makeContext(UNATTACHED_STATE, 'jammy', handler),
    );

    expect(result.errors).toEqual([
      {
        message: 'Beta services cannot be in the enable list: realtime-kernel\nUse the beta list instead.',
        message_code: 'beta-service-found',
        service: null,
        type: 'system',
      },
    ]);
    expect(handler.calls).toEqual([]);
    expect(state.attached).toBe(true);
    expect(state.enabled_services).toEqual([]);
  });

  it('LIFE-U12: the beta list enables beta services', async () => {
    const { result, state } = await resolveAutoAttach(
      { enable: ['esm-infra'], enableBeta: ['realtime-kernel'] },
      sources(),
      makeContext(),
    );

    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual(['esm-infra', 'realtime-kernel']);
    expect(result.needs_reboot).toBe(true);
    expect(state.enabled_services).toEqual(['esm-infra', 'realtime-kernel']);
  });

  it('LIFE-U13: enables the known names, then reports the unknown ones', async () => {
    const handler = new RecordingHandler();
    const { result, state } = await resolveAutoAttach(
      { enable: ['esm-infra', 'not-a-service', 'livepatch'] },
      sources(),
      makeContext(UNATTACHED_STATE, 'jammy', handler),
    );

    expect(handler.calls).toEqual(['enable:esm-infra', 'enable:livepatch']);
    expect(result.result).toBe('failure');
    expect(result.processed_services).toEqual(['esm-infra', 'livepatch']);
    expect(result.errors).toEqual([
      {
        message: "Cannot enable unknown service 'not-a-service'.\nSee https://ubuntu.com/pro",
        message_code: 'invalid-service-or-failure',
        service: null,
        type: 'system',
      },
    ]);
    expect(state.enabled_services).toEqual(['esm-infra', 'livepatch']);
  });

  it('LIFE-U14: retries a handler failure and skips names already enabled', async () => {
    const handler = new FlakyHandler('livepatch', 2);
    const { result, state } = await resolveAutoAttach(
      { enable: ['esm-infra', 'livepatch'] },
      sources(),
      makeContext(UNATTACHED_STATE, 'jammy', handler),
    );

    expect(handler.calls).toEqual([
      'enable:esm-infra',
      'enable:livepatch',
      'enable:livepatch',
      'enable:livepatch',
    ]);
    expect(result.result).toBe('success');
    expect(result.processed_services).toEqual(['esm-infra', 'livepatch']);
    expect(result.failed_services).toEqual([]);
    expect(result.errors).toEqual([]);
    expect(state.enabled_services).toEqual(['esm-infra', 'livepatch']);
  });

  it('LIFE-U15: gives up after the configured number of rounds', async () => {
    const handler = new FlakyHandler('livepatch', 5);
    const { result, state } = await resolveAutoAttach(
      { enable: ['esm-infra', 'livepatch'], retries: 2 },
      sources(),
      makeContext(UNATTACHED_STATE, 'jammy', handler),
    );

    expect(handler.calls).toEqual(['enable:esm-infra', 'enable:livepatch', 'enable:livepatch']);
    expect(result.processed_services).toEqual(['esm-infra']);
    expect(result.failed_services).toEqual(['livepatch']);
    expect(result.errors).toEqual([
      {
        message: 'failed livepatch',
        message_code: 'test-handler-failure',
        service: 'livepatch',
        type: 'service',
      },
      {
        message: 'Auto-attach could not enable every requested service after 2 attempts.',
        message_code: 'full-auto-attach-error',
        service: null,
        type: 'system',
      },
    ]);
    expect(state.enabled_services).toEqual(['esm-infra']);
  });

  it('LIFE-U16: a service the contract does not grant fails once', async () => {
    const handler = new RecordingHandler();
    const { result } = await resolveAutoAttach(
      { enable: ['cis'] },
      sources(),
      makeContext(UNATTACHED_STATE, 'focal', handler),
    );

    expect(handler.calls).toEqual([]);
    expect(result.failed_services).toEqual(['cis']);
    expect(result.errors.map((e) => e.message_code)).toEqual(['subscription-not-entitled-to-service']);
  });
});
