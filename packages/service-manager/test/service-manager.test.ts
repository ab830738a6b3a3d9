/**
 * Entitle Service Manager — ServiceManager Tests
 *
 *   SM-U1: attach → enable → disable → detach persists state at each step
 *   SM-U2: a blocked or no-op operation leaves the stored state untouched
 *   SM-U3: every mutating operation runs under the lock and logs one entry
 *   SM-U4: a held lock refuses the operation before state is read
 *   SM-U5: refresh re-reads the contract for the stored token
 *   SM-U6: config-level allowBeta applies to requests and status
 *   SM-U7: auto-attach records the instance and refuses a second run on it
 *
 * Isolation: MemoryStateIO, MemoryOperationLock and an in-memory contract
 * client. No filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { loadCatalog } from '@entitle/catalog';
import type { ContractClient, ContractInfo, InstanceToken } from '@entitle/kernel';
import { UNATTACHED_STATE } from '@entitle/kernel';
import { AttachmentStore, FileLogSink, LockHeldError, MemoryOperationLock, MemoryStateIO } from '@entitle/runtime-host';
import { ServiceManager, SystemServiceHandler } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

class MemoryContractClient implements ContractClient {
  readonly contracts = new Map<string, ContractInfo>();
  readonly lookups: string[] = [];

  async fetchContract(token: string): Promise<ContractInfo | null> {
    this.lookups.push(token);
    return this.contracts.get(token) ?? null;
  }
}

function setup(opts: { allowBeta?: boolean; inContainer?: boolean; instance?: InstanceToken } = {}) {
  const stateIO = new MemoryStateIO();
  const store = new AttachmentStore(stateIO);
  const lock = new MemoryOperationLock();
  const contracts = new MemoryContractClient();
  contracts.contracts.set('test-token', {
    contract_name: 'test-contract',
    entitlements: ['esm-apps', 'esm-infra', 'livepatch', 'fips-updates', 'realtime-kernel'],
  });
  const manager = new ServiceManager({
    catalog: loadCatalog(),
    store,
    handler: new SystemServiceHandler({ inContainer: opts.inContainer === true }),
    contracts,
    instance: { fetchInstanceToken: async () => opts.instance ?? null },
    lock,
    series: 'jammy',
    allowBeta: opts.allowBeta,
    logSink: new FileLogSink(stateIO, () => 'test-event-id'),
    now: () => '2026-01-01T00:00:00.000Z',
  });
  return { manager, store, stateIO, lock, contracts };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ServiceManager lifecycle', () => {
  it('SM-U1: persists state across attach, enable, disable and detach', async () => {
    const { manager, store } = setup();

    const attach = await manager.attach('test-token');
    expect(attach.result.processed_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(store.read().enabled_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(store.read().contract?.name).toBe('test-contract');

    const enable = await manager.enable(['fips-updates']);
    expect(enable.result.result).toBe('success');
    expect(enable.result.needs_reboot).toBe(true);
    expect(store.read().enabled_services).toEqual(['esm-apps', 'esm-infra', 'livepatch', 'fips-updates']);

    await manager.disable(['livepatch']);
    expect(store.read().enabled_services).toEqual(['esm-apps', 'esm-infra', 'fips-updates']);

    const detach = await manager.detach();
    expect(detach.result.processed_services).toEqual(['esm-apps', 'esm-infra', 'fips-updates']);
    expect(store.read()).toEqual(UNATTACHED_STATE);
  });

  it('SM-U1: container hosts refuse services without container support', async () => {
    const { manager, store } = setup({ inContainer: true });

    const attach = await manager.attach('test-token');
    expect(attach.result.processed_services).toEqual(['esm-apps', 'esm-infra']);
    expect(attach.result.failed_services).toEqual(['livepatch']);
    expect(attach.result.errors).toEqual([
      {
        message: 'Cannot install Livepatch on a container.',
        message_code: 'service-unsupported-in-container',
        service: 'livepatch',
        type: 'service',
      },
    ]);
    expect(store.read().attached).toBe(true);
  });

  it('SM-U2: an unattached enable writes nothing', async () => {
    const { manager, stateIO } = setup();

    const { result } = await manager.enable(['esm-infra']);

    expect(result.errors[0]?.message_code).toBe('valid-service-failure-unattached');
    expect(stateIO.readJson('attachment.json')).toBeUndefined();
  });

  it('SM-U3: logs one entry per operation and releases the lock', async () => {
    const { manager, stateIO, lock } = setup();

    await manager.enable(['bogus', 'bogus']);
    await manager.attach('wrong-token');

    expect(lock.history).toEqual(['pro enable', 'pro attach']);
    expect(lock.isHeld()).toBe(false);
    expect(stateIO.readLines('operations.jsonl')).toEqual([
      '{"event_id":"test-event-id","timestamp":"2026-01-01T00:00:00.000Z","action":"enable",' +
        '"requested_names":["bogus","bogus"],"result":"failure","processed_services":[],' +
        '"failed_services":[],"message_codes":["invalid-service-or-failure"],"needs_reboot":false}',
      '{"event_id":"test-event-id","timestamp":"2026-01-01T00:00:00.000Z","action":"attach",' +
        '"requested_names":[],"result":"failure","processed_services":[],' +
        '"failed_services":[],"message_codes":["attach-invalid-token"],"needs_reboot":false}',
    ]);
  });

  it('SM-U4: refuses to run while the lock is held', async () => {
    const { manager, lock, contracts } = setup();
    lock.acquire('pro detach');

    await expect(manager.attach('test-token')).rejects.toThrow(LockHeldError);
    expect(contracts.lookups).toEqual([]);
  });

  it('SM-U5: refresh uses the stored token', async () => {
    const { manager, store, contracts } = setup();
    await manager.attach('test-token');
    contracts.contracts.set('test-token', { contract_name: 'test-contract', entitlements: ['esm-infra'] });

    const { result } = await manager.refresh();

    expect(contracts.lookups).toEqual(['test-token', 'test-token']);
    expect(result.processed_services).toEqual(['esm-apps', 'livepatch']);
    expect(store.read().enabled_services).toEqual(['esm-infra']);
    expect(store.read().entitlements).toEqual(['esm-infra']);
  });

  it('SM-U6: allowBeta from config reaches requests and status', async () => {
    const { manager } = setup({ allowBeta: true });
    await manager.attach('test-token', { autoEnable: false });

    const { result } = await manager.enable(['realtime-kernel']);
    expect(result.processed_services).toEqual(['realtime-kernel']);
    expect(manager.status().services.map((s) => s.name)).toContain('realtime-kernel');
  });
});

describe('ServiceManager auto-attach', () => {
  it('SM-U7: attaches with the instance token and remembers the instance', async () => {
    const { manager, store } = setup({ instance: { instance_id: 'i-test-1', token: 'test-token' } });

    const first = await manager.autoAttach();
    expect(first.result.processed_services).toEqual(['esm-apps', 'esm-infra', 'livepatch']);
    expect(store.read().contract).toEqual({
      name: 'test-contract',
      token: 'test-token',
      attached_at: '2026-01-01T00:00:00.000Z',
      instance_id: 'i-test-1',
    });

    const before = store.read();
    const second = await manager.autoAttach();
    expect(second.result.errors.map((e) => e.message_code)).toEqual(['already-attached-on-instance']);
    expect(store.read()).toEqual(before);
  });

  it('SM-U7: without an instance token nothing is attached', async () => {
    const { manager, store } = setup();

    const { result } = await manager.autoAttach({ enable: ['esm-infra'] });

    expect(result.errors.map((e) => e.message_code)).toEqual(['unsupported-auto-attach']);
    expect(store.read()).toEqual(UNATTACHED_STATE);
  });
});

describe('ServiceManager read paths', () => {
  it('help and status take no lock', () => {
    const { manager, lock } = setup();
    lock.acquire('pro enable');

    expect(manager.help('esm-infra').available).toBe('yes');
    expect(manager.status().attached).toBe(false);
  });
});
