/**
 * Entitle Runtime Host — Operation Lock Tests
 *
 *   LCK-U1: acquire writes the holder; release removes the file
 *   LCK-U2: a second acquire while held by a live process throws LockHeldError
 *   LCK-U3: a lock held by a dead process is replaced
 *   LCK-U4: withLock releases after success and after failure
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FileOperationLock,
  LockHeldError,
  MemoryOperationLock,
  withLock,
} from '../src/lock/operation-lock.js';

const NOW = (): string => '2026-01-01T00:00:00.000Z';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'entitle-lock-'));
}

describe('FileOperationLock', () => {
  it('LCK-U1: writes the holder and removes it on release', () => {
    const home = tempHome();
    const lock = new FileOperationLock(home, process.pid, NOW);

    lock.acquire('pro enable');
    expect(JSON.parse(readFileSync(join(home, 'lock'), 'utf-8'))).toEqual({
      pid: process.pid,
      command: 'pro enable',
      acquired_at: '2026-01-01T00:00:00.000Z',
    });

    lock.release();
    expect(existsSync(join(home, 'lock'))).toBe(false);
  });

  it('LCK-U2: refuses a lock held by a live process', () => {
    const home = tempHome();
    const first = new FileOperationLock(home, process.pid, NOW);
    const second = new FileOperationLock(home, process.pid, NOW);
    first.acquire('pro attach');

    expect(() => second.acquire('pro enable')).toThrow(LockHeldError);
    expect(() => second.acquire('pro enable')).toThrow(
      `Unable to perform: pro enable.\nOperation in progress: pro attach (pid: ${process.pid})`,
    );

    // The refused lock must not remove the holder's file.
    second.release();
    expect(existsSync(join(home, 'lock'))).toBe(true);
    first.release();
  });

  it('LCK-U3: replaces a stale lock', () => {
    const home = tempHome();
    // PIDs are bounded well below this value on Linux.
    writeFileSync(
      join(home, 'lock'),
      JSON.stringify({ pid: 2 ** 30, command: 'pro detach', acquired_at: NOW() }),
      'utf-8',
    );

    const lock = new FileOperationLock(home, process.pid, NOW);
    lock.acquire('pro enable');
    expect(JSON.parse(readFileSync(join(home, 'lock'), 'utf-8'))).toMatchObject({ command: 'pro enable' });
    lock.release();
  });
});

describe('withLock', () => {
  it('LCK-U4: releases after success', async () => {
    const lock = new MemoryOperationLock();
    await expect(withLock(lock, 'pro enable', async () => 42)).resolves.toBe(42);
    expect(lock.isHeld()).toBe(false);
    expect(lock.history).toEqual(['pro enable']);
  });

  it('LCK-U4: releases after failure', async () => {
    const lock = new MemoryOperationLock();
    await expect(
      withLock(lock, 'pro enable', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(lock.isHeld()).toBe(false);
  });

  it('LCK-U2: MemoryOperationLock refuses a second holder', () => {
    const lock = new MemoryOperationLock();
    lock.acquire('pro attach');
    expect(() => lock.acquire('pro enable')).toThrow(LockHeldError);
  });
});
