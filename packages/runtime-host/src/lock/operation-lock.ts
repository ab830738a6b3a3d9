/**
 * Entitle Runtime Host — Operation Lock
 *
 * At most one mutating command may run against the persisted state at a
 * time. The lock is a file `<PRO_HOME>/lock` created with exclusive-create
 * and holding `{ pid, command, acquired_at }`.
 *
 * A lock left behind by a process that no longer exists is stale and is
 * replaced.
 */

import { readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { EntitleError, MessageCode, formatMessage } from '@entitle/kernel';
import { isNodeError } from '../state/state-io.js';

export const LOCK_FILENAME = 'lock';

/** Contents of a held lock. */
export interface LockHolder {
  readonly pid: number;
  readonly command: string;
  readonly acquired_at: string;
}

/** Another invocation holds the lock. */
export class LockHeldError extends EntitleError {
  readonly holder: LockHolder;

  constructor(request: string, holder: LockHolder) {
    super(
      MessageCode.LockHeld,
      formatMessage(MessageCode.LockHeld, { request, holder: holder.command, pid: holder.pid }),
    );
    this.holder = holder;
    this.name = 'LockHeldError';
  }
}

export interface OperationLock {
  /** @throws {LockHeldError} If another live process holds the lock */
  acquire(command: string): void;
  release(): void;
}

/**
 * Run `fn` while holding the lock. The lock is released in a finally block
 * regardless of outcome.
 */
export async function withLock<T>(lock: OperationLock, command: string, fn: () => Promise<T>): Promise<T> {
  lock.acquire(command);
  try {
    return await fn();
  } finally {
    lock.release();
  }
}

// ---------------------------------------------------------------------------
// FileOperationLock
// ---------------------------------------------------------------------------

function parseHolder(raw: string): LockHolder | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return null;
    const pid = 'pid' in parsed ? parsed.pid : undefined;
    const command = 'command' in parsed ? parsed.command : undefined;
    const acquiredAt = 'acquired_at' in parsed ? parsed.acquired_at : undefined;
    if (typeof pid !== 'number' || typeof command !== 'string' || typeof acquiredAt !== 'string') {
      return null;
    }
    return { pid, command, acquired_at: acquiredAt };
  } catch {
    return null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM: the process exists but belongs to another user.
    return isNodeError(err, 'EPERM');
  }
}

export class FileOperationLock implements OperationLock {
  private readonly path: string;
  private held = false;

  constructor(
    homeDir: string,
    private readonly pid: number = process.pid,
    private readonly now: () => string = () => new Date().toISOString(),
  ) {
    this.path = join(homeDir, LOCK_FILENAME);
  }

  acquire(command: string): void {
    if (this.tryCreate(command)) return;

    const holder = this.readHolder();
    if (holder !== null && isProcessAlive(holder.pid)) {
      throw new LockHeldError(command, holder);
    }
    // Stale or unreadable lock.
    rmSync(this.path, { force: true });
    if (!this.tryCreate(command)) {
      const current = this.readHolder();
      throw new LockHeldError(command, current ?? { pid: -1, command: 'unknown', acquired_at: '' });
    }
  }

  release(): void {
    if (!this.held) return;
    rmSync(this.path, { force: true });
    this.held = false;
  }

  private tryCreate(command: string): boolean {
    const holder: LockHolder = { pid: this.pid, command, acquired_at: this.now() };
    try {
      writeFileSync(this.path, JSON.stringify(holder), { encoding: 'utf-8', flag: 'wx' });
    } catch (err: unknown) {
      if (isNodeError(err, 'EEXIST')) return false;
      throw err;
    }
    this.held = true;
    return true;
  }

  private readHolder(): LockHolder | null {
    try {
      return parseHolder(readFileSync(this.path, 'utf-8'));
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return null;
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryOperationLock
// ---------------------------------------------------------------------------

/** In-process lock for tests and embedded use. */
export class MemoryOperationLock implements OperationLock {
  private holder: LockHolder | null = null;
  readonly history: string[] = [];

  acquire(command: string): void {
    if (this.holder !== null) {
      throw new LockHeldError(command, this.holder);
    }
    this.holder = { pid: process.pid, command, acquired_at: new Date().toISOString() };
    this.history.push(command);
  }

  release(): void {
    this.holder = null;
  }

  isHeld(): boolean {
    return this.holder !== null;
  }
}
