/**
 * Entitle Runtime Host — File Instance Token Provider
 *
 * Offline InstanceTokenProvider. Cloud images that support auto-attach get
 * an identity file with the instance id and the token issued for it:
 *
 *   { "instance_id": "...", "token": "..." }
 *
 * No file, or one without both fields, means the image does not support
 * auto-attach.
 */

import { readFile } from 'node:fs/promises';
import type { InstanceToken, InstanceTokenProvider } from '@entitle/kernel';
import { isNodeError } from '../state/state-io.js';

export class FileInstanceTokenProvider implements InstanceTokenProvider {
  constructor(private readonly path: string) {}

  /**
   * @throws {SyntaxError} If the identity file is not valid JSON
   * @throws I/O errors other than ENOENT
   */
  async fetchInstanceToken(): Promise<InstanceToken | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return null;
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
    const instanceId = 'instance_id' in parsed ? parsed.instance_id : undefined;
    const token = 'token' in parsed ? parsed.token : undefined;
    if (typeof instanceId !== 'string' || instanceId === '' || typeof token !== 'string' || token === '') {
      return null;
    }
    return { instance_id: instanceId, token };
  }
}
