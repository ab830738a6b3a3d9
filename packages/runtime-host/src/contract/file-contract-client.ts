/**
 * Entitle Runtime Host — File Contract Client
 *
 * Offline ContractClient backed by a JSON file of known tokens:
 *
 *   {
 *     "tokens": {
 *       "<token>": { "contract_name": "...", "entitlements": ["esm-infra", ...] }
 *     }
 *   }
 *
 * The file is read on every lookup so refresh picks up edits. A missing
 * file or an unknown token resolves to null.
 */

import { readFile } from 'node:fs/promises';
import type { ContractClient, ContractInfo } from '@entitle/kernel';
import { isNodeError } from '../state/state-io.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export class FileContractClient implements ContractClient {
  constructor(private readonly path: string) {}

  /**
   * @throws {SyntaxError} If the contract file is not valid JSON
   * @throws I/O errors other than ENOENT
   */
  async fetchContract(token: string): Promise<ContractInfo | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return null;
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) return null;
    const tokens = parsed['tokens'];
    if (!isRecord(tokens) || !Object.prototype.hasOwnProperty.call(tokens, token)) return null;

    const entry = tokens[token];
    if (!isRecord(entry)) return null;
    const { contract_name: name, entitlements } = entry;
    if (typeof name !== 'string' || !isStringArray(entitlements)) return null;
    return { contract_name: name, entitlements: [...entitlements] };
  }
}
