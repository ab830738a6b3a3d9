/**
 * Entitle Runtime Host — PRO_HOME Resolution
 *
 * Resolves the directory that holds all persisted state using the following
 * precedence:
 *
 *   1. Explicit `proHome` option (e.g. from a --home CLI flag or a test)
 *   2. PRO_HOME environment variable
 *   3. Default: /var/lib/entitle
 *
 * Layout under the resolved home:
 *
 *   <PRO_HOME>/
 *     config.json          optional, see config.ts
 *     contracts.json       offline contract records, see file-contract-client.ts
 *     lock                 present while a mutating command runs
 *     state/attachment.json
 *     logs/operations.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';

export const DEFAULT_PRO_HOME = '/var/lib/entitle';

export interface ResolveProHomeOptions {
  /** Explicit override; highest precedence. */
  readonly proHome?: string | undefined;
  /** Environment to read PRO_HOME from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the home directory and create it if it does not exist.
 *
 * @returns The resolved home directory path
 */
export function resolveProHome(opts?: ResolveProHomeOptions): string {
  const env = opts?.env ?? process.env;
  let proHome: string;

  if (typeof opts?.proHome === 'string' && opts.proHome !== '') {
    proHome = opts.proHome;
  } else if (typeof env['PRO_HOME'] === 'string' && env['PRO_HOME'] !== '') {
    proHome = env['PRO_HOME'];
  } else {
    proHome = DEFAULT_PRO_HOME;
  }

  if (!existsSync(proHome)) {
    mkdirSync(proHome, { recursive: true });
  }
  return proHome;
}
