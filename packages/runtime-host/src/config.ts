/**
 * Entitle Runtime Host — Configuration
 *
 * Optional `<PRO_HOME>/config.json`. Every field is optional; a missing
 * file, malformed JSON, or a field of the wrong type falls back to the
 * default for that field. Fallbacks are reported as warnings so the CLI
 * can surface them without failing the command.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from './state/state-io.js';

export const CONFIG_FILENAME = 'config.json';

export interface EntitleConfig {
  /** Release series override. Null means detect from os-release. */
  readonly series: string | null;
  /** Treat beta services as known without --beta. */
  readonly allow_beta: boolean;
  /** JSON file the offline contract client reads. */
  readonly contract_file: string;
  /** JSON file holding the cloud instance identity used by auto-attach. */
  readonly instance_file: string;
  readonly os_release_path: string;
  /** Directory checked for container markers. */
  readonly run_dir: string;
  /** Append one JSONL entry per operation under logs/. */
  readonly log_operations: boolean;
}

export interface ConfigLoadResult {
  readonly config: EntitleConfig;
  readonly warnings: ReadonlyArray<string>;
}

export function defaultConfig(home: string): EntitleConfig {
  return {
    series: null,
    allow_beta: false,
    contract_file: join(home, 'contracts.json'),
    instance_file: join(home, 'instance.json'),
    os_release_path: '/etc/os-release',
    run_dir: '/run',
    log_operations: true,
  };
}

/**
 * Load `<home>/config.json`, merging valid fields over the defaults.
 *
 * @throws I/O errors other than ENOENT
 */
export function loadConfig(home: string): ConfigLoadResult {
  const defaults = defaultConfig(home);
  const path = join(home, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return { config: defaults, warnings: [] };
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { config: defaults, warnings: [`${path} is not valid JSON; using defaults.`] };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { config: defaults, warnings: [`${path} must contain a JSON object; using defaults.`] };
  }

  const warnings: string[] = [];
  const fields = new Map<string, unknown>(Object.entries(parsed));

  const pickString = (key: keyof EntitleConfig, fallback: string): string => {
    const value = fields.get(key);
    if (value === undefined) return fallback;
    if (typeof value === 'string' && value !== '') return value;
    warnings.push(`${CONFIG_FILENAME}: "${key}" must be a non-empty string; using default.`);
    return fallback;
  };
  const pickBoolean = (key: keyof EntitleConfig, fallback: boolean): boolean => {
    const value = fields.get(key);
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    warnings.push(`${CONFIG_FILENAME}: "${key}" must be a boolean; using default.`);
    return fallback;
  };

  const series = fields.get('series');
  let resolvedSeries: string | null = defaults.series;
  if (typeof series === 'string' && series !== '') {
    resolvedSeries = series;
  } else if (series !== undefined && series !== null) {
    warnings.push(`${CONFIG_FILENAME}: "series" must be a non-empty string; using default.`);
  }

  const config: EntitleConfig = {
    series: resolvedSeries,
    allow_beta: pickBoolean('allow_beta', defaults.allow_beta),
    contract_file: pickString('contract_file', defaults.contract_file),
    instance_file: pickString('instance_file', defaults.instance_file),
    os_release_path: pickString('os_release_path', defaults.os_release_path),
    run_dir: pickString('run_dir', defaults.run_dir),
    log_operations: pickBoolean('log_operations', defaults.log_operations),
  };

  const known = new Set<string>(Object.keys(defaults));
  for (const key of fields.keys()) {
    if (!known.has(key)) warnings.push(`${CONFIG_FILENAME}: unknown field "${key}" ignored.`);
  }

  return { config, warnings };
}
