/**
 * Entitle Runtime Host — Release Series Detection
 *
 * Service availability is keyed by release series (e.g. `jammy`), read from
 * os-release. VERSION_CODENAME is preferred; older files only carry the
 * codename inside VERSION, e.g. `VERSION="16.04.7 LTS (Xenial Xerus)"`.
 */

import { readFileSync } from 'node:fs';

/** Parse os-release `KEY=value` lines. Quotes around values are removed. */
export function parseOsRelease(content: string): Readonly<Record<string, string>> {
  const fields: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq);
    const value = trimmed.slice(eq + 1).replace(/^(["'])(.*)\1$/, '$2');
    fields[key] = value;
  }
  return fields;
}

/**
 * Extract the series from parsed os-release fields.
 * Returns null when neither VERSION_CODENAME nor VERSION names one.
 */
export function seriesFromOsRelease(fields: Readonly<Record<string, string>>): string | null {
  const codename = fields['VERSION_CODENAME'];
  if (codename !== undefined && codename !== '') return codename.toLowerCase();

  const match = /\(([A-Za-z]+)/.exec(fields['VERSION'] ?? '');
  const word = match?.[1];
  return word === undefined ? null : word.toLowerCase();
}

/**
 * Read the release series of this host.
 *
 * @throws {Error} If the file cannot be read or names no series
 */
export function detectSeries(osReleasePath = '/etc/os-release'): string {
  const series = seriesFromOsRelease(parseOsRelease(readFileSync(osReleasePath, 'utf-8')));
  if (series === null) {
    throw new Error(`Unable to determine the release series from ${osReleasePath}`);
  }
  return series;
}
