/**
 * Entitle Runtime Host — Host Environment Checks
 *
 * Container detection looks for the markers container managers leave under
 * the run directory: `container_type` (LXD and others) and
 * `systemd/container` (systemd-nspawn, podman, docker with systemd).
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

export function isContainer(runDir = '/run'): boolean {
  return (
    existsSync(join(runDir, 'container_type')) || existsSync(join(runDir, 'systemd', 'container'))
  );
}

/** Whether the effective user is root. False on platforms without uids. */
export function isRoot(): boolean {
  return process.geteuid?.() === 0;
}
