/**
 * Entitle Kernel — Status Report
 *
 * Summarizes attachment and per-service state for `pro status`.
 */

import type { ReleaseSeries, ServiceCatalog } from '@entitle/catalog';
import type { AttachmentState } from '../types/attachment.js';
import { SCHEMA_VERSION } from '../types/operation.js';

export type ServiceStatus = 'enabled' | 'disabled' | 'n/a';

export interface ServiceStatusRow {
  readonly name: string;
  readonly entitled: 'yes' | 'no';
  readonly status: ServiceStatus;
  readonly available: 'yes' | 'no';
  readonly description: string;
}

export interface StatusReport {
  readonly _schema_version: typeof SCHEMA_VERSION;
  readonly attached: boolean;
  readonly contract_name: string | null;
  readonly series: ReleaseSeries;
  readonly services: ReadonlyArray<ServiceStatusRow>;
}

export interface StatusOptions {
  readonly includeBeta?: boolean | undefined;
}

/**
 * Build the status report.
 *
 * A service's status is `enabled` if it is in the enabled list, `n/a` if it
 * cannot be enabled here (not entitled, or unavailable on this series), and
 * `disabled` otherwise.
 */
export function buildStatusReport(
  catalog: ServiceCatalog,
  state: AttachmentState,
  series: ReleaseSeries,
  opts?: StatusOptions,
): StatusReport {
  const services = catalog.list({ includeBeta: opts?.includeBeta }).map((def): ServiceStatusRow => {
    const entitled = state.attached && state.entitlements.includes(def.name);
    const available = catalog.isAvailable(def.name, series);
    let status: ServiceStatus;
    if (state.enabled_services.includes(def.name)) {
      status = 'enabled';
    } else if (entitled && available) {
      status = 'disabled';
    } else {
      status = 'n/a';
    }
    return {
      name: def.name,
      entitled: entitled ? 'yes' : 'no',
      status,
      available: available ? 'yes' : 'no',
      description: def.description,
    };
  });

  return {
    _schema_version: SCHEMA_VERSION,
    attached: state.attached,
    contract_name: state.contract?.name ?? null,
    series,
    services,
  };
}
