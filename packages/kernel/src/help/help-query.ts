/**
 * Entitle Kernel — Help Query
 *
 * Read-only lookup of a service's help text. Availability comes from the
 * catalog for the current series and does not depend on attachment.
 */

import type { ReleaseSeries, ServiceCatalog } from '@entitle/catalog';
import { HelpNotFoundError } from '../errors.js';

/** Help query result. Serialized verbatim as the help JSON format. */
export interface HelpInfo {
  readonly name: string;
  readonly available: 'yes' | 'no';
  readonly help: string;
}

/**
 * @throws {HelpNotFoundError} If the catalog has no service called `name`
 */
export function queryHelp(name: string, catalog: ServiceCatalog, series: ReleaseSeries): HelpInfo {
  const def = catalog.get(name);
  if (def === undefined) {
    throw new HelpNotFoundError(name);
  }
  return {
    name: def.name,
    available: catalog.isAvailable(name, series) ? 'yes' : 'no',
    help: def.help_text,
  };
}
