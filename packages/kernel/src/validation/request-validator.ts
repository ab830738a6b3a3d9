/**
 * Entitle Kernel — Request Validator
 *
 * First stage of resolution. Normalizes the requested names and splits them
 * into names the catalog knows and names it does not. Unknown names are not
 * rejected here: they are carried forward so they can contribute to the
 * aggregated message.
 */

import type { ServiceCatalog } from '@entitle/catalog';
import type { OperationRequest } from '../types/operation.js';
import { RequestValidationError } from '../errors.js';
import { MessageCode, formatMessage } from '../messages/templates.js';

/** Requested names split by catalog membership, each in request order. */
export interface NamePartition {
  readonly known: ReadonlyArray<string>;
  readonly unknown: ReadonlyArray<string>;
}

export interface PartitionOptions {
  /** When false, beta services are treated as unknown. Default: false. */
  readonly allowBeta?: boolean | undefined;
}

/** Remove repeated names, keeping the first occurrence of each. */
export function dedupeNames(names: ReadonlyArray<string>): ReadonlyArray<string> {
  return Array.from(new Set(names));
}

/**
 * Partition names by exact, case-sensitive catalog match.
 * Input order is preserved within each list.
 */
export function partitionServiceNames(
  names: ReadonlyArray<string>,
  catalog: ServiceCatalog,
  opts?: PartitionOptions,
): NamePartition {
  const allowBeta = opts?.allowBeta === true;
  const known: string[] = [];
  const unknown: string[] = [];
  for (const name of names) {
    const def = catalog.get(name);
    if (def !== undefined && (allowBeta || !def.is_beta)) {
      known.push(name);
    } else {
      unknown.push(name);
    }
  }
  return { known, unknown };
}

/**
 * Reject requests that cannot be resolved at all.
 *
 * @throws {RequestValidationError} When no service names were given
 */
export function validateRequest(request: OperationRequest): void {
  if (request.requested_names.length === 0) {
    throw new RequestValidationError(
      MessageCode.EmptyServiceList,
      formatMessage(MessageCode.EmptyServiceList, { action: request.action }),
    );
  }
}
