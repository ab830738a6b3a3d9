/**
 * Entitle Kernel — Request Classification
 *
 * Every enable/disable request falls into exactly one class, determined by
 * the name partition and the attachment flag. The class alone (plus the
 * action verb) decides the batch message code.
 */

import type { ErrorEntry } from '../types/operation.js';
import type { NamePartition } from '../validation/request-validator.js';
import { MessageCode, systemEntry } from '../messages/templates.js';

export enum RequestClassification {
  /** No requested name is known. */
  AllUnknown = 'all-unknown',
  /** Every name is known but the machine is not attached. */
  AllKnownUnattached = 'all-known-unattached',
  /** Known and unknown names on an unattached machine. */
  Mixed = 'mixed',
  /** Attached with at least one known name: proceed to execution. */
  NormalAttached = 'normal-attached-execution',
}

/**
 * Classify a partitioned request.
 *
 * An empty partition never reaches this point (validateRequest rejects it);
 * it classifies as AllUnknown.
 */
export function classifyRequest(partition: NamePartition, attached: boolean): RequestClassification {
  if (partition.known.length === 0) return RequestClassification.AllUnknown;
  if (attached) return RequestClassification.NormalAttached;
  if (partition.unknown.length === 0) return RequestClassification.AllKnownUnattached;
  return RequestClassification.Mixed;
}

/**
 * Compose the single batch-level error for a blocked classification.
 * Returns null for NormalAttached, which is never blocked.
 */
export function composeBatchError(
  classification: RequestClassification,
  action: string,
  partition: NamePartition,
): ErrorEntry | null {
  switch (classification) {
    case RequestClassification.AllUnknown:
      return systemEntry(MessageCode.InvalidServiceOrFailure, {
        action,
        names: partition.unknown,
      });
    case RequestClassification.AllKnownUnattached:
      return systemEntry(MessageCode.ValidServiceFailureUnattached, { names: partition.known });
    case RequestClassification.Mixed:
      return systemEntry(MessageCode.MixedServicesFailureUnattached, {
        action,
        unknown: partition.unknown,
        known: partition.known,
      });
    case RequestClassification.NormalAttached:
      return null;
  }
}
