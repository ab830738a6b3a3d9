/**
 * Entitle Kernel — Precondition Gate
 *
 * Checks machine-level preconditions before any per-service work. A blocked
 * verdict carries the one batch-level ErrorEntry that replaces execution;
 * no per-service outcome exists on that path.
 *
 * Preconditions by action:
 *   enable, disable  — machine attached (otherwise classified batch error)
 *   attach           — machine not attached
 *   detach, refresh  — machine attached
 */

import type { AttachmentState } from '../types/attachment.js';
import type { ErrorEntry, OperationAction } from '../types/operation.js';
import type { NamePartition } from './request-validator.js';
import { MessageCode, systemEntry } from '../messages/templates.js';
import { classifyRequest, composeBatchError } from '../resolution/classification.js';

export type GateVerdict =
  | { readonly proceed: true }
  | { readonly proceed: false; readonly error: ErrorEntry };

const PROCEED: GateVerdict = { proceed: true };

/**
 * Gate a batch enable/disable request.
 *
 * Only blocks when the machine is unattached. An attached request with
 * unknown names proceeds: the executor reports them after the known ones.
 */
export function checkServiceGate(
  action: OperationAction,
  state: AttachmentState,
  partition: NamePartition,
): GateVerdict {
  if (state.attached) return PROCEED;
  const error = composeBatchError(classifyRequest(partition, false), action, partition);
  return error === null ? PROCEED : { proceed: false, error };
}

/** Gate the single-shot attach/detach/refresh actions. */
export function checkLifecycleGate(
  action: Exclude<OperationAction, 'enable' | 'disable' | 'auto-attach'>,
  state: AttachmentState,
): GateVerdict {
  if (action === 'attach') {
    if (!state.attached) return PROCEED;
    return {
      proceed: false,
      error: systemEntry(MessageCode.AlreadyAttached, { contract: state.contract?.name ?? '' }),
    };
  }
  if (state.attached) return PROCEED;
  return { proceed: false, error: systemEntry(MessageCode.Unattached, {}) };
}
