/**
 * Entitle Runtime Host — Attachment Store
 *
 * Reads and writes the persisted AttachmentState (`state/attachment.json`).
 * The file is untrusted on read: anything that does not narrow to a valid
 * state is treated as an unattached machine.
 */

import type { AttachmentState, ContractRecord } from '@entitle/kernel';
import { UNATTACHED_STATE } from '@entitle/kernel';
import type { StateIO } from './state-io.js';

export const ATTACHMENT_FILENAME = 'attachment.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseContract(value: unknown): ContractRecord | null | undefined {
  if (value === null) return null;
  if (!isRecord(value)) return undefined;
  const { name, token, attached_at: attachedAt, instance_id: instanceId } = value;
  if (typeof name !== 'string' || typeof token !== 'string' || typeof attachedAt !== 'string') {
    return undefined;
  }
  const record: ContractRecord = { name, token, attached_at: attachedAt };
  return typeof instanceId === 'string' ? { ...record, instance_id: instanceId } : record;
}

/**
 * Narrow persisted JSON to an AttachmentState.
 * Returns null when the value does not have the expected shape.
 */
export function parseAttachmentState(value: unknown): AttachmentState | null {
  if (!isRecord(value)) return null;
  const { attached, entitlements, enabled_services: enabled } = value;
  const contract = parseContract(value['contract']);
  if (
    typeof attached !== 'boolean' ||
    !isStringArray(entitlements) ||
    !isStringArray(enabled) ||
    contract === undefined
  ) {
    return null;
  }
  return { attached, entitlements, enabled_services: enabled, contract };
}

export class AttachmentStore {
  constructor(private readonly stateIO: StateIO) {}

  /** The persisted state, or the unattached state when none is stored. */
  read(): AttachmentState {
    return parseAttachmentState(this.stateIO.readJson(ATTACHMENT_FILENAME)) ?? UNATTACHED_STATE;
  }

  write(state: AttachmentState): void {
    this.stateIO.writeJson(ATTACHMENT_FILENAME, {
      attached: state.attached,
      entitlements: state.entitlements,
      enabled_services: state.enabled_services,
      contract: state.contract,
    });
  }
}
