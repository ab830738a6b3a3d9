/**
 * Entitle Kernel — Attachment State
 *
 * The only state that outlives an invocation. The kernel never reads or
 * writes it directly: the caller passes the current value in and receives
 * the next value back. Persistence lives in @entitle/runtime-host.
 */

/** The subscription record the machine is attached to. */
export interface ContractRecord {
  readonly name: string;
  readonly token: string;
  /** ISO 8601 timestamp of the attach. */
  readonly attached_at: string;
  /** Cloud instance the machine was auto-attached on. */
  readonly instance_id?: string | undefined;
}

export interface AttachmentState {
  readonly attached: boolean;
  /** Service names the attached contract grants. */
  readonly entitlements: ReadonlyArray<string>;
  /** Service names currently enabled, in the order they were enabled. */
  readonly enabled_services: ReadonlyArray<string>;
  readonly contract: ContractRecord | null;
}

/** State of a machine that has never been attached (or was detached). */
export const UNATTACHED_STATE: AttachmentState = Object.freeze({
  attached: false,
  entitlements: [],
  enabled_services: [],
  contract: null,
});

/** A contract as returned by a ContractClient for a token. */
export interface ContractInfo {
  readonly contract_name: string;
  readonly entitlements: ReadonlyArray<string>;
}
