/**
 * Entitle Kernel — Collaborator Interfaces
 *
 * The kernel decides *whether* and *in what order* services change state.
 * The work itself (repositories, packages, kernels) and the contract server
 * are external collaborators injected through these interfaces.
 *
 * Implementations live in @entitle/service-manager and
 * @entitle/runtime-host; tests supply in-memory fakes.
 */

import type { ReleaseSeries, ServiceDefinition } from '@entitle/catalog';
import type { ContractInfo } from './attachment.js';

/** Context passed to every handler call. */
export interface HandlerContext {
  readonly series: ReleaseSeries;
  readonly assumeYes: boolean;
}

/** A non-fatal advisory raised by a handler. */
export interface HandlerNotice {
  readonly message: string;
  readonly message_code: string;
}

/**
 * Outcome of one handler call.
 *
 * Failures are values, not exceptions: the executor turns them into
 * service-scoped ErrorEntries and moves on to the next service.
 */
export type HandlerOutcome =
  | {
      readonly ok: true;
      readonly needsReboot: boolean;
      readonly warnings: ReadonlyArray<HandlerNotice>;
    }
  | {
      readonly ok: false;
      readonly message: string;
      readonly message_code: string;
    };

/** Performs the side effects of enabling or disabling one service. */
export interface ServiceHandler {
  enable(service: ServiceDefinition, ctx: HandlerContext): Promise<HandlerOutcome>;
  disable(service: ServiceDefinition, ctx: HandlerContext): Promise<HandlerOutcome>;
}

/**
 * Looks up the contract behind an attach token.
 * Returns null when the token is not recognised.
 */
export interface ContractClient {
  fetchContract(token: string): Promise<ContractInfo | null>;
}

/** A contract token issued for the cloud instance the machine runs on. */
export interface InstanceToken {
  readonly instance_id: string;
  readonly token: string;
}

/**
 * Obtains an attach token from the cloud instance identity.
 * Returns null when the machine is not on a cloud that supports auto-attach.
 */
export interface InstanceTokenProvider {
  fetchInstanceToken(): Promise<InstanceToken | null>;
}
