/**
 * Entitle Kernel — Message Templates
 *
 * Every operator-facing message the engine produces is keyed by a stable
 * message code and rendered from a parameterized template here. Control flow
 * branches on codes; wording lives only in this file.
 *
 * Multi-clause messages join their clauses with exactly one blank line
 * (see joinClauses).
 */

import type { ErrorEntry } from '../types/operation.js';
import { ErrorType } from '../types/operation.js';

const PRO_URL = 'https://ubuntu.com/pro';

// ---------------------------------------------------------------------------
// Message Codes
// ---------------------------------------------------------------------------

export enum MessageCode {
  // Batch classification
  InvalidServiceOrFailure = 'invalid-service-or-failure',
  ValidServiceFailureUnattached = 'valid-service-failure-unattached',
  MixedServicesFailureUnattached = 'mixed-services-failure-unattached',
  EmptyServiceList = 'empty-service-list',

  // Per-service enable/disable
  SubscriptionNotEntitled = 'subscription-not-entitled-to-service',
  InapplicableReleaseSeries = 'inapplicable-release-series',
  ServiceAlreadyEnabled = 'service-already-enabled',
  ServiceAlreadyDisabled = 'service-already-disabled',
  RequiredServiceDisabled = 'required-service-disabled',
  DependentServiceEnabled = 'dependent-service-enabled',
  ServiceUnsupportedInContainer = 'service-unsupported-in-container',

  // Warnings
  EnablingRequiredService = 'enabling-required-service',
  DisablingDependentService = 'disabling-dependent-service',
  ServiceNoLongerEntitled = 'service-no-longer-entitled',

  // Attach / detach / refresh
  AlreadyAttached = 'already-attached',
  Unattached = 'unattached',
  AttachInvalidToken = 'attach-invalid-token',
  RefreshContractFailure = 'refresh-contract-failure',

  // Auto-attach
  UnsupportedAutoAttach = 'unsupported-auto-attach',
  AlreadyAttachedOnInstance = 'already-attached-on-instance',
  ReattachingOnNewInstance = 'reattaching-on-new-instance',
  DetachAutomationFailure = 'detach-automation-failure',
  BetaServiceFound = 'beta-service-found',
  FullAutoAttachError = 'full-auto-attach-error',

  // Process-level
  NonRootUser = 'nonroot-user',
  NoHelpAvailable = 'no-help-available',
  LockHeld = 'lock-held',
}

// ---------------------------------------------------------------------------
// Template Parameters
// ---------------------------------------------------------------------------

interface Titled {
  readonly title: string;
}

/** Parameters each template takes, keyed by message code. */
export interface MessageParams {
  [MessageCode.InvalidServiceOrFailure]: { readonly action: string; readonly names: ReadonlyArray<string> };
  [MessageCode.ValidServiceFailureUnattached]: { readonly names: ReadonlyArray<string> };
  [MessageCode.MixedServicesFailureUnattached]: {
    readonly action: string;
    readonly unknown: ReadonlyArray<string>;
    readonly known: ReadonlyArray<string>;
  };
  [MessageCode.EmptyServiceList]: { readonly action: string };
  [MessageCode.SubscriptionNotEntitled]: Titled;
  [MessageCode.InapplicableReleaseSeries]: Titled & { readonly series: string };
  [MessageCode.ServiceAlreadyEnabled]: Titled;
  [MessageCode.ServiceAlreadyDisabled]: Titled;
  [MessageCode.RequiredServiceDisabled]: Titled & { readonly required: string };
  [MessageCode.DependentServiceEnabled]: Titled & { readonly dependent: string };
  [MessageCode.ServiceUnsupportedInContainer]: Titled;
  [MessageCode.EnablingRequiredService]: Titled;
  [MessageCode.DisablingDependentService]: Titled;
  [MessageCode.ServiceNoLongerEntitled]: Titled;
  [MessageCode.AlreadyAttached]: { readonly contract: string };
  [MessageCode.Unattached]: Record<string, never>;
  [MessageCode.AttachInvalidToken]: Record<string, never>;
  [MessageCode.RefreshContractFailure]: Record<string, never>;
  [MessageCode.UnsupportedAutoAttach]: Record<string, never>;
  [MessageCode.AlreadyAttachedOnInstance]: { readonly instanceId: string };
  [MessageCode.ReattachingOnNewInstance]: Record<string, never>;
  [MessageCode.DetachAutomationFailure]: Record<string, never>;
  [MessageCode.BetaServiceFound]: { readonly names: ReadonlyArray<string> };
  [MessageCode.FullAutoAttachError]: { readonly attempts: number };
  [MessageCode.NonRootUser]: Record<string, never>;
  [MessageCode.NoHelpAvailable]: { readonly name: string };
  [MessageCode.LockHeld]: { readonly request: string; readonly holder: string; readonly pid: number };
}

// ---------------------------------------------------------------------------
// Clauses
// ---------------------------------------------------------------------------

/** Join message clauses with one blank line between them. */
export function joinClauses(clauses: ReadonlyArray<string>): string {
  return clauses.join('\n\n');
}

function unknownServiceClause(action: string, name: string): string {
  return `Cannot ${action} unknown service '${name}'.\nSee ${PRO_URL}`;
}

function unattachedServiceClause(name: string): string {
  return (
    `To use '${name}' you need an Ubuntu Pro subscription\n` +
    `Personal and community subscriptions are available at no charge\n` +
    `See ${PRO_URL}`
  );
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

const TEMPLATES: { readonly [K in MessageCode]: (p: MessageParams[K]) => string } = {
  [MessageCode.InvalidServiceOrFailure]: ({ action, names }) =>
    joinClauses(names.map((n) => unknownServiceClause(action, n))),
  [MessageCode.ValidServiceFailureUnattached]: ({ names }) =>
    joinClauses(names.map(unattachedServiceClause)),
  [MessageCode.MixedServicesFailureUnattached]: ({ action, unknown, known }) =>
    joinClauses([
      ...unknown.map((n) => unknownServiceClause(action, n)),
      ...known.map(unattachedServiceClause),
    ]),
  [MessageCode.EmptyServiceList]: ({ action }) =>
    `At least one service name is required.\nUsage: pro ${action} <service> [<service>...]`,

  [MessageCode.SubscriptionNotEntitled]: ({ title }) =>
    `This subscription is not entitled to ${title}\nSee ${PRO_URL}`,
  [MessageCode.InapplicableReleaseSeries]: ({ title, series }) =>
    `${title} is not available for Ubuntu ${series}.`,
  [MessageCode.ServiceAlreadyEnabled]: ({ title }) =>
    `${title} is already enabled.\nSee: sudo pro status`,
  [MessageCode.ServiceAlreadyDisabled]: ({ title }) =>
    `${title} is not currently enabled\nSee: sudo pro status`,
  [MessageCode.RequiredServiceDisabled]: ({ title, required }) =>
    `Cannot enable ${title} when ${required} is disabled.`,
  [MessageCode.DependentServiceEnabled]: ({ title, dependent }) =>
    `Cannot disable ${title} when ${dependent} is enabled.`,
  [MessageCode.ServiceUnsupportedInContainer]: ({ title }) =>
    `Cannot install ${title} on a container.`,

  [MessageCode.EnablingRequiredService]: ({ title }) => `Enabling required service: ${title}`,
  [MessageCode.DisablingDependentService]: ({ title }) => `Disabling dependent service: ${title}`,
  [MessageCode.ServiceNoLongerEntitled]: ({ title }) =>
    `${title} is no longer included in your subscription and was disabled.`,

  [MessageCode.AlreadyAttached]: ({ contract }) =>
    `This machine is already attached to '${contract}'\n` +
    `To use a different subscription first run: sudo pro detach.`,
  [MessageCode.Unattached]: () =>
    `This machine is not attached to an Ubuntu Pro subscription.\nSee ${PRO_URL}`,
  [MessageCode.AttachInvalidToken]: () =>
    `Invalid token. See ${PRO_URL}/dashboard`,
  [MessageCode.RefreshContractFailure]: () =>
    `Unable to refresh your subscription`,

  [MessageCode.UnsupportedAutoAttach]: () =>
    `Auto-attach image support is not available on this image\nSee: ${PRO_URL}`,
  [MessageCode.AlreadyAttachedOnInstance]: ({ instanceId }) =>
    `Skipping attach: Instance '${instanceId}' is already attached.`,
  [MessageCode.ReattachingOnNewInstance]: () => 'Re-attaching Ubuntu Pro subscription on new instance',
  [MessageCode.DetachAutomationFailure]: () =>
    'Unable to automatically detach machine before attaching on the new instance.',
  [MessageCode.BetaServiceFound]: ({ names }) =>
    `Beta services cannot be in the enable list: ${names.join(', ')}\nUse the beta list instead.`,
  [MessageCode.FullAutoAttachError]: ({ attempts }) =>
    `Auto-attach could not enable every requested service after ${attempts} attempts.`,

  [MessageCode.NonRootUser]: () => 'This command must be run as root (try using sudo).',
  [MessageCode.NoHelpAvailable]: ({ name }) => `No help available for '${name}'`,
  [MessageCode.LockHeld]: ({ request, holder, pid }) =>
    `Unable to perform: ${request}.\nOperation in progress: ${holder} (pid: ${pid})`,
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Render the message for a code. */
export function formatMessage<K extends MessageCode>(code: K, params: MessageParams[K]): string {
  return TEMPLATES[code](params);
}

/** Build a batch-level (type system) entry. */
export function systemEntry<K extends MessageCode>(code: K, params: MessageParams[K]): ErrorEntry {
  return {
    message: formatMessage(code, params),
    message_code: code,
    service: null,
    type: ErrorType.System,
  };
}

/** Build an entry attributed to one service. */
export function serviceEntry<K extends MessageCode>(
  service: string,
  code: K,
  params: MessageParams[K],
): ErrorEntry {
  return {
    message: formatMessage(code, params),
    message_code: code,
    service,
    type: ErrorType.Service,
  };
}
