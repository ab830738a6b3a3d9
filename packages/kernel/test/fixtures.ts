/**
 * Shared kernel test fixtures: the bundled catalog, state builders and a
 * handler that records calls instead of touching the system.
 */

import type { ServiceDefinition } from '@entitle/catalog';
import { loadCatalog } from '@entitle/catalog';
import type {
  AttachmentState,
  HandlerOutcome,
  OperationRequest,
  ResolutionContext,
  ServiceHandler,
} from '../src/index.js';
import { UNATTACHED_STATE } from '../src/index.js';

export const CATALOG = loadCatalog();

export const FIXED_NOW = (): string => '2026-01-01T00:00:00.000Z';

export function attachedState(
  enabled: ReadonlyArray<string> = [],
  entitlements: ReadonlyArray<string> = CATALOG.names({ includeBeta: true }),
): AttachmentState {
  return {
    attached: true,
    entitlements,
    enabled_services: enabled,
    contract: { name: 'test-contract', token: 'test-token', attached_at: FIXED_NOW() },
  };
}

export function enableRequest(
  names: ReadonlyArray<string>,
  overrides: Partial<OperationRequest> = {},
): OperationRequest {
  return {
    action: 'enable',
    requested_names: names,
    assume_yes: false,
    format: 'json',
    allow_beta: false,
    ...overrides,
  };
}

export function disableRequest(
  names: ReadonlyArray<string>,
  overrides: Partial<OperationRequest> = {},
): OperationRequest {
  return enableRequest(names, { action: 'disable', ...overrides });
}

/**
 * Handler fake. Succeeds unless the service is listed in `failing`;
 * signals a reboot when the definition asks for one.
 */
export class RecordingHandler implements ServiceHandler {
  readonly calls: string[] = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async enable(service: ServiceDefinition): Promise<HandlerOutcome> {
    this.calls.push(`enable:${service.name}`);
    return this.outcome(service, service.reboot_on_enable);
  }

  async disable(service: ServiceDefinition): Promise<HandlerOutcome> {
    this.calls.push(`disable:${service.name}`);
    return this.outcome(service, false);
  }

  private outcome(service: ServiceDefinition, needsReboot: boolean): HandlerOutcome {
    if (this.failing.has(service.name)) {
      return { ok: false, message: `failed ${service.name}`, message_code: 'test-handler-failure' };
    }
    return { ok: true, needsReboot, warnings: [] };
  }
}

export function makeContext(
  state: AttachmentState = UNATTACHED_STATE,
  series = 'jammy',
  handler: ServiceHandler = new RecordingHandler(),
): ResolutionContext {
  return { catalog: CATALOG, state, series, handler, now: FIXED_NOW };
}
