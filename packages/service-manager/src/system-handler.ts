/**
 * Entitle Service Manager — System Service Handler
 *
 * The production ServiceHandler. Package sources, keyrings and kernels are
 * configured by external tooling; this handler enforces the host-level
 * constraints the catalog declares and reports whether a reboot is needed.
 */

import type { ServiceDefinition } from '@entitle/catalog';
import type { HandlerOutcome, ServiceHandler } from '@entitle/kernel';
import { MessageCode, formatMessage } from '@entitle/kernel';

export interface SystemServiceHandlerOptions {
  /** Whether the host is a container (see isContainer in runtime-host). */
  readonly inContainer: boolean;
}

export class SystemServiceHandler implements ServiceHandler {
  constructor(private readonly opts: SystemServiceHandlerOptions) {}

  /**
   * Refuses services that cannot run in a container when the host is one.
   * Signals a reboot for services that replace the running kernel.
   */
  async enable(service: ServiceDefinition): Promise<HandlerOutcome> {
    if (this.opts.inContainer && !service.container_supported) {
      return {
        ok: false,
        message: formatMessage(MessageCode.ServiceUnsupportedInContainer, { title: service.title }),
        message_code: MessageCode.ServiceUnsupportedInContainer,
      };
    }
    return { ok: true, needsReboot: service.reboot_on_enable, warnings: [] };
  }

  async disable(): Promise<HandlerOutcome> {
    return { ok: true, needsReboot: false, warnings: [] };
  }
}
