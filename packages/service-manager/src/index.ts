/**
 * @entitle/service-manager
 *
 * Orchestration layer between the CLI and the kernel: locking, state
 * persistence around each resolution, operation logging, and the production
 * service handler.
 */

export type {
  AttachRequestOptions,
  ServiceManagerDeps,
  ServiceRequestOptions,
} from './service-manager.js';
export { ServiceManager } from './service-manager.js';

export type { SystemServiceHandlerOptions } from './system-handler.js';
export { SystemServiceHandler } from './system-handler.js';

export type { BuildServiceManagerOptions, BuiltServiceManager } from './build.js';
export { buildServiceManager } from './build.js';
