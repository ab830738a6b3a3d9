/**
 * Entitle Service Manager — Runtime Wiring
 *
 * Assembles a ServiceManager backed by the real host: PRO_HOME, config,
 * bundled catalog, file state, offline contract and instance files,
 * os-release series, container detection, operation log and lock file.
 */

import { loadCatalog } from '@entitle/catalog';
import {
  AttachmentStore,
  FileContractClient,
  FileInstanceTokenProvider,
  FileLogSink,
  FileOperationLock,
  FileStateIO,
  detectSeries,
  isContainer,
  loadConfig,
  resolveProHome,
} from '@entitle/runtime-host';
import { ServiceManager } from './service-manager.js';
import { SystemServiceHandler } from './system-handler.js';

export interface BuildServiceManagerOptions {
  /** Explicit PRO_HOME override. */
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface BuiltServiceManager {
  readonly manager: ServiceManager;
  readonly home: string;
  /** Configuration fallbacks to surface to the operator. */
  readonly warnings: ReadonlyArray<string>;
}

/**
 * @throws {CatalogValidationError} If the bundled catalog is invalid
 * @throws {Error} If no series is configured and os-release names none
 */
export function buildServiceManager(opts?: BuildServiceManagerOptions): BuiltServiceManager {
  const home = resolveProHome({ proHome: opts?.home, env: opts?.env });
  const { config, warnings } = loadConfig(home);
  const stateIO = new FileStateIO(home);

  const manager = new ServiceManager({
    catalog: loadCatalog(),
    store: new AttachmentStore(stateIO),
    handler: new SystemServiceHandler({ inContainer: isContainer(config.run_dir) }),
    contracts: new FileContractClient(config.contract_file),
    instance: new FileInstanceTokenProvider(config.instance_file),
    lock: new FileOperationLock(home),
    series: config.series ?? detectSeries(config.os_release_path),
    allowBeta: config.allow_beta,
    logSink: config.log_operations ? new FileLogSink(stateIO) : undefined,
  });

  return { manager, home, warnings };
}
