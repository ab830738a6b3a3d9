/**
 * @entitle/runtime-host
 *
 * Side-effectful implementations: state persistence, home and config
 * resolution, contract lookup, operation logging, platform detection and the
 * operation lock. Depends on @entitle/kernel (interfaces); implements them
 * with Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// Attachment state persistence
export { ATTACHMENT_FILENAME, AttachmentStore, parseAttachmentState } from './state/attachment-store.js';

// PRO_HOME and configuration
export type { ResolveProHomeOptions } from './home.js';
export { DEFAULT_PRO_HOME, resolveProHome } from './home.js';
export type { ConfigLoadResult, EntitleConfig } from './config.js';
export { CONFIG_FILENAME, defaultConfig, loadConfig } from './config.js';

// Contract lookup
export { FileContractClient } from './contract/file-contract-client.js';
export { FileInstanceTokenProvider } from './contract/file-instance-token-provider.js';

// Logging
export { FileLogSink, OPERATIONS_LOG_FILENAME } from './logging/file-log-sink.js';

// Platform
export { detectSeries, parseOsRelease, seriesFromOsRelease } from './platform/os-release.js';
export { isContainer, isRoot } from './platform/environment.js';

// Operation lock
export type { LockHolder, OperationLock } from './lock/operation-lock.js';
export {
  FileOperationLock,
  LOCK_FILENAME,
  LockHeldError,
  MemoryOperationLock,
  withLock,
} from './lock/operation-lock.js';
