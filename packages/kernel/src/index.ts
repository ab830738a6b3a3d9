/**
 * @entitle/kernel
 *
 * Entitlement resolution engine: request validation, precondition gate,
 * classification and message composition, action execution, result
 * aggregation, rendering, help and status.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. Handlers,
 * contract lookup and log persistence are injected.
 *
 * Concrete adapters and state persistence live in @entitle/runtime-host.
 */

// Types
export type {
  AttachmentState,
  ContractClient,
  ContractInfo,
  ContractRecord,
  ErrorEntry,
  HandlerContext,
  HandlerNotice,
  HandlerOutcome,
  InstanceToken,
  InstanceTokenProvider,
  OperationAction,
  OperationRequest,
  OperationResult,
  OutputFormat,
  ServiceAction,
  ServiceHandler,
  ServiceOutcome,
} from './types/index.js';
export {
  ErrorType,
  ResultStatus,
  SCHEMA_VERSION,
  ServiceOutcomeStatus,
  UNATTACHED_STATE,
} from './types/index.js';

// Errors
export { EntitleError, HelpNotFoundError, PrivilegeError, RequestValidationError } from './errors.js';

// Messages
export type { MessageParams } from './messages/templates.js';
export {
  MessageCode,
  formatMessage,
  joinClauses,
  serviceEntry,
  systemEntry,
} from './messages/templates.js';

// Validation
export type { NamePartition, PartitionOptions } from './validation/request-validator.js';
export { dedupeNames, partitionServiceNames, validateRequest } from './validation/request-validator.js';
export type { GateVerdict } from './validation/gate.js';
export { checkLifecycleGate, checkServiceGate } from './validation/gate.js';

// Resolution
export { RequestClassification, classifyRequest, composeBatchError } from './resolution/classification.js';
export { ResultAggregator, blockedResult } from './resolution/aggregator.js';
export type { AttachOptions, Resolution, ResolutionContext } from './resolution/resolver.js';
export {
  resolveAttach,
  resolveDetach,
  resolveRefresh,
  resolveServiceOperation,
} from './resolution/resolver.js';
export type { AutoAttachOptions, AutoAttachSources } from './resolution/auto-attach.js';
export { DEFAULT_AUTO_ATTACH_RETRIES, resolveAutoAttach } from './resolution/auto-attach.js';
export type { ExecutorOptions } from './execution/executor.js';
export { ActionExecutor } from './execution/executor.js';

// Read paths
export type { HelpInfo } from './help/help-query.js';
export { queryHelp } from './help/help-query.js';
export type { ServiceStatus, ServiceStatusRow, StatusOptions, StatusReport } from './status/status.js';
export { buildStatusReport } from './status/status.js';

// Rendering
export type { RenderedText } from './rendering/renderer.js';
export {
  REBOOT_REQUIRED_MESSAGE,
  renderHelpJson,
  renderHelpText,
  renderResultJson,
  renderResultText,
  renderStatusJson,
  renderStatusText,
} from './rendering/renderer.js';

// Logging (sink implementation lives in runtime-host)
export type { LogSink, OperationLogEntry } from './logging/log-sink.js';
export { OperationLogger } from './logging/operation-log.js';
