export type {
  ErrorEntry,
  OperationAction,
  OperationRequest,
  OperationResult,
  OutputFormat,
  ServiceAction,
  ServiceOutcome,
} from './operation.js';
export { ErrorType, ResultStatus, SCHEMA_VERSION, ServiceOutcomeStatus } from './operation.js';

export type { AttachmentState, ContractInfo, ContractRecord } from './attachment.js';
export { UNATTACHED_STATE } from './attachment.js';

export type {
  ContractClient,
  HandlerContext,
  HandlerNotice,
  HandlerOutcome,
  InstanceToken,
  InstanceTokenProvider,
  ServiceHandler,
} from './handler.js';
