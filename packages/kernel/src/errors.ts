/**
 * Entitle Kernel — Error Taxonomy
 *
 * Thrown errors are reserved for conditions that end the invocation before a
 * result exists. Everything recoverable (unknown names, missing attachment,
 * per-service failures) becomes an ErrorEntry in the OperationResult instead.
 */

import { EntitleError } from '@entitle/catalog';
import { MessageCode, formatMessage } from './messages/templates.js';

export { EntitleError };

/** The invoking user is not root. Checked before anything else runs. */
export class PrivilegeError extends EntitleError {
  constructor() {
    super(MessageCode.NonRootUser, formatMessage(MessageCode.NonRootUser, {}));
    this.name = 'PrivilegeError';
  }
}

/** The request itself is malformed (e.g. no service names given). */
export class RequestValidationError extends EntitleError {
  constructor(code: MessageCode, message: string) {
    super(code, message);
    this.name = 'RequestValidationError';
  }
}

/** Help was requested for a name the catalog does not know. */
export class HelpNotFoundError extends EntitleError {
  readonly serviceName: string;

  constructor(serviceName: string) {
    super(MessageCode.NoHelpAvailable, formatMessage(MessageCode.NoHelpAvailable, { name: serviceName }));
    this.serviceName = serviceName;
    this.name = 'HelpNotFoundError';
  }
}
