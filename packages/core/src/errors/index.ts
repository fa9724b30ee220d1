export { CdnscopeRuntimeError, errorMessage } from './CdnscopeRuntimeError.js';
export { CdnscopeValidationError } from './CdnscopeValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { CdnscopeErrorCode, Issue, Severity } from './types.js';
