/**
 * API Utilities
 */

export {
  createErrorResponse,
  type ErrorResponse,
  type ErrorResponseParams,
  type ErrorResponseResult,
  type ErrorStatusCode,
  type ErrorType,
  isErrorStatusCode,
  resolveAllowedStatus,
  statusToErrorType,
} from './error-responses';
export { handleDomainError, type KnownErrorConfig } from './route-handler';
export { safeParseId } from './safe-parsers';
export {
  type CleanupableService,
  cleanupAllServices,
  createManagedService,
  type ManagedServiceConfig,
  registerServiceForCleanup,
} from './service-lifecycle';
export { createOpenAPIApp, validationHook } from './validation-hook';
