/**
 * @market-terminal/shared
 */

export * from './clients/broker';
export { HttpRequestError, type HttpRequestErrorKind, requestJson } from './clients/base/http-client';
export * from './config';
export * from './errors';
export * from './market';
export * from './quotes';
export { getErrorMessage, getErrorStack } from './utils/error-helpers';
export { type Logger, logger, resolveLogLevel } from './utils/logger';
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
export * from './watchlist';
