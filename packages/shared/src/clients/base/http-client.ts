import { logger } from '../../utils/logger';

export type HttpRequestErrorKind = 'http' | 'network' | 'timeout' | 'invalid-json';

interface HttpRequestErrorOptions {
  status?: number;
  statusText?: string;
  body?: unknown;
  cause?: unknown;
}

export class HttpRequestError extends Error {
  readonly kind: HttpRequestErrorKind;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: unknown;

  constructor(message: string, kind: HttpRequestErrorKind, options: HttpRequestErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HttpRequestError';
    this.kind = kind;
    this.status = options.status;
    this.statusText = options.statusText;
    this.body = options.body;
  }
}

export interface JsonRequestOptions extends Omit<RequestInit, 'body'> {
  baseUrl?: string;
  /** Serialized as JSON; sets Content-Type when the caller did not */
  json?: unknown;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function buildUrl(path: string, baseUrl?: string): string {
  return baseUrl ? new URL(path, baseUrl).toString() : path;
}

/**
 * Pull a human-readable message out of an error body.
 * SmartAPI answers with `{ message, errorcode }`, other upstreams with `error` or `detail`.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (isRecord(body)) {
    return nonEmptyString(body.message) ?? nonEmptyString(body.error) ?? nonEmptyString(body.detail);
  }
  return nonEmptyString(body);
}

interface TimeoutSignalResult {
  signal?: AbortSignal;
  cleanup: () => void;
  didTimeout: () => boolean;
}

function createTimeoutSignal(inputSignal: AbortSignal | null | undefined, timeoutMs?: number): TimeoutSignalResult {
  if (!timeoutMs || timeoutMs <= 0) {
    return { signal: inputSignal ?? undefined, cleanup: () => {}, didTimeout: () => false };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (inputSignal) {
    if (inputSignal.aborted) {
      controller.abort();
    } else {
      inputSignal.addEventListener('abort', onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timeoutId);
      inputSignal?.removeEventListener('abort', onAbort);
    },
    didTimeout: () => timedOut,
  };
}

async function readErrorBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (parseError) {
    logger.debug('Received non-JSON error response body', {
      status: response.status,
      parseError: parseError instanceof Error ? parseError.message : String(parseError),
    });
    return text;
  }
}

async function throwHttpError(response: Response): Promise<never> {
  const errorBody = await readErrorBody(response);
  const message = extractErrorMessage(errorBody) || response.statusText || `HTTP ${response.status}`;
  throw new HttpRequestError(message, 'http', {
    status: response.status,
    statusText: response.statusText,
    body: errorBody,
  });
}

async function parseJsonResponse(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (cause) {
    throw new HttpRequestError('Invalid JSON response', 'invalid-json', {
      status: response.status,
      statusText: response.statusText,
      cause,
    });
  }
}

function toTransportError(error: unknown, timeout: TimeoutSignalResult, timeoutMs?: number): HttpRequestError {
  if (error instanceof HttpRequestError) {
    return error;
  }

  if (error instanceof Error && error.name === 'AbortError' && timeout.didTimeout()) {
    return new HttpRequestError(`Request timed out after ${timeoutMs}ms`, 'timeout', { cause: error });
  }

  const message = error instanceof Error ? error.message : 'Network request failed';
  return new HttpRequestError(message, 'network', { cause: error });
}

/**
 * Perform a request and return the parsed JSON body, unvalidated.
 * Every failure is raised as an {@link HttpRequestError}.
 */
export async function requestJson(path: string, options: JsonRequestOptions = {}): Promise<unknown> {
  const { baseUrl, json, timeoutMs, headers, ...requestInit } = options;
  const url = buildUrl(path, baseUrl);
  const timeout = createTimeoutSignal(requestInit.signal, timeoutMs);

  const requestHeaders = new Headers(headers);
  let body: string | undefined;
  if (json !== undefined) {
    body = JSON.stringify(json);
    if (!requestHeaders.has('Content-Type')) {
      requestHeaders.set('Content-Type', 'application/json');
    }
  }

  try {
    const response = await fetch(url, {
      ...requestInit,
      headers: requestHeaders,
      body,
      signal: timeout.signal,
    });

    if (!response.ok) {
      await throwHttpError(response);
    }

    return await parseJsonResponse(response);
  } catch (error) {
    throw toTransportError(error, timeout, timeoutMs);
  } finally {
    timeout.cleanup();
  }
}
