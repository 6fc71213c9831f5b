import { MsAuthError, MsConfigError, MsHttpError, MsValidationError, serverMessageOf } from '../http/errors';

export type ConnectionErrorClass = 'auth' | 'config' | 'dns' | 'network' | 'timeout' | 'not_found' | 'http' | 'unknown';

export interface ConnectivityResult {
  class: ConnectionErrorClass;
  message: string;
  retriable: boolean;
  statusCode?: number;
}

const DNS_ERROR_CODES = ['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME'];
const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE'];
const TIMEOUT_ERROR_CODES = ['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT'];

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * `fetch` reports socket failures as `TypeError('fetch failed')` with the errno error as its cause.
 */
export function errnoCodeOf(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth += 1) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function isFetchFailure(error: unknown): boolean {
  return error instanceof TypeError && error.message === 'fetch failed';
}

export function classifyConnectivityError(error: unknown): ConnectivityResult {
  const message = errorMessage(error);

  if (error instanceof MsAuthError) {
    return { class: 'auth', message, retriable: false };
  }

  if (error instanceof MsConfigError || error instanceof MsValidationError) {
    return { class: 'config', message, retriable: false };
  }

  if (error instanceof MsHttpError) {
    if (error.status === 404) {
      return {
        class: 'not_found',
        message: 'The URL either does not exist or it does not point to a Management System',
        retriable: false,
        statusCode: error.status
      };
    }
    if (error.status === 401 || error.status === 403) {
      return {
        class: 'auth',
        message: serverMessageOf(error.details) ?? message,
        retriable: false,
        statusCode: error.status
      };
    }
    return {
      class: 'http',
      message: serverMessageOf(error.details) ?? message,
      retriable: error.status >= 500,
      statusCode: error.status
    };
  }

  if (isAbortError(error)) {
    return { class: 'timeout', message: 'Failed to connect to Management System: request timed out', retriable: true };
  }

  const code = errnoCodeOf(error);
  if (code && DNS_ERROR_CODES.includes(code)) {
    return { class: 'dns', message: 'The URL of the Management System could not be resolved', retriable: false };
  }
  if (code && TIMEOUT_ERROR_CODES.includes(code)) {
    return { class: 'timeout', message: `Failed to connect to Management System: ${code}`, retriable: true };
  }
  if ((code && NETWORK_ERROR_CODES.includes(code)) || isFetchFailure(error)) {
    const reason = code ?? message;
    return { class: 'network', message: `Failed to connect to Management System: ${reason}`, retriable: true };
  }

  return { class: 'unknown', message, retriable: false };
}
