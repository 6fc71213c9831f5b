import {
  AmbiguousCredentialsFileError,
  MsAuthError,
  MsConfigError,
  MsHttpError,
  MsValidationError,
  serverMessageOf
} from '../http/errors';

export interface ProblemDetails {
  type: string;
  title: string;
  status?: number;
  detail: string;
  instance?: string;
  msCode: string;
  retriable: boolean;
  sections?: string[];
}

const PROBLEM_BASE = 'urn:nerve-cli:problem';

function toMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toProblemDetails(error: unknown, instance?: string): ProblemDetails {
  if (error instanceof MsHttpError) {
    return {
      type: `${PROBLEM_BASE}:http-error`,
      title: 'HTTP request failed',
      status: error.status,
      detail: serverMessageOf(error.details) ?? error.message,
      instance,
      msCode: error.code,
      retriable: error.status >= 500
    };
  }

  if (error instanceof MsAuthError) {
    return {
      type: `${PROBLEM_BASE}:auth-error`,
      title: 'Authentication required',
      status: 401,
      detail: error.message,
      instance,
      msCode: error.code,
      retriable: false
    };
  }

  if (error instanceof MsValidationError) {
    return {
      type: `${PROBLEM_BASE}:validation-error`,
      title: 'Invalid request',
      status: 400,
      detail: error.message,
      instance,
      msCode: error.code,
      retriable: false
    };
  }

  if (error instanceof MsConfigError) {
    return {
      type: `${PROBLEM_BASE}:configuration-error`,
      title: 'Management System not configured',
      detail: error.message,
      instance,
      msCode: error.code,
      retriable: false,
      sections: error instanceof AmbiguousCredentialsFileError ? error.sections : undefined
    };
  }

  return {
    type: 'about:blank',
    title: 'Unhandled error',
    status: 500,
    detail: toMessage(error),
    instance,
    msCode: 'MS_UNHANDLED_ERROR',
    retriable: false
  };
}
