export class MsError extends Error {
  readonly code: string;

  constructor(message: string, code = 'MS_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class MsHttpError extends MsError {
  readonly status: number;
  readonly statusText: string;
  readonly endpointKey?: string;
  readonly details?: unknown;

  constructor(args: {
    message: string;
    status: number;
    statusText: string;
    endpointKey?: string;
    details?: unknown;
  }) {
    super(args.message, 'MS_HTTP_ERROR');
    this.status = args.status;
    this.statusText = args.statusText;
    this.endpointKey = args.endpointKey;
    this.details = args.details;
  }
}

export class MsAuthError extends MsError {
  constructor(message: string) {
    super(message, 'MS_AUTH_ERROR');
  }
}

export class MsValidationError extends MsError {
  constructor(message: string) {
    super(message, 'MS_VALIDATION_ERROR');
  }
}

/**
 * Raised while working out which Management System to talk to, before any request is sent.
 */
export class MsConfigError extends MsError {
  constructor(message: string, code = 'MS_CONFIG_ERROR') {
    super(message, code);
  }
}

export class MissingConfigurationError extends MsConfigError {
  constructor(message = 'No MS URL provided. Please provide the MS URL with --ms_url, in the environment variable MS_URL or in a credentials file with a single section.') {
    super(message, 'MS_MISSING_CONFIGURATION');
  }
}

export class AmbiguousCredentialsFileError extends MsConfigError {
  readonly sections: string[];

  constructor(sections: string[]) {
    super(
      `The credentials file lists ${sections.length} management systems (${sections.join(', ')}). Select one with --ms_url.`,
      'MS_AMBIGUOUS_CREDENTIALS_FILE'
    );
    this.sections = sections;
  }
}

export class MalformedCredentialsFileError extends MsConfigError {
  constructor(message: string) {
    super(message, 'MS_MALFORMED_CREDENTIALS_FILE');
  }
}

/**
 * Extracts the HTTP status from an error if it came from the transport.
 */
export function httpStatusOf(error: unknown): number | undefined {
  return error instanceof MsHttpError ? error.status : undefined;
}

/**
 * Pulls a human readable message out of an MS error payload (`[{ message }]` or `{ message }`).
 */
export function serverMessageOf(details: unknown): string | undefined {
  const first = Array.isArray(details) ? details[0] : details;
  if (first && typeof first === 'object' && 'message' in first && typeof first.message === 'string') {
    return first.message;
  }
  return undefined;
}
