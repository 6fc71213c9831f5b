import { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';

import { MsHttpError } from './errors';
import { getLogger } from '../observability/logger';
import { withSpan } from '../observability/tracing';

/**
 * `stream` hands a successful body back as a `Readable` for the caller to pipe (downloads); `auto` parses it by
 * content type.
 */
export type ResponseType = 'auto' | 'stream';

export interface TransportOptions {
  /** Covers connecting and receiving the response headers, not reading the body. */
  timeoutMs?: number;
  retryAttempts?: number;
  retryBackoffMs?: number;
  logger?: Logger;
}

export interface TransportRequest {
  endpointKey?: string;
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string | FormData;
  responseType?: ResponseType;
}

export interface TransportMeta {
  durationMs: number;
  attempts: number;
  retryCount: number;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
  meta: TransportMeta;
}

/**
 * Minimal surface the client needs, so tests can hand in a stub.
 */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

const IDEMPOTENT_METHODS = ['GET', 'PUT', 'DELETE'];

function headerMap(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

async function readBody(response: Response, responseType: ResponseType): Promise<unknown> {
  if (responseType === 'stream' && response.ok) {
    return response.body ? Readable.fromWeb(response.body) : Readable.from([]);
  }

  const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      return undefined;
    }
  }

  const text = await response.text();
  return text ? { message: text } : undefined;
}

/** Socket failures, timeouts and 5xx answers. */
function isTransient(error: unknown): boolean {
  if (error instanceof MsHttpError) {
    return error.status >= 500;
  }
  return error instanceof TypeError || (error instanceof Error && error.name === 'AbortError');
}

export class HttpTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly logger: Logger;

  constructor(options: TransportOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.retryAttempts = options.retryAttempts ?? 2;
    this.retryBackoffMs = options.retryBackoffMs ?? 250;
  }

  private async attempt(request: TransportRequest): Promise<{ response: Response; data: unknown }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal
    }).finally(() => clearTimeout(timeout));

    const data = await readBody(response, request.responseType ?? 'auto');
    if (!response.ok) {
      throw new MsHttpError({
        message: `HTTP ${response.status} ${response.statusText}`,
        status: response.status,
        statusText: response.statusText,
        endpointKey: request.endpointKey,
        details: data
      });
    }
    return { response, data };
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const maxAttempts = IDEMPOTENT_METHODS.includes(request.method.toUpperCase()) ? this.retryAttempts + 1 : 1;
    const started = Date.now();

    return withSpan(
      'nerve.http.request',
      {
        'nerve.endpoint.key': request.endpointKey ?? 'unknown',
        'http.method': request.method,
        'http.url': request.url
      },
      async (span) => {
        for (let attempt = 1; ; attempt += 1) {
          try {
            const { response, data } = await this.attempt(request);
            const durationMs = Date.now() - started;
            span.setAttribute('http.status_code', response.status);
            span.setAttribute('nerve.attempt', attempt);
            this.logger.debug(
              { endpointKey: request.endpointKey, attempts: attempt },
              'HTTP %s %s -> %d (%dms)',
              request.method,
              request.url,
              response.status,
              durationMs
            );

            return {
              status: response.status,
              headers: headerMap(response.headers),
              data,
              meta: { durationMs, attempts: attempt, retryCount: attempt - 1 }
            };
          } catch (error) {
            const retry = attempt < maxAttempts && isTransient(error);
            this.logger.debug(
              { endpointKey: request.endpointKey, err: error },
              'HTTP %s %s failed on attempt %d%s',
              request.method,
              request.url,
              attempt,
              retry ? ', retrying' : ''
            );
            if (!retry) {
              span.setAttribute('nerve.attempt', attempt);
              throw error;
            }
            await delay(this.retryBackoffMs * attempt);
          }
        }
      }
    );
  }
}
