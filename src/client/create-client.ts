import { getEndpoint, listEndpoints } from './catalog';
import { HttpTransport, type Transport, type TransportResponse } from '../http/transport';
import { MsAuthError, MsHttpError, MsValidationError, httpStatusOf, serverMessageOf } from '../http/errors';
import { createDnaNamespace } from '../namespaces/dna';
import { createLabelsNamespace } from '../namespaces/labels';
import { createNodesNamespace } from '../namespaces/nodes';
import { createServiceOsDnaNamespace } from '../namespaces/service-os-dna';
import { createWorkloadsNamespace } from '../namespaces/workloads';
import { getLogger } from '../observability/logger';
import { FileSessionStore, type SessionStore } from '../secure/session-store';
import type { EndpointSpec } from '../types/endpoints';
import { loginResponseSchema } from '../types/ms';
import type { MsCallArgs, MsCallResult, MsClient, MsClientOptions } from '../types/client';
import { isPlainRecord } from '../utils/json';

const SESSION_HEADER = 'sessionid';

export function toBaseUrl(host: string): string {
  return host.includes('://') ? host : `https://${host}`;
}

function withPathParams(pathTemplate: string, pathParams: EndpointSpec['pathParams'], path: MsCallArgs['path']): string {
  let compiled = pathTemplate;
  for (const param of pathParams) {
    const value = path?.[param];
    if (value === undefined || value === null) {
      throw new MsValidationError(`Missing required path parameter: ${param}`);
    }
    compiled = compiled.replaceAll(`:${param}`, encodeURIComponent(String(value)));
  }
  return compiled;
}

function withQueryParams(url: URL, query: MsCallArgs['query']): URL {
  if (!query) {
    return url;
  }
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    url.searchParams.set(key, String(value));
  }
  return url;
}

function buildBody(endpoint: EndpointSpec, body: unknown, headers: Record<string, string>): string | FormData | undefined {
  if (endpoint.bodyType === 'none' || body === undefined) {
    return undefined;
  }

  if (endpoint.bodyType === 'multipart-form') {
    if (body instanceof FormData) {
      return body;
    }
    if (isPlainRecord(body)) {
      const form = new FormData();
      for (const [key, value] of Object.entries(body)) {
        form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
      }
      return form;
    }
    throw new MsValidationError(`Endpoint ${endpoint.key} expects object/FormData for multipart body.`);
  }

  headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
  return JSON.stringify(body);
}

function toCallResult(response: TransportResponse): MsCallResult {
  return {
    status: response.status,
    headers: response.headers,
    data: response.data,
    durationMs: response.meta.durationMs,
    retryCount: response.meta.retryCount,
    attempts: response.meta.attempts
  };
}

/**
 * Client for one Management System host. Sessions are cached per host in the session store and renewed once
 * when the server rejects them.
 */
export function createMsClient(options: MsClientOptions): MsClient {
  const logger = options.logger ?? getLogger();
  const sessionStore: SessionStore = options.sessionStore ?? new FileSessionStore();
  const transport: Transport = options.transport ??
    new HttpTransport({
      timeoutMs: options.timeoutMs,
      retryAttempts: options.retryAttempts,
      retryBackoffMs: options.retryBackoffMs,
      logger
    });
  const baseUrl = toBaseUrl(options.host);

  const send = async (endpoint: EndpointSpec, args: MsCallArgs, sessionId?: string): Promise<TransportResponse> => {
    const path = withPathParams(endpoint.pathTemplate, endpoint.pathParams, args.path);
    const url = withQueryParams(new URL(path, baseUrl), args.query);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...(args.headers ?? {})
    };
    if (sessionId) {
      headers[SESSION_HEADER] = sessionId;
    }
    const body = buildBody(endpoint, args.body, headers);

    return transport.request({
      endpointKey: endpoint.key,
      method: endpoint.method,
      url: url.toString(),
      headers,
      body,
      responseType: endpoint.responseType
    });
  };

  const login = async (): Promise<string> => {
    if (!options.username || !options.password) {
      throw new MsAuthError('No username/password provided for MS login');
    }

    let response: TransportResponse;
    try {
      response = await send(getEndpoint('auth.login'), {
        body: { identity: options.username, secret: options.password }
      });
    } catch (error) {
      const status = httpStatusOf(error);
      if (error instanceof MsHttpError && (status === 401 || status === 403)) {
        throw new MsAuthError(
          `Invalid credentials for ${options.host}: ${serverMessageOf(error.details) ?? error.message}`
        );
      }
      throw error;
    }

    const parsed = loginResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new MsAuthError(`Login to ${options.host} did not return a session id`);
    }

    await sessionStore.set(options.host, {
      sessionId: parsed.data.sessionId,
      username: options.username,
      createdAt: new Date().toISOString()
    });
    logger.debug('Logged in to %s as %s', options.host, options.username);
    return parsed.data.sessionId;
  };

  const cachedSessionId = async (): Promise<string | undefined> => {
    const session = await sessionStore.get(options.host);
    if (!session) {
      return undefined;
    }
    if (options.username && session.username !== options.username) {
      return undefined;
    }
    return session.sessionId;
  };

  const callWithMeta = async (endpointKey: string, args: MsCallArgs = {}): Promise<MsCallResult> => {
    const endpoint = getEndpoint(endpointKey);
    if (!endpoint.authenticated) {
      return toCallResult(await send(endpoint, args));
    }

    const cached = await cachedSessionId();
    try {
      return toCallResult(await send(endpoint, args, cached ?? (await login())));
    } catch (error) {
      if (!cached || httpStatusOf(error) !== 401) {
        throw error;
      }
      logger.debug('Session for %s was rejected, logging in again', options.host);
      await sessionStore.clear(options.host);
      return toCallResult(await send(endpoint, args, await login()));
    }
  };

  const call = async (endpointKey: string, args: MsCallArgs = {}): Promise<unknown> => {
    const result = await callWithMeta(endpointKey, args);
    return result.data;
  };

  const logout = async (): Promise<void> => {
    const session = await sessionStore.get(options.host);
    if (!session) {
      logger.debug('No session cached for %s', options.host);
      return;
    }

    try {
      await send(getEndpoint('auth.logout'), {}, session.sessionId);
    } catch (error) {
      // An expired session is as good as a closed one.
      if (httpStatusOf(error) !== 401) {
        throw error;
      }
    } finally {
      await sessionStore.clear(options.host);
    }
  };

  return {
    host: options.host,
    nodes: createNodesNamespace(callWithMeta),
    workloads: createWorkloadsNamespace(callWithMeta),
    labels: createLabelsNamespace(callWithMeta),
    serviceOsDna: createServiceOsDnaNamespace(callWithMeta),
    dna: createDnaNamespace(callWithMeta),
    call,
    callWithMeta,
    login,
    logout,
    describeEndpoint: (key) => getEndpoint(key),
    listEndpoints: () => listEndpoints()
  };
}
