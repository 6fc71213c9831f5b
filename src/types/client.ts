import type { Logger } from 'pino';

import type { EndpointSpec } from './endpoints';
import type { Transport } from '../http/transport';
import type { SessionStore } from '../secure/session-store';
import type { DnaNamespace } from '../namespaces/dna';
import type { LabelsNamespace } from '../namespaces/labels';
import type { NodesNamespace } from '../namespaces/nodes';
import type { ServiceOsDnaNamespace } from '../namespaces/service-os-dna';
import type { WorkloadsNamespace } from '../namespaces/workloads';

export interface MsCallArgs {
  path?: Record<string, string | number>;
  query?: Record<string, string | number | boolean | null | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface MsCallResult {
  status: number;
  headers: Record<string, string>;
  data: unknown;
  durationMs: number;
  retryCount: number;
  attempts: number;
}

export type EndpointCall = (endpointKey: string, args?: MsCallArgs) => Promise<MsCallResult>;

export interface MsClientOptions {
  /** Host name, optionally with a scheme; `https://` is assumed otherwise. */
  host: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryBackoffMs?: number;
  sessionStore?: SessionStore;
  transport?: Transport;
  logger?: Logger;
}

export interface MsClient {
  readonly host: string;
  nodes: NodesNamespace;
  workloads: WorkloadsNamespace;
  labels: LabelsNamespace;
  serviceOsDna: ServiceOsDnaNamespace;
  dna: DnaNamespace;
  call(endpointKey: string, args?: MsCallArgs): Promise<unknown>;
  callWithMeta(endpointKey: string, args?: MsCallArgs): Promise<MsCallResult>;
  login(): Promise<string>;
  logout(): Promise<void>;
  describeEndpoint(key: string): EndpointSpec;
  listEndpoints(): EndpointSpec[];
}
