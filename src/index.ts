export { createMsClient } from './client/create-client';
export { listEndpoints, getEndpoint, hasEndpoint } from './client/catalog';

export type { MsClient, MsClientOptions, MsCallArgs, MsCallResult } from './types/client';
export type { EndpointSpec, EndpointNamespace } from './types/endpoints';
export type { MsNode, MsLabel, MsWorkload, MsWorkloadVersion, MsRemoteConnection, MsDeployment } from './types/ms';

export { resolveCredentials, resolveHost, normalizeHost } from './config/credentials';
export type { ResolveCredentialsInput, ResolvedCredentials, CredentialsEnv } from './config/credentials';
export { loadCredentialsFile, parseCredentials, stringifyCredentials, storeCredentials } from './config/credentials-file';
export type { CredentialsFile, CredentialsSection } from './config/credentials-file';

export {
  MsError,
  MsHttpError,
  MsAuthError,
  MsValidationError,
  MsConfigError,
  MissingConfigurationError,
  AmbiguousCredentialsFileError,
  MalformedCredentialsFileError
} from './http/errors';

export { runWorkloadCreate } from './workflows/workload-create';
export { runMsWorkloads } from './workflows/ms-workloads';
export { runNodesList } from './workflows/nodes-list';
export { runNodesReboot } from './workflows/nodes-reboot';
export { runNodesWorkloadsState } from './workflows/nodes-workloads-state';
export { runNodesRemoteConnections } from './workflows/nodes-remote-connections';
export { runLabels } from './workflows/labels';
export { runServiceOsDna } from './workflows/service-os-dna';
export type { WorkflowContext } from './workflows/types';

export { FileSessionStore } from './secure/session-store';
export type { SessionStore, SessionRecord } from './secure/session-store';
