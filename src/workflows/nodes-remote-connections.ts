import { isDeepStrictEqual } from 'node:util';

import { MsValidationError } from '../http/errors';
import type { MsRemoteConnection } from '../types/ms';
import { nodesFileSchema, remotesFileSchema, type NodeEntry } from '../types/work-files';
import { formatJson } from '../utils/json';
import type { OpenUrlFn } from '../utils/open-url';
import { readWorkFileAs, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';

export const REMOTE_TEMPLATES = ['tunnel', 'screen', 'first_node'] as const;

export type RemoteTemplate = (typeof REMOTE_TEMPLATES)[number];

export type RemoteConnectionsAction =
  | { kind: 'template'; template: RemoteTemplate }
  | { kind: 'list' }
  | { kind: 'add' }
  | { kind: 'delete' }
  | { kind: 'establish' };

export interface RemoteConnectionsOptions {
  file: string;
  remotesFile: string;
  action: RemoteConnectionsAction;
  openUrl: OpenUrlFn;
}

type RemoteEntry = Record<string, unknown>;

/** Server-side bookkeeping that never appears in a remotes file. */
const SERVER_KEYS = ['uniqueConnectionRequestNo', 'workloadId', 'versionId', 'serialNumber'];

const TUNNEL_TEMPLATE: RemoteEntry[] = [
  {
    hostname: '172.20.2.1',
    localPort: 3333,
    port: 3333,
    acknowledgment: 'No',
    type: 'TUNNEL',
    name: 'LocalUi'
  }
];

const SCREEN_TEMPLATE: RemoteEntry[] = [
  {
    hostname: '172.20.2.20',
    securityMode: 'any',
    ignoreServerCertificate: true,
    password: '',
    username: 'admin',
    connection: 'RDP',
    swapRedBlue: false,
    readOnly: false,
    cursor: '',
    autoretry: 1,
    numberOfConnections: 1,
    port: 3389,
    acknowledgment: 'No',
    type: 'SCREEN',
    name: 'screen_test'
  }
];

function stripKeys(remote: MsRemoteConnection, keys: string[]): RemoteEntry {
  return Object.fromEntries(Object.entries(remote).filter(([key]) => !keys.includes(key)));
}

/**
 * First remote for which every key of `entry` is present with an equal value.
 */
export function findMatchingRemote<T extends RemoteEntry>(entry: RemoteEntry, remotes: T[]): T | undefined {
  return remotes.find((remote) =>
    Object.entries(entry).every(([key, value]) => key in remote && isDeepStrictEqual(remote[key], value))
  );
}

async function existingRemotes(context: WorkflowContext, node: NodeEntry): Promise<RemoteEntry[]> {
  const remotes = await context.client.nodes.remoteConnections(node.serialNumber);
  return remotes.map((remote) => stripKeys(remote, SERVER_KEYS));
}

async function readNodes(context: WorkflowContext, options: RemoteConnectionsOptions): Promise<NodeEntry[]> {
  return readWorkFileAs(context.workDir, options.file, nodesFileSchema);
}

async function writeTemplate(
  context: WorkflowContext,
  options: RemoteConnectionsOptions,
  template: RemoteTemplate
): Promise<RemoteEntry[]> {
  if (template === 'tunnel' || template === 'screen') {
    const remotes = template === 'tunnel' ? TUNNEL_TEMPLATE : SCREEN_TEMPLATE;
    await writeWorkFile(context.workDir, options.remotesFile, remotes);
    return remotes;
  }

  const [first] = await readNodes(context, options);
  if (!first) {
    throw new MsValidationError(`No nodes found in the file: ${options.file}`);
  }
  const remotes = (await context.client.nodes.remoteConnections(first.serialNumber)).map((remote) =>
    stripKeys(remote, [...SERVER_KEYS, '_id'])
  );
  await writeWorkFile(context.workDir, options.remotesFile, remotes);
  return remotes;
}

/**
 * Returns the remote connections the action touched, keyed by node name.
 */
export async function runNodesRemoteConnections(
  context: WorkflowContext,
  options: RemoteConnectionsOptions
): Promise<Record<string, RemoteEntry[]>> {
  const { client, logger, workDir } = context;
  const { action } = options;

  if (action.kind === 'template') {
    return { template: await writeTemplate(context, options, action.template) };
  }

  const nodes = await readNodes(context, options);

  if (action.kind === 'list') {
    const listed: Record<string, RemoteEntry[]> = {};
    for (const node of nodes) {
      const remotes = await existingRemotes(context, node);
      if (remotes.length > 0) {
        listed[node.name] = remotes;
      }
    }
    logger.info('Remote connections for the nodes: \n%s', formatJson(listed));
    return listed;
  }

  const fileRemotes = await readWorkFileAs(workDir, options.remotesFile, remotesFileSchema);
  const touched: Record<string, RemoteEntry[]> = {};

  if (action.kind === 'add') {
    const pending: Array<{ node: NodeEntry; remotes: RemoteEntry[] }> = [];
    for (const node of nodes) {
      const current = await existingRemotes(context, node);
      const missing = fileRemotes.filter((remote) => !findMatchingRemote(remote, current));
      if (missing.length > 0) {
        pending.push({ node, remotes: missing });
        touched[node.name] = missing;
      }
    }
    logger.info('Adding following remote_connections: \n%s', formatJson(touched));
    for (const { node, remotes } of pending) {
      await client.nodes.addRemoteConnections(node.serialNumber, remotes);
    }
    return touched;
  }

  if (action.kind === 'delete') {
    const pending: Array<{ node: NodeEntry; remotes: RemoteEntry[] }> = [];
    for (const node of nodes) {
      const current = await existingRemotes(context, node);
      const matched = fileRemotes
        .map((remote) => findMatchingRemote(remote, current))
        .filter((remote): remote is RemoteEntry => remote !== undefined);
      if (matched.length > 0) {
        pending.push({ node, remotes: matched });
        touched[node.name] = matched;
      }
    }
    logger.info('Removing following remote connections: \n%s', formatJson(touched));
    for (const { node, remotes } of pending) {
      for (const remote of remotes) {
        if (typeof remote._id !== 'string') {
          logger.warn("Remote connection '%s' on node %s has no id and cannot be removed", String(remote.name), node.name);
          continue;
        }
        await client.nodes.removeRemoteConnection(node.serialNumber, remote._id);
      }
    }
    return touched;
  }

  for (const node of nodes) {
    const current = await existingRemotes(context, node);
    for (const remote of fileRemotes) {
      const match = findMatchingRemote(remote, current);
      if (!match || typeof match._id !== 'string') {
        continue;
      }

      logger.info('Establishing remote connection for node %s: %s', node.name, String(remote.name ?? match.name));
      const url = await client.nodes.remoteConnectionUrl(node.serialNumber, match._id);
      options.openUrl(url);
      touched[node.name] = [...(touched[node.name] ?? []), match];
    }
  }
  return touched;
}
