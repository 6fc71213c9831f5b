import type { MsNode, MsNodeWorkload } from '../types/ms';
import { nodesFileSchema, type NodeEntry, type NodeWorkloadEntry } from '../types/work-files';
import { matchesFilter } from '../utils/filters';
import { isPlainRecord, tryParseJson } from '../utils/json';
import { readWorkFile, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';

export const WORKLOAD_STATES = [
  'IDLE',
  'CREATING',
  'REMOVING',
  'SUSPENDING',
  'SUSPENDED',
  'STARTING',
  'RESTARTING',
  'RESUMING',
  'STARTED',
  'STOPPING',
  'STOPPED',
  'ERROR',
  'REMOVING_FAILED',
  'PARTIALLY_RUNNING'
] as const;

export const WORKLOAD_TYPES = ['docker', 'codesys', 'vm', 'docker-compose'] as const;

export interface NodesListOptions {
  file: string;
  add?: boolean;
  nodeConnected?: boolean;
  nodeName?: string;
  nodePath?: string;
  nodeVersion?: string;
  nodeModel?: string;
  nodeLabels?: string;
  workloadName?: string;
  workloadId?: string;
  workloadVersionName?: string;
  workloadVersionId?: string;
  workloadStatus?: string;
  workloadType?: string;
}

export interface ListedNode extends MsNode {
  model: string;
  labels: Array<{ key: string; value: string }>;
  path: string[];
  workloads?: NodeWorkloadEntry[];
}

/**
 * Keys leading from the tree root to the object whose `name` is `nodeName`. Array indices are not part of the
 * path, so for a folder tree the result is the folder names.
 */
export function findNodePath(tree: unknown, nodeName: string, path: string[] = []): string[] | undefined {
  if (Array.isArray(tree)) {
    for (const item of tree) {
      const found = findNodePath(item, nodeName, path);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  if (!isPlainRecord(tree)) {
    return undefined;
  }

  for (const [key, value] of Object.entries(tree)) {
    if (key === 'name' && value === nodeName) {
      return path;
    }
    const found = findNodePath(value, nodeName, [...path, key]);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function serviceProperty(workload: MsNodeWorkload, serviceName: string, propertyName: string) {
  return workload.service_list
    .find((service) => service.name === serviceName)
    ?.property_list.find((property) => property.name === propertyName);
}

/**
 * `VMControlService.State` holds an index into its own option list.
 */
export function workloadState(workload: MsNodeWorkload): string | undefined {
  const property = serviceProperty(workload, 'VMControlService', 'State');
  if (!property) {
    return undefined;
  }

  const { options, value } = property;
  if (Array.isArray(options) && typeof value === 'number') {
    const state: unknown = options[value];
    return typeof state === 'string' ? state : undefined;
  }
  if (isPlainRecord(options) && (typeof value === 'string' || typeof value === 'number')) {
    const state = options[String(value)];
    return typeof state === 'string' ? state : undefined;
  }
  return undefined;
}

export function workloadVersionName(workload: MsNodeWorkload): string | undefined {
  const property = serviceProperty(workload, 'WiseConfigurationService', 'Value');
  const config = typeof property?.value === 'string' ? tryParseJson(property.value) : undefined;
  return isPlainRecord(config) && typeof config.workloadVersionName === 'string' ? config.workloadVersionName : undefined;
}

function hasWorkloadFilter(options: NodesListOptions): boolean {
  return Boolean(
    options.workloadName ||
      options.workloadId ||
      options.workloadVersionId ||
      options.workloadType ||
      options.workloadStatus ||
      options.workloadVersionName
  );
}

function selectWorkloads(workloads: MsNodeWorkload[], options: NodesListOptions): NodeWorkloadEntry[] {
  const selected: NodeWorkloadEntry[] = [];
  for (const workload of workloads) {
    if (
      !matchesFilter(options.workloadName, workload.device_name) ||
      !matchesFilter(options.workloadId, workload.workloadId) ||
      !matchesFilter(options.workloadVersionId, workload.versionId) ||
      !matchesFilter(options.workloadType, workload.type)
    ) {
      continue;
    }

    const state = workloadState(workload);
    if (!matchesFilter(options.workloadStatus, state)) {
      continue;
    }

    const versionName = workloadVersionName(workload);
    if (!matchesFilter(options.workloadVersionName, versionName)) {
      continue;
    }

    selected.push({
      name: workload.device_name,
      type: workload.type,
      _id: workload.workloadId,
      version_id: workload.versionId,
      version_name: versionName,
      state,
      device_id: workload.id
    });
  }
  return selected;
}

/**
 * Replaces entries with the same serial number and appends the rest.
 */
export function mergeNodeLists(existing: NodeEntry[], added: NodeEntry[]): NodeEntry[] {
  const merged = existing.slice();
  for (const node of added) {
    const index = merged.findIndex((item) => item.serialNumber === node.serialNumber);
    if (index === -1) {
      merged.push(node);
    } else {
      merged[index] = node;
    }
  }
  return merged;
}

export async function runNodesList(context: WorkflowContext, options: NodesListOptions): Promise<ListedNode[]> {
  const { client, logger } = context;
  const nodes = await client.nodes.list();
  const tree = await client.nodes.tree();
  const output: ListedNode[] = [];

  for (const node of nodes) {
    if (!matchesFilter(options.nodeName, node.name) || !matchesFilter(options.nodeVersion, node.currentFWVersion)) {
      continue;
    }

    const details = await client.nodes.details(node.serialNumber);
    const model = details.model ?? 'N/A';
    if (!matchesFilter(options.nodeModel, model)) {
      continue;
    }

    const labels = details.labels.map((label) => ({ key: label.key, value: label.value }));
    const labelText = labels.map((label) => `key=${label.key}/value=${label.value}`).join(',');
    if (!matchesFilter(options.nodeLabels, labelText)) {
      continue;
    }

    const path = findNodePath(tree, node.name) ?? [];
    if (!matchesFilter(options.nodePath, path.join('/'))) {
      continue;
    }

    const online = node.connectionStatus === 'online';
    if (options.nodeConnected && !online) {
      continue;
    }

    const listed: ListedNode = { ...node, model, labels, path };
    if (online) {
      listed.workloads = selectWorkloads(await client.nodes.workloads(node.serialNumber), options);
    }

    if (hasWorkloadFilter(options) && (!online || !listed.workloads?.length)) {
      continue;
    }

    const workloadLines = (listed.workloads ?? []).map(
      (workload) =>
        `Name: ${workload.name.padEnd(20)}, Version: ${(workload.version_name ?? '').padEnd(20)}, Status: ${workload.state ?? ''}`
    );
    logger.info(
      "Node '%s' (%s): \n    status   : %s\n    Path     : %s\n    Workloads: - %s",
      node.name,
      node.serialNumber,
      node.connectionStatus ?? 'unknown',
      path.join('/'),
      workloadLines.join('\n               - ')
    );

    output.push(listed);
  }

  if (options.add) {
    const current = nodesFileSchema.safeParse(await readWorkFile(context.workDir, options.file));
    const existing = current.success ? current.data : [];
    if (!current.success) {
      logger.debug('No readable node list in %s, starting a new one', options.file);
    }
    await writeWorkFile(context.workDir, options.file, mergeNodeLists(existing, output));
  } else {
    await writeWorkFile(context.workDir, options.file, output);
  }

  return output;
}
