import { createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { setTimeout as delay } from 'node:timers/promises';

import { MsError, MsHttpError, serverMessageOf } from '../http/errors';
import type { MsWorkload, MsWorkloadVersion } from '../types/ms';
import { nodesFileSchema, workloadsFileSchema } from '../types/work-files';
import { archiveKindOf, extractTarArchive, gunzipFile } from '../utils/archive';
import { applyListFilter, formatSize, matchesFilter, parseDateArg, parseSize } from '../utils/filters';
import { isPlainRecord } from '../utils/json';
import { readWorkFile, readWorkFileAs, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';
import { cleanWorkloadDefinition } from './workload-definition';

export type MsWorkloadsAction = 'list' | 'copy' | 'delete' | 'deploy';

export interface MsWorkloadsOptions {
  action: MsWorkloadsAction;
  file: string;
  /** Directory below the work directory that `copy` downloads into. */
  path: string;
  type?: string;
  name?: string;
  id?: string;
  disabled?: boolean;
  versionName?: string;
  versionReleaseName?: string;
  versionSizeAbove?: string;
  versionDateOlderThan?: string;
  versionListFilter?: string;
  nodesFile: string;
  wait?: boolean;
  pollIntervalMs?: number;
  pollAttempts?: number;
}

export type ListedVersion = MsWorkloadVersion & { overall_size: number };

export type ListedWorkload = MsWorkload & { versions: ListedVersion[] };

const DEFAULT_POLL_INTERVAL_MS = 5_000;
const DEFAULT_POLL_ATTEMPTS = 120;
const DEPLOYMENT_DONE = ['finished', 'success', 'successful', 'completed', 'done'];
const DEPLOYMENT_FAILED = ['failed', 'error', 'canceled', 'cancelled'];

function versionSize(version: MsWorkloadVersion): number {
  return (version.files ?? []).reduce((total, file) => total + (Number(file.size) || 0), 0);
}

function timestampOf(value: string | undefined): number {
  const parsed = value ? Date.parse(value) : Number.NaN;
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Applies the version filters in order: names, size, age, then the slice over versions sorted by creation date.
 */
export function filterVersions(versions: MsWorkloadVersion[], options: MsWorkloadsOptions): ListedVersion[] {
  let selected: ListedVersion[] = versions
    .filter((version) => matchesFilter(options.versionName, version.name))
    .filter((version) => matchesFilter(options.versionReleaseName, version.releaseName))
    .map((version) => ({ ...version, overall_size: versionSize(version) }));

  if (options.versionSizeAbove) {
    const limit = parseSize(options.versionSizeAbove);
    selected = selected.filter((version) => version.overall_size > limit);
  }

  if (options.versionDateOlderThan) {
    const limit = parseDateArg(options.versionDateOlderThan).getTime();
    selected = selected.filter((version) => {
      const modified = version.updatedAt ?? version.createdAt;
      return modified !== undefined && timestampOf(modified) < limit;
    });
  }

  if (options.versionListFilter) {
    const sorted = selected.slice().sort((a, b) => timestampOf(a.createdAt) - timestampOf(b.createdAt));
    selected = applyListFilter(sorted, options.versionListFilter);
  }

  return selected;
}

function containerNameOf(version: MsWorkloadVersion): string | undefined {
  const properties = isPlainRecord(version.workloadProperties)
    ? version.workloadProperties
    : isPlainRecord(version.workloadSpecificProperties)
      ? version.workloadSpecificProperties
      : undefined;
  if (!properties) {
    return undefined;
  }
  return typeof properties.container_name === 'string' ? properties.container_name : '';
}

function logWorkload(context: WorkflowContext, workload: MsWorkload, versions: ListedVersion[]): void {
  context.logger.info(
    "%s%s Workload '%s' (%s):",
    workload.type,
    workload.internalDockerRegistry ? ' (internal registry)' : '',
    workload.name,
    workload._id
  );

  for (const version of versions) {
    const label = version.releaseName && version.releaseName !== version.name
      ? `'${version.name}'/'${version.releaseName}'`
      : `'${version.name}'`;
    const containerName = workload.type === 'docker' ? containerNameOf(version) : undefined;
    context.logger.info(
      '    Version %s (%s)%s',
      label,
      formatSize(version.overall_size),
      containerName === undefined ? '' : ` Container name: '${containerName}'`
    );
  }
}

/**
 * Folds the descriptor shipped inside a docker-compose export into the saved definition.
 */
function mergeComposeDescriptor(definition: Record<string, unknown>, descriptor: Record<string, unknown>): void {
  const version = isPlainRecord(descriptor.version) ? descriptor.version : {};
  const versions: unknown[] = Array.isArray(definition.versions) ? definition.versions : [];
  const target = versions[0];
  if (!isPlainRecord(target)) {
    return;
  }

  const specific: unknown[] = Array.isArray(version.workloadSpecific) ? version.workloadSpecific : [{}];
  target.workloadSpecificProperties = specific[0] ?? {};
  target.selectors = Array.isArray(version.selectors) ? version.selectors : [];
  target.remoteConnections = Array.isArray(version.remoteConnections) ? version.remoteConnections : [];
}

async function renameToOriginalNames(
  context: WorkflowContext,
  saveDir: string,
  descriptor: Record<string, unknown>
): Promise<void> {
  const version = isPlainRecord(descriptor.version) ? descriptor.version : {};
  const files: unknown[] = Array.isArray(version.files) ? version.files : [];
  for (const file of files) {
    if (!isPlainRecord(file) || typeof file.name !== 'string' || typeof file.originalName !== 'string') {
      continue;
    }
    const name = file.name.endsWith('.gz') ? file.name.slice(0, -'.gz'.length) : file.name;
    if (!name || !file.originalName || name === file.originalName) {
      continue;
    }

    const from = path.join(saveDir, name);
    try {
      await fs.rename(from, path.join(saveDir, file.originalName));
      context.logger.info('Renamed file %s to %s', name, file.originalName);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
}

async function copyVersion(
  context: WorkflowContext,
  options: MsWorkloadsOptions,
  workload: MsWorkload,
  version: ListedVersion
): Promise<ListedVersion> {
  const { client, logger } = context;
  const detailed = await client.workloads.version(workload._id, version._id);
  const saveDir = path.join(context.workDir, options.path, workload.name, version.name);

  const container = { ...workload, versions: [detailed] };
  await writeWorkFile(saveDir, 'wl_def.json', cleanWorkloadDefinition(container));

  const download = await client.workloads.exportVersion(workload._id, version._id);
  const archivePath = path.join(saveDir, path.basename(download.fileName));
  await pipeline(download.content, createWriteStream(archivePath));
  logger.info('Downloaded and saved file: %s', download.fileName);

  const kind = archiveKindOf(download.fileName);
  if (!kind) {
    return { ...detailed, overall_size: version.overall_size };
  }

  logger.info('Extracting archive: %s', archivePath);
  const contained = await extractTarArchive(archivePath, saveDir, kind);
  logger.debug('Extracted files: %s', contained.join(', '));
  await fs.rm(archivePath, { force: true });

  let descriptor: Record<string, unknown> | undefined;
  for (const file of contained) {
    if (file.endsWith('.gz')) {
      const packed = path.join(saveDir, file);
      logger.info('Extracting gzipped file: %s', packed);
      await gunzipFile(packed, packed.slice(0, -'.gz'.length));
      await fs.rm(packed, { force: true });
    }

    if (file.endsWith('.json')) {
      logger.info('JSON file included: %s', file);
      const content = await readWorkFile(saveDir, file);
      const definition = await readWorkFile(saveDir, 'wl_def.json');
      if (!isPlainRecord(content) || !isPlainRecord(definition)) {
        continue;
      }
      descriptor = content;
      if (content.type === 'docker-compose') {
        mergeComposeDescriptor(definition, content);
      }
      await writeWorkFile(saveDir, 'wl_def.json', cleanWorkloadDefinition(definition));
    }
  }

  if (descriptor) {
    await renameToOriginalNames(context, saveDir, descriptor);
  }

  return { ...detailed, overall_size: version.overall_size };
}

async function listWorkloads(
  context: WorkflowContext,
  options: MsWorkloadsOptions,
  copy: boolean
): Promise<ListedWorkload[]> {
  const { client } = context;
  const output: ListedWorkload[] = [];

  for (const workload of await client.workloads.list()) {
    if (
      !matchesFilter(options.name, workload.name) ||
      !matchesFilter(options.type, workload.type) ||
      !matchesFilter(options.id, workload._id)
    ) {
      continue;
    }
    if (!options.disabled && workload.disabled === true) {
      continue;
    }

    const versions = workload.versions ?? (await client.workloads.versions(workload._id));
    let selected = filterVersions(versions, options);
    if (selected.length === 0) {
      continue;
    }

    if (copy) {
      const copied: ListedVersion[] = [];
      for (const version of selected) {
        copied.push(await copyVersion(context, options, workload, version));
      }
      selected = copied;
    }

    logWorkload(context, workload, selected);
    output.push({ ...workload, versions: selected });
  }

  await writeWorkFile(context.workDir, options.file, output);
  return output;
}

async function deleteWorkloads(context: WorkflowContext, options: MsWorkloadsOptions): Promise<string[]> {
  const { client, logger } = context;
  const workloads = await readWorkFileAs(context.workDir, options.file, workloadsFileSchema);
  const deleted: string[] = [];

  for (const workload of workloads) {
    for (const version of workload.versions ?? []) {
      try {
        await client.workloads.deleteVersion(workload._id, version._id);
        logger.info("Workload version '%s' of '%s' deleted", version.name, workload.name);
      } catch (error) {
        if (!(error instanceof MsHttpError)) {
          throw error;
        }
        logger.warn('Workload version cannot be removed: %s', serverMessageOf(error.details) ?? error.message);
      }
    }

    const remaining = await client.workloads.versions(workload._id);
    if (remaining.length === 0) {
      await client.workloads.delete(workload._id);
      logger.info("Workload '%s' deleted", workload.name);
      deleted.push(workload._id);
    }
  }

  return deleted;
}

async function waitForDeployment(
  context: WorkflowContext,
  options: MsWorkloadsOptions,
  operationId: string
): Promise<void> {
  const attempts = options.pollAttempts ?? DEFAULT_POLL_ATTEMPTS;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const deployment = await context.client.workloads.deploymentStatus(operationId);
    const status = (deployment.status ?? '').toLowerCase();
    if (DEPLOYMENT_DONE.includes(status)) {
      context.logger.info('Deployment %s finished', operationId);
      return;
    }
    if (DEPLOYMENT_FAILED.includes(status)) {
      throw new MsError(`Deployment ${operationId} ended with status '${deployment.status}'`, 'MS_DEPLOYMENT_FAILED');
    }
    context.logger.debug('Deployment %s is %s (poll %d/%d)', operationId, status || 'pending', attempt, attempts);
    await delay(options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  }
  throw new MsError(`Deployment ${operationId} did not finish after ${attempts} polls`, 'MS_DEPLOYMENT_TIMEOUT');
}

async function deployWorkloads(context: WorkflowContext, options: MsWorkloadsOptions): Promise<string[]> {
  const { client, logger } = context;
  const nodes = await readWorkFileAs(context.workDir, options.nodesFile, nodesFileSchema);
  const workloads = await readWorkFileAs(context.workDir, options.file, workloadsFileSchema);
  const serialNumbers = nodes.map((node) => node.serialNumber);
  const operations: string[] = [];

  for (const workload of workloads) {
    const listed = workload.versions ?? [];
    let version = listed.at(-1);
    if (listed.length > 1) {
      logger.warn('Workload %s has no specific version defined, last version will be selected', workload.name);
    } else if (!version) {
      logger.warn('Workload %s has no specific version defined, latest version will be selected', workload.name);
      const available = await client.workloads.versions(workload._id);
      version = available.slice().sort((a, b) => timestampOf(a.createdAt) - timestampOf(b.createdAt)).at(-1);
    }
    if (!version) {
      logger.error('Workload %s has no versions to deploy', workload.name);
      continue;
    }

    const deployment = await client.workloads.deploy({
      deployName: `${workload.name}_${version.name}`,
      workloadId: workload._id,
      versionId: version._id,
      serialNumbers
    });
    const operationId = deployment.operationId ?? deployment._id;
    logger.info("Deploying '%s' version '%s' to %d node(s)", workload.name, version.name, serialNumbers.length);

    if (operationId) {
      operations.push(operationId);
      if (options.wait) {
        await waitForDeployment(context, options, operationId);
      }
    } else if (options.wait) {
      logger.warn('Deployment of %s returned no operation id, not waiting for it', workload.name);
    }
  }

  return operations;
}

export async function runMsWorkloads(
  context: WorkflowContext,
  options: MsWorkloadsOptions
): Promise<ListedWorkload[] | string[]> {
  switch (options.action) {
    case 'list':
      return listWorkloads(context, options, false);
    case 'copy':
      return listWorkloads(context, options, true);
    case 'delete':
      return deleteWorkloads(context, options);
    case 'deploy':
      return deployWorkloads(context, options);
  }
}
