import path from 'node:path';
import { buffer } from 'node:stream/consumers';

import archiver from 'archiver';
import YAML from 'yaml';

import { MsHttpError, MsValidationError, serverMessageOf } from '../http/errors';
import type { DnaConfiguration } from '../namespaces/dna';
import { nodesFileSchema } from '../types/work-files';
import { isPlainRecord } from '../utils/json';
import { readWorkFile, readWorkFileAs, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';

export const DNA_ARCHIVE_NAME = 'config.zip';

export type NodesDnaAction =
  | { kind: 'getCurrent'; stripHash: boolean }
  | { kind: 'getTarget'; stripHash: boolean }
  | { kind: 'status' }
  | {
      kind: 'putTarget';
      /** Comma separated work files. */
      dnaFiles: string;
      restartAllWorkloads: boolean;
      continueAfterRestart: boolean;
    };

export interface NodesDnaOptions {
  file: string;
  action: NodesDnaAction;
}

/** Drops the `hash` of every workload listed in each configuration file. */
export function stripHashes(configuration: DnaConfiguration): DnaConfiguration {
  const stripped: DnaConfiguration = {};
  for (const [fileName, content] of Object.entries(configuration)) {
    if (isPlainRecord(content) && Array.isArray(content.workloads)) {
      const workloads = content.workloads.map((workload: unknown) => {
        if (!isPlainRecord(workload)) {
          return workload;
        }
        const { hash: _hash, ...rest } = workload;
        return rest;
      });
      stripped[fileName] = { ...content, workloads };
    } else {
      stripped[fileName] = content;
    }
  }
  return stripped;
}

/**
 * Zips the work files under their base names. Structured content (JSON or YAML files) is stored as YAML.
 */
export async function packDnaFiles(workDir: string, fileNames: string[]): Promise<Buffer> {
  if (fileNames.length === 0) {
    throw new MsValidationError('No DNA file given');
  }
  const entries: Array<{ name: string; content: string }> = [];
  for (const fileName of fileNames) {
    const content = await readWorkFile(workDir, fileName);
    if (content === undefined) {
      throw new MsValidationError(`DNA file '${fileName}' does not exist`);
    }
    entries.push({
      name: path.basename(fileName),
      content: typeof content === 'string' ? content : YAML.stringify(content, { indent: 4 })
    });
  }

  const archive = archiver('zip', { store: true });
  const zipped = buffer(archive);
  for (const entry of entries) {
    archive.append(entry.content, { name: entry.name });
  }
  const [, zip] = await Promise.all([archive.finalize(), zipped]);
  return zip;
}

async function saveConfiguration(
  context: WorkflowContext,
  serialNumber: string,
  configuration: DnaConfiguration
): Promise<void> {
  const nodeDir = path.join(context.workDir, serialNumber);
  for (const [fileName, content] of Object.entries(configuration)) {
    if (path.basename(fileName) !== fileName) {
      throw new MsValidationError(`DNA file name '${fileName}' of node ${serialNumber} is not a plain file name`);
    }
    await writeWorkFile(nodeDir, fileName, content);
  }
}

function statusText(status: unknown): string {
  return typeof status === 'string' ? status : JSON.stringify(status);
}

export async function runNodesDna(context: WorkflowContext, options: NodesDnaOptions): Promise<void> {
  const { client, logger, workDir } = context;
  const nodes = await readWorkFileAs(workDir, options.file, nodesFileSchema);
  const { action } = options;

  const archive =
    action.kind === 'putTarget'
      ? await packDnaFiles(
          workDir,
          action.dnaFiles
            .split(',')
            .map((name) => name.trim())
            .filter(Boolean)
        )
      : undefined;

  for (const node of nodes) {
    switch (action.kind) {
      case 'getCurrent':
      case 'getTarget': {
        const fetched =
          action.kind === 'getCurrent'
            ? await client.dna.current(node.serialNumber)
            : await client.dna.target(node.serialNumber);
        const configuration = action.stripHash ? stripHashes(fetched) : fetched;
        await saveConfiguration(context, node.serialNumber, configuration);
        logger.info(
          '%s DNA configuration of node %s:\n%s',
          action.kind === 'getCurrent' ? 'Current' : 'Target',
          node.name,
          YAML.stringify(configuration, { indent: 4 })
        );
        break;
      }
      case 'status': {
        let status: unknown;
        try {
          status = await client.dna.status(node.serialNumber);
        } catch (error) {
          if (!(error instanceof MsHttpError)) {
            throw error;
          }
          status =
            error.status === 404 ? (serverMessageOf(error.details) ?? error.message) : (error.details ?? error.message);
        }
        logger.info("DNA status of node '%s': %s", node.name.padStart(25), statusText(status));
        break;
      }
      case 'putTarget':
        if (archive) {
          await client.dna.putTarget(node.serialNumber, {
            archive,
            fileName: DNA_ARCHIVE_NAME,
            continueAfterRestart: action.continueAfterRestart,
            restartAllWorkloads: action.restartAllWorkloads
          });
          logger.info('DNA configuration deployed to node %s', node.name);
        }
        break;
    }
  }
}
