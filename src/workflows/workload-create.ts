import { promises as fs } from 'node:fs';
import path from 'node:path';

import fg from 'fast-glob';

import { MsValidationError } from '../http/errors';
import type { ProvisionFile } from '../namespaces/workloads';
import { isPlainRecord } from '../utils/json';
import { readWorkFile, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';
import {
  apiVersionFor,
  buildWorkloadTemplate,
  cleanWorkloadDefinition,
  type WorkloadTemplateType
} from './workload-definition';

export type WorkloadCreateAction = { kind: 'template'; template: WorkloadTemplateType } | { kind: 'create' };

export interface WorkloadCreateOptions {
  file: string;
  action: WorkloadCreateAction;
  /** Comma separated globs relative to the work directory. */
  path?: string;
}

export interface WorkloadCreateResult {
  written?: string;
  provisioned: string[];
  skipped: number[];
}

/**
 * Files matched by the comma separated glob list, relative to the work directory.
 */
export async function resolveWorkloadFiles(workDir: string, patterns: string | undefined): Promise<string[]> {
  const list = (patterns ?? '')
    .split(',')
    .map((pattern) => pattern.trim())
    .filter(Boolean);
  if (list.length === 0) {
    return [];
  }
  const matches = await fg(list, { cwd: workDir, absolute: true, onlyFiles: true });
  return matches.sort();
}

async function loadFiles(filePaths: string[]): Promise<ProvisionFile[]> {
  const files: ProvisionFile[] = [];
  for (const filePath of filePaths) {
    files.push({ name: path.basename(filePath), content: await fs.readFile(filePath) });
  }
  return files;
}

export async function runWorkloadCreate(
  context: WorkflowContext,
  options: WorkloadCreateOptions
): Promise<WorkloadCreateResult> {
  const { client, logger, workDir } = context;
  const { action } = options;

  if (action.kind === 'template') {
    const written = await writeWorkFile(workDir, options.file, buildWorkloadTemplate(action.template));
    return { written, provisioned: [], skipped: [] };
  }

  const content = await readWorkFile(workDir, options.file);
  if (content === undefined) {
    throw new MsValidationError(`Workload definition file '${options.file}' does not exist`);
  }

  const filePaths = await resolveWorkloadFiles(workDir, options.path);
  logger.debug('Working with file paths: \n    - %s', filePaths.join('\n    - '));

  const definitions: unknown[] = Array.isArray(content) ? content : [content];
  const result: WorkloadCreateResult = { provisioned: [], skipped: [] };

  for (const [index, definition] of definitions.entries()) {
    const cleaned = cleanWorkloadDefinition(definition);
    if (!isPlainRecord(cleaned)) {
      if (Array.isArray(content)) {
        logger.warn('Workload creation failed for element %d: Workload definition must be an object', index);
      } else {
        logger.error('Unable to interpret file. Workload creation failed: Workload definition must be an object');
      }
      result.skipped.push(index);
      continue;
    }

    const apiVersion = apiVersionFor(cleaned);
    await client.workloads.provision({ definition: cleaned, files: await loadFiles(filePaths), apiVersion });
    const name = typeof cleaned.name === 'string' ? cleaned.name : `#${index}`;
    logger.info("Workload '%s' provisioned (API v%d)", name, apiVersion);
    result.provisioned.push(name);
  }

  return result;
}
