import { promises as fs } from 'node:fs';
import path from 'node:path';

import YAML from 'yaml';
import type { z } from 'zod';

import { MsValidationError } from '../http/errors';
import { getLogger } from '../observability/logger';
import { formatJson } from './json';

export type WorkFileFormat = 'json' | 'yaml' | 'text';

export interface WorkFileLocation {
  path: string;
  format: WorkFileFormat;
}

/**
 * Names without an extension are JSON files: `nodes` → `nodes.json`.
 */
export function resolveWorkFile(workDir: string, fileName: string): WorkFileLocation {
  let ext = path.extname(fileName).toLowerCase();
  let name = fileName;
  if (!ext) {
    name = `${fileName}.json`;
    ext = '.json';
  }

  const format: WorkFileFormat = ext === '.json' ? 'json' : ext === '.yaml' || ext === '.yml' ? 'yaml' : 'text';
  return { path: path.join(workDir, name), format };
}

function serialize(content: unknown, format: WorkFileFormat): string {
  if (format === 'json') {
    return formatJson(content);
  }
  if (format === 'yaml') {
    return YAML.stringify(content, { indent: 4 });
  }
  return typeof content === 'string' ? content : formatJson(content);
}

/**
 * Resolves to `undefined` when the file does not exist.
 */
export async function readWorkFile(workDir: string, fileName: string): Promise<unknown> {
  const location = resolveWorkFile(workDir, fileName);
  getLogger().debug('Reading file: %s', location.path);

  let content: string;
  try {
    content = await fs.readFile(location.path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  if (location.format === 'json') {
    return JSON.parse(content);
  }
  if (location.format === 'yaml') {
    return YAML.parse(content);
  }
  return content;
}

export async function writeWorkFile(workDir: string, fileName: string, content: unknown): Promise<string> {
  const location = resolveWorkFile(workDir, fileName);
  await fs.mkdir(path.dirname(location.path), { recursive: true });
  await fs.writeFile(location.path, serialize(content, location.format), 'utf8');
  getLogger().info("File '%s' written", location.path);
  return location.path;
}

/**
 * Reads a work file another subcommand produced and checks its shape. A missing file is an error here.
 */
export async function readWorkFileAs<T extends z.ZodTypeAny>(
  workDir: string,
  fileName: string,
  schema: T
): Promise<z.output<T>> {
  const content = await readWorkFile(workDir, fileName);
  const location = resolveWorkFile(workDir, fileName);
  if (content === undefined) {
    throw new MsValidationError(`File '${location.path}' does not exist`);
  }

  const parsed = schema.safeParse(content);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MsValidationError(`File '${location.path}' is not valid${where}: ${issue?.message ?? 'invalid content'}`);
  }
  return parsed.data;
}
