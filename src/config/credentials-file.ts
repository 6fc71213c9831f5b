import { promises as fs } from 'node:fs';
import path from 'node:path';

import ini from 'ini';

import { MalformedCredentialsFileError } from '../http/errors';

export const DEFAULT_CREDENTIALS_FILE = 'credentials.ini';

export interface CredentialsSection {
  host: string;
  username?: string;
  password?: string;
}

export interface CredentialsFile {
  path: string;
  /** In file order. */
  sections: CredentialsSection[];
}

const SECTION_HEADER = /^\[([^\]]*)\]\s*$/;

function isCommentOrBlank(line: string): boolean {
  return line === '' || line.startsWith('#') || line.startsWith(';');
}

/**
 * `key = value` (or `key: value`) with the value JSON-quoted, so `ini` hands it back verbatim: `#` and `;` are
 * part of the value, not a comment.
 */
function quoteValueLine(line: string): string {
  const delimiter = line.search(/[=:]/);
  if (delimiter === -1) {
    return line;
  }
  const key = line.slice(0, delimiter).trim();
  const value = line.slice(delimiter + 1).trim();
  return `${key} = ${JSON.stringify(value)}`;
}

function valueOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value || undefined;
  }
  // `ini` turns the literals true, false and null into values.
  if (typeof value === 'boolean' || typeof value === 'number' || value === null) {
    return String(value);
  }
  return undefined;
}

function toSection(host: string, values: Record<string, unknown>): CredentialsSection {
  const lowered = new Map(Object.entries(values).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    host,
    username: valueOf(lowered.get('username')),
    password: valueOf(lowered.get('password'))
  };
}

/**
 * Sections come back in file order. Each section body is parsed on its own: `ini` would nest dotted host names
 * and reorder numeric ones.
 */
export function parseCredentials(text: string, filePath = DEFAULT_CREDENTIALS_FILE): CredentialsFile {
  const blocks: Array<{ host: string; lines: string[] }> = [];

  for (const [index, rawLine] of text.split(/\r?\n/).entries()) {
    const line = rawLine.trim();
    const header = SECTION_HEADER.exec(line);
    if (header) {
      const host = header[1].trim();
      if (blocks.some((block) => block.host === host)) {
        throw new MalformedCredentialsFileError(`Section [${host}] appears twice in ${filePath}.`);
      }
      blocks.push({ host, lines: [] });
      continue;
    }
    if (isCommentOrBlank(line)) {
      continue;
    }

    const current = blocks.at(-1);
    if (!current) {
      throw new MalformedCredentialsFileError(`${filePath} line ${index + 1} is outside of any [host] section.`);
    }
    current.lines.push(quoteValueLine(line));
  }

  return {
    path: filePath,
    sections: blocks.map((block) => toSection(block.host, ini.parse(block.lines.join('\n'))))
  };
}

/**
 * Values are written as they are; `parseCredentials` reads everything after the first `=` back.
 */
export function stringifyCredentials(file: CredentialsFile): string {
  return file.sections
    .map((section) => {
      const lines = [`[${section.host}]`];
      if (section.username) {
        lines.push(`username = ${section.username}`);
      }
      if (section.password) {
        lines.push(`password = ${section.password}`);
      }
      return `${lines.join('\n')}\n`;
    })
    .join('\n');
}

/**
 * Resolves to `undefined` when the file does not exist.
 */
export async function loadCredentialsFile(filePath: string): Promise<CredentialsFile | undefined> {
  try {
    const content = await fs.readFile(filePath, 'utf8');
    return parseCredentials(content, filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export async function storeCredentials(
  filePath: string,
  entry: CredentialsSection
): Promise<CredentialsFile> {
  const current = (await loadCredentialsFile(filePath)) ?? { path: filePath, sections: [] };
  const sections = current.sections.map((section) => ({ ...section }));
  const existing = sections.find((section) => section.host === entry.host);

  if (existing) {
    existing.username = entry.username ?? existing.username;
    existing.password = entry.password ?? existing.password;
  } else {
    sections.push({ ...entry });
  }

  const next: CredentialsFile = { path: filePath, sections };
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, stringifyCredentials(next), 'utf8');
  return next;
}
