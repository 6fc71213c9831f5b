import { promises as fs } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { getConfigDir } from '../utils/config-dir';
import { tryParseJson } from '../utils/json';

export interface SessionRecord {
  sessionId: string;
  username: string;
  createdAt: string;
}

/**
 * Login sessions keyed by Management System host, so consecutive invocations skip the login call.
 */
export interface SessionStore {
  get(host: string): Promise<SessionRecord | undefined>;
  set(host: string, session: SessionRecord): Promise<void>;
  clear(host: string): Promise<void>;
}

const sessionFileSchema = z.record(
  z.object({
    sessionId: z.string().min(1),
    username: z.string(),
    createdAt: z.string()
  })
);

type SessionFile = z.infer<typeof sessionFileSchema>;

export class FileSessionStore implements SessionStore {
  private readonly filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ?? path.join(getConfigDir(), 'sessions.json');
  }

  async get(host: string): Promise<SessionRecord | undefined> {
    return (await this.readData())[host];
  }

  async set(host: string, session: SessionRecord): Promise<void> {
    const data = await this.readData();
    data[host] = session;
    await this.writeData(data);
  }

  async clear(host: string): Promise<void> {
    const data = await this.readData();
    if (!(host in data)) {
      return;
    }
    delete data[host];
    await this.writeData(data);
  }

  private async readData(): Promise<SessionFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    // A corrupt cache only costs a fresh login.
    const parsed = sessionFileSchema.safeParse(tryParseJson(content));
    return parsed.success ? parsed.data : {};
  }

  private async writeData(data: SessionFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(data, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
  }
}
