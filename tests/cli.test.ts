import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { createCli, type CliRuntime } from '../src/cli/index';
import { SHELL_PROMPT, splitCommandLine } from '../src/cli/interactive';
import { parseCredentials } from '../src/config/credentials-file';
import { captureLogger, tempDir } from './support/context';
import { FakeTransport } from './support/fake-transport';
import { MemorySessionStore } from './support/memory-session-store';

const LOGIN = ['--ms_url', 'https://ms.example.test', '--ms_user', 'test-user', '--ms_password', 'test-secret'];

function labelsTransport(): FakeTransport {
  return new FakeTransport().on('GET', '/nerve/labels', { data: [{ _id: 'l-1', key: 'site', value: 'north' }] });
}

function setup(overrides: Partial<CliRuntime> = {}) {
  const cwd = tempDir();
  const { logger, lines } = captureLogger();
  const stdout = { write: vi.fn() };
  const stderr = { write: vi.fn() };
  const transport = labelsTransport();
  const runtime: CliRuntime = {
    stdout,
    stderr,
    logger,
    transport,
    sessionStore: new MemorySessionStore(),
    env: {},
    cwd,
    ...overrides
  };
  const run = (...args: string[]) => createCli(runtime).parseAsync(['node', 'nerve-cli', ...args]);
  return { cwd, workDir: path.join(cwd, 'work_dir'), stdout, stderr, transport, lines, run };
}

describe('cli integration', () => {
  it('prints the help to stderr without a subcommand', async () => {
    const { stderr, transport, run } = setup();

    await run();

    expect(stderr.write).toHaveBeenCalledWith(expect.stringContaining('Usage: nerve-cli [options] [command]'));
    expect(transport.requests).toHaveLength(0);
  });

  it('rejects an unknown subcommand', async () => {
    const { run } = setup();

    await expect(run('bogus')).rejects.toThrow("error: unknown command 'bogus'");
  });

  it('runs a subcommand against the management system given on the command line', async () => {
    const { workDir, transport, run } = setup();

    await run(...LOGIN, 'labels', '-l');

    expect(JSON.parse(readFileSync(path.join(workDir, 'labels.json'), 'utf8'))).toEqual([
      { key: 'site', value: 'north' }
    ]);
    expect(transport.calls('POST', '/auth/login')).toHaveLength(1);
    expect(transport.requests[0].url).toBe('https://ms.example.test/auth/login');
  });

  it('requires exactly one action', async () => {
    const { transport, run } = setup();

    await expect(run(...LOGIN, 'labels', '-l', '-a')).rejects.toThrow(
      'labels: exactly one of --list, --add, --delete is required.'
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('maps the nodes_dna deploy flags onto the upload', async () => {
    const { workDir, transport, run } = setup();
    transport.on('PUT', '/nerve/v1/dna/SN-1/target', { data: {} });
    mkdirSync(workDir, { recursive: true });
    writeFileSync(path.join(workDir, 'nodes.json'), JSON.stringify([{ serialNumber: 'SN-1', name: 'node-1' }]));
    writeFileSync(path.join(workDir, 'app.env'), 'A=1\n');

    await run(...LOGIN, 'nodes_dna', '--put_target', 'app.env', '-r');

    const [put] = transport.calls('PUT', '/nerve/v1/dna/SN-1/target');
    const url = new URL(put.url);
    expect(url.searchParams.get('restartAllWorkloads')).toBe('true');
    expect(url.searchParams.get('continueInCaseOfRestart')).toBe('false');
  });

  it('stores the given credentials and picks them up on the next run', async () => {
    const { cwd, transport, run } = setup();

    await run(...LOGIN, '--store_credentials', 'labels', '-l');
    await run('labels', '-l');

    const stored = parseCredentials(readFileSync(path.join(cwd, 'credentials.ini'), 'utf8'));
    expect(stored.sections).toEqual([{ host: 'ms.example.test', username: 'test-user', password: 'test-secret' }]);
    expect(transport.calls('GET', '/nerve/labels')).toHaveLength(2);
  });

  it('refuses --store_credentials without --ms_url', async () => {
    const { cwd, run } = setup();

    await expect(run('--store_credentials', 'labels', '-l')).rejects.toThrow('--store_credentials requires --ms_url.');
    expect(existsSync(path.join(cwd, 'credentials.ini'))).toBe(false);
  });

  it('refuses to guess between several credentials file sections', async () => {
    const { cwd, transport, run } = setup({ env: { MS_URL: 'ms.example.test' } });
    writeFileSync(
      path.join(cwd, 'credentials.ini'),
      '[a.example.test]\nusername = a\npassword = test-secret\n\n[b.example.test]\nusername = b\npassword = test-secret\n'
    );

    await expect(run('labels', '-l')).rejects.toThrow(
      'The credentials file lists 2 management systems (a.example.test, b.example.test). Select one with --ms_url.'
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('falls back to the environment for the host and credentials', async () => {
    const { transport, run } = setup({
      env: { MS_URL: 'ms.example.test', MS_USR: 'test-user', MS_PSW: 'test-secret' }
    });

    await run('--work_dir', 'elsewhere', 'labels', '-l');

    expect(transport.requests[0].url).toBe('https://ms.example.test/auth/login');
  });

  it('keeps the interactive shell running after a failing command', async () => {
    const script = ['labels -l -a', '', 'labels -l', 'logout', 'exit', 'labels -l'];
    const readLine = vi.fn(async () => script.shift());
    const { workDir, transport, lines, run } = setup({ readLine });

    await run(...LOGIN, 'cli');

    expect(readLine).toHaveBeenCalledTimes(5);
    expect(readLine).toHaveBeenCalledWith(SHELL_PROMPT);
    expect(lines()).toContain('labels: exactly one of --list, --add, --delete is required.');
    expect(lines()).toContain('Logged out from the management system.');
    expect(existsSync(path.join(workDir, 'labels.json'))).toBe(true);
    expect(transport.calls('GET', '/nerve/labels')).toHaveLength(1);
    expect(transport.calls('POST', '/auth/logout')).toHaveLength(1);
  });

  it('leaves the interactive shell at the end of input', async () => {
    const readLine = vi.fn(async () => undefined);
    const { run } = setup({ readLine });

    await run(...LOGIN, 'cli');

    expect(readLine).toHaveBeenCalledTimes(1);
  });
});

describe('shell line splitting', () => {
  it('splits on whitespace and groups quoted words', () => {
    expect(splitCommandLine('  nodes_list   --node_name "line 1"  ')).toEqual(['nodes_list', '--node_name', 'line 1']);
    expect(splitCommandLine("labels -f 'my labels.json' -l")).toEqual(['labels', '-f', 'my labels.json', '-l']);
    expect(splitCommandLine('ms_workloads --name ""')).toEqual(['ms_workloads', '--name', '']);
    expect(splitCommandLine('   ')).toEqual([]);
  });
});
