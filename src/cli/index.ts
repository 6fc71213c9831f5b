import { createInterface } from 'node:readline/promises';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { Command, Option } from 'commander';
import type { Logger } from 'pino';

import { createMsClient } from '../client/create-client';
import { normalizeHost, resolveCredentials, type CredentialsEnv } from '../config/credentials';
import { DEFAULT_CREDENTIALS_FILE, loadCredentialsFile, storeCredentials } from '../config/credentials-file';
import { MsError, MsValidationError } from '../http/errors';
import type { Transport } from '../http/transport';
import { CLI_LOG_LEVELS, createLogger, getLogger, setLogLevel } from '../observability/logger';
import type { SessionStore } from '../secure/session-store';
import { openInBrowser, type OpenUrlFn } from '../utils/open-url';
import { getCliVersion } from '../utils/version';
import type { WorkflowContext } from '../workflows/types';
import { registerSubcommands, type SubcommandDeps } from './commands';
import { runInteractiveShell, type ReadLineFn } from './interactive';

type OutputStream = Pick<typeof process.stdout, 'write'>;
type ErrorStream = Pick<typeof process.stderr, 'write'>;
type PromptValueFn = (args: { question: string; stdout: OutputStream }) => Promise<string>;

export interface CliRuntime {
  stdout?: OutputStream;
  stderr?: ErrorStream;
  promptValue?: PromptValueFn;
  readLine?: ReadLineFn;
  openUrl?: OpenUrlFn;
  sessionStore?: SessionStore;
  transport?: Transport;
  logger?: Logger;
  env?: CredentialsEnv;
  cwd?: string;
}

export type GlobalOptions = {
  ms_url?: string;
  ms_user?: string;
  ms_password?: string;
  work_dir: string;
  log_level?: string;
  store_credentials?: boolean;
  credentials_file: string;
  error_format: string;
};

async function promptValue(args: { question: string; stdout: OutputStream }): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  });
  try {
    return (await rl.question(args.question)).trim();
  } finally {
    rl.close();
  }
}

async function readLineFromStdin(prompt: string): Promise<string | undefined> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  });
  const closed = new Promise<undefined>((resolve) => {
    rl.once('close', () => resolve(undefined));
  });
  try {
    return await Promise.race([rl.question(prompt), closed]);
  } finally {
    rl.close();
  }
}

/**
 * Stores credentials if asked to, resolves which Management System to talk to and prepares the work directory.
 * Nothing here talks to the network.
 */
export async function resolveWorkflowContext(
  options: GlobalOptions,
  runtime: CliRuntime,
  logger: Logger
): Promise<WorkflowContext> {
  const cwd = runtime.cwd ?? process.cwd();
  const env: CredentialsEnv = runtime.env ?? process.env;
  const credentialsPath = path.resolve(cwd, options.credentials_file);

  if (options.store_credentials) {
    if (!options.ms_url) {
      throw new MsValidationError('--store_credentials requires --ms_url.');
    }
    const host = normalizeHost(options.ms_url);
    await storeCredentials(credentialsPath, {
      host,
      username: options.ms_user,
      password: options.ms_password
    });
    logger.info('Credentials for %s stored in %s', host, credentialsPath);
  }

  const resolved = resolveCredentials({
    cliUrl: options.ms_url,
    cliUser: options.ms_user,
    cliPassword: options.ms_password,
    credentialsFile: await loadCredentialsFile(credentialsPath),
    env,
    logger
  });
  logger.debug('Using management system %s (host from %s)', resolved.url, resolved.hostSource);

  const workDir = path.resolve(cwd, options.work_dir);
  await mkdir(workDir, { recursive: true });

  const client = createMsClient({
    host: resolved.url,
    username: resolved.username,
    password: resolved.password,
    sessionStore: runtime.sessionStore,
    transport: runtime.transport,
    logger
  });

  return { client, workDir, logger };
}

export function createCli(runtime: CliRuntime = {}): Command {
  const stdout = runtime.stdout ?? process.stdout;
  const stderr = runtime.stderr ?? process.stderr;
  const prompt = runtime.promptValue ?? promptValue;
  const readLine = runtime.readLine ?? readLineFromStdin;
  const logger = runtime.logger ?? (runtime.stderr ? createLogger({ output: runtime.stderr }) : getLogger());

  let context: WorkflowContext | undefined;
  const deps: SubcommandDeps = {
    context: () => {
      if (!context) {
        throw new MsError('Management system settings were not resolved before the command ran.');
      }
      return context;
    },
    ask: (question) => prompt({ question, stdout }),
    openUrl: runtime.openUrl ?? openInBrowser
  };

  const program = new Command();
  program.name('nerve-cli').description('Nerve API CLI for deploying applications to devices').version(getCliVersion());
  program
    .option('--ms_url <url>', 'URL of the Nerve MS (defaults to the only section of the credentials file, then MS_URL)')
    .option('--ms_user <username>', 'Login user for the Nerve MS (defaults to the credentials file, then MS_USR)')
    .option('--ms_password <password>', 'Login password for the Nerve MS (defaults to the credentials file, then MS_PSW)')
    .option('--work_dir <directory>', 'Directory for the files read and written by the commands', 'work_dir')
    .addOption(new Option('-l, --log_level <level>', 'Set the log level (default: INFO)').choices(CLI_LOG_LEVELS))
    .option('--store_credentials', 'Store the given credentials in the credentials file for future use')
    .option('--credentials_file <file>', 'Credentials file', DEFAULT_CREDENTIALS_FILE)
    .addOption(new Option('--error_format <format>', 'Error output format').choices(['text', 'json']).default('text'));
  program.enablePositionalOptions();

  program.exitOverride((error) => {
    if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
      return;
    }
    throw error;
  });

  program.configureOutput({
    writeOut: (text: string) => {
      stdout.write(text);
    },
    writeErr: (text: string) => {
      stderr.write(text);
    }
  });

  program.hook('preAction', async (_command, actionCommand) => {
    if (actionCommand === program) {
      return;
    }
    const options = program.opts<GlobalOptions>();
    if (options.log_level) {
      setLogLevel(logger, options.log_level);
    }
    context = await resolveWorkflowContext(options, runtime, logger);
  });

  program.action((_options: unknown, command: Command) => {
    if (command.args.length > 0) {
      program.error(`error: unknown command '${command.args[0]}'`);
    }
    program.outputHelp({ error: true });
  });

  program
    .command('cli')
    .description('Start the interactive CLI')
    .action(async () => {
      await runInteractiveShell({ ...deps, readLine, stdout, stderr });
    });

  registerSubcommands(program, deps);

  return program;
}

export async function runCli(argv = process.argv, runtime: CliRuntime = {}): Promise<void> {
  const program = createCli(runtime);
  await program.parseAsync(argv);
}
