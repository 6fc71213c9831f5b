import { Command, CommanderError } from 'commander';

import { CLI_LOG_LEVELS, setLogLevel } from '../observability/logger';
import { registerSubcommands, type SubcommandDeps } from './commands';
import { reportCliError } from './report-error';

export const SHELL_PROMPT = '(nerve) ';

type OutputStream = Pick<typeof process.stdout, 'write'>;

/** Resolves to `undefined` once the input is exhausted. */
export type ReadLineFn = (prompt: string) => Promise<string | undefined>;

export interface InteractiveShellOptions extends SubcommandDeps {
  readLine: ReadLineFn;
  stdout: OutputStream;
  stderr: OutputStream;
}

/**
 * Splits a shell line into arguments. Single and double quotes group words; there are no escapes.
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: string | undefined;
  let pending = false;

  for (const char of line) {
    if (quote) {
      if (char === quote) {
        quote = undefined;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      pending = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (pending) {
        args.push(current);
        current = '';
        pending = false;
      }
      continue;
    }
    current += char;
    pending = true;
  }

  if (pending) {
    args.push(current);
  }
  return args;
}

function createShellProgram(options: InteractiveShellOptions, onExit: () => void): Command {
  const shell = new Command();
  shell.name('nerve').exitOverride().configureOutput({
    writeOut: (text: string) => {
      options.stdout.write(text);
    },
    writeErr: (text: string) => {
      options.stderr.write(text);
    }
  });
  registerSubcommands(shell, options);

  shell
    .command('log_level')
    .description(`Set the log level (${CLI_LOG_LEVELS.join('|')})`)
    .argument('<level>')
    .action((level: string) => {
      const { logger } = options.context();
      if (!setLogLevel(logger, level)) {
        logger.error('Invalid log level: %s', level);
        return;
      }
      logger.info('Log level set to %s', level.toUpperCase());
    });

  shell
    .command('help')
    .description('List the available commands')
    .argument('[command]')
    .action((name?: string) => {
      const target = name ? shell.commands.find((command) => command.name() === name) : undefined;
      (target ?? shell).outputHelp();
    });

  shell
    .command('exit')
    .description('Leave the interactive shell')
    .action(onExit);

  return shell;
}

/**
 * Reads commands until `exit` or the end of input. A failing command is reported and the shell carries on.
 */
export async function runInteractiveShell(options: InteractiveShellOptions): Promise<void> {
  const { logger } = options.context();
  let done = false;

  while (!done) {
    const line = await options.readLine(SHELL_PROMPT);
    if (line === undefined) {
      return;
    }

    const args = splitCommandLine(line);
    if (args.length === 0) {
      continue;
    }

    const shell = createShellProgram(options, () => {
      done = true;
    });

    try {
      await shell.parseAsync(args, { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
        continue;
      }
      reportCliError(logger, error);
    }
  }
}
