import pino, { type DestinationStream, type Level, type Logger } from 'pino';

import { isPlainRecord, tryParseJson } from '../utils/json';

export type CliLogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const CLI_LOG_LEVELS: CliLogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

const PINO_LEVEL_BY_CLI_LEVEL: Record<CliLogLevel, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal'
};

const LABEL_BY_PINO_LEVEL: Record<string, string> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL'
};

export type LogOutput = Pick<typeof process.stderr, 'write'>;

export function isCliLogLevel(value: string): value is CliLogLevel {
  return CLI_LOG_LEVELS.some((level) => level === value);
}

/**
 * Accepts both the CLI spelling (`WARNING`) and pino's (`warn`).
 */
export function toPinoLevel(value: string): Level | undefined {
  const upper = value.trim().toUpperCase();
  if (isCliLogLevel(upper)) {
    return PINO_LEVEL_BY_CLI_LEVEL[upper];
  }
  const lower = value.trim().toLowerCase();
  return Object.values(PINO_LEVEL_BY_CLI_LEVEL).find((level) => level === lower);
}

function resolveLevel(): Level {
  const fromEnv = process.env.NERVE_LOG_LEVEL;
  return (fromEnv && toPinoLevel(fromEnv)) || 'info';
}

/**
 * Renders one pino JSON line as `LEVEL   :: message`, followed by the stack of an attached `err`.
 */
export function formatLogLine(line: string): string {
  const record = tryParseJson(line);
  if (!isPlainRecord(record)) {
    return line.endsWith('\n') ? line : `${line}\n`;
  }

  const label = typeof record.level === 'string' ? record.level : 'INFO';
  const message = typeof record.msg === 'string' ? record.msg : '';
  const stack = isPlainRecord(record.err) && typeof record.err.stack === 'string' ? `\n${record.err.stack}` : '';
  return `${label.padEnd(7)} :: ${message}${stack}\n`;
}

export function createCompactDestination(output: LogOutput = process.stderr): DestinationStream {
  return {
    write(line: string) {
      output.write(formatLogLine(line));
    }
  };
}

export interface CreateLoggerOptions {
  level?: string;
  output?: LogOutput;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: 'nerve-cli',
      level: (options.level && toPinoLevel(options.level)) || resolveLevel(),
      base: undefined,
      timestamp: false,
      formatters: {
        level: (label) => ({ level: LABEL_BY_PINO_LEVEL[label] ?? label.toUpperCase() })
      }
    },
    createCompactDestination(options.output)
  );
}

let singleton: Logger | undefined;

export function getLogger(): Logger {
  if (!singleton) {
    singleton = createLogger();
  }
  return singleton;
}

export function setLogLevel(logger: Logger, level: string): boolean {
  const resolved = toPinoLevel(level);
  if (!resolved) {
    return false;
  }
  logger.level = resolved;
  return true;
}
