import { CommanderError } from 'commander';
import type { Logger } from 'pino';

import { classifyConnectivityError } from '../config/connectivity';

/**
 * Logs an error that ended a command. Commander has already written its own usage errors.
 */
export function reportCliError(logger: Pick<Logger, 'error'>, error: unknown): void {
  if (error instanceof CommanderError) {
    return;
  }

  const result = classifyConnectivityError(error);
  if (result.class === 'unknown') {
    logger.error({ err: error }, result.message);
    return;
  }
  logger.error(result.message);
}

export function exitCodeOf(error: unknown): number {
  return error instanceof CommanderError ? error.exitCode : 1;
}
