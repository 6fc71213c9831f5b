import type { Logger } from 'pino';

import type { MsClient } from '../types/client';

/**
 * What every subcommand gets: a client bound to the resolved Management System, and the work directory its
 * files live in.
 */
export interface WorkflowContext {
  client: MsClient;
  workDir: string;
  logger: Logger;
}

export type AskFn = (question: string) => Promise<string>;
