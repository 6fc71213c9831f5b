import { httpStatusOf } from '../http/errors';
import { nodesFileSchema } from '../types/work-files';
import { readWorkFileAs } from '../utils/work-files';
import type { AskFn, WorkflowContext } from './types';

export interface NodesRebootOptions {
  file: string;
  yes?: boolean;
  ask: AskFn;
}

export interface NodesRebootResult {
  rebooted: string[];
  skipped: string[];
  offline: string[];
}

export async function runNodesReboot(context: WorkflowContext, options: NodesRebootOptions): Promise<NodesRebootResult> {
  const { client, logger } = context;
  const nodes = await readWorkFileAs(context.workDir, options.file, nodesFileSchema);
  const result: NodesRebootResult = { rebooted: [], skipped: [], offline: [] };

  for (const node of nodes) {
    if (!options.yes) {
      const answer = await options.ask(`Reboot node ${node.name}? (y/n): `);
      if (answer.trim().toLowerCase() !== 'y') {
        logger.info('Skipping node %s', node.name);
        result.skipped.push(node.serialNumber);
        continue;
      }
    }

    logger.info('Trigger command to reboot node %s', node.name);
    try {
      await client.nodes.reboot(node.serialNumber);
      result.rebooted.push(node.serialNumber);
    } catch (error) {
      if (httpStatusOf(error) !== 409) {
        throw error;
      }
      logger.warn('Node %s is currently offline and cannot be rebooted', node.name);
      result.offline.push(node.serialNumber);
    }
  }

  return result;
}
