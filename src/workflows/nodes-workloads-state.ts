import { nodesFileSchema } from '../types/work-files';
import { readWorkFileAs } from '../utils/work-files';
import type { WorkflowContext } from './types';

export const WORKLOAD_COMMANDS = ['start', 'stop', 'restart', 'pause', 'resume', 'suspend', 'undeploy'] as const;

export type WorkloadCommand = (typeof WORKLOAD_COMMANDS)[number];

export interface NodesWorkloadsStateOptions {
  file: string;
  state: WorkloadCommand;
}

export interface WorkloadCommandSent {
  serialNumber: string;
  workload: string;
  deviceId: string;
  command: string;
}

export async function runNodesWorkloadsState(
  context: WorkflowContext,
  options: NodesWorkloadsStateOptions
): Promise<WorkloadCommandSent[]> {
  const { client, logger } = context;
  const nodes = await readWorkFileAs(context.workDir, options.file, nodesFileSchema);
  const command = options.state.toUpperCase();
  const sent: WorkloadCommandSent[] = [];

  for (const node of nodes) {
    const workloads = node.workloads ?? [];
    // Lists written by hand may name workloads without their device ids.
    const deployed = workloads.some((workload) => !workload.device_id)
      ? await client.nodes.workloads(node.serialNumber)
      : [];

    for (const workload of workloads) {
      const deviceId = workload.device_id ?? deployed.find((item) => item.device_name === workload.name)?.id;
      if (!deviceId) {
        logger.warn("Workload '%s' is not deployed on node %s", workload.name, node.name);
        continue;
      }

      logger.info("Sending %s to workload '%s' on node %s", command, workload.name, node.name);
      await client.nodes.controlWorkload({ serialNumber: node.serialNumber, deviceId, command });
      sent.push({ serialNumber: node.serialNumber, workload: workload.name, deviceId, command });
    }
  }

  return sent;
}
