import path from 'node:path';

import YAML from 'yaml';

import { MsHttpError, MsValidationError, serverMessageOf } from '../http/errors';
import { nodesFileSchema } from '../types/work-files';
import { readWorkFile, readWorkFileAs, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';

export type ServiceOsDnaAction =
  | { kind: 'putTarget'; dnaFile: string }
  | { kind: 'getCurrent' }
  | { kind: 'getTarget' }
  | { kind: 'status' }
  | { kind: 'cancel' }
  | { kind: 'reapply' };

export interface ServiceOsDnaOptions {
  file: string;
  action: ServiceOsDnaAction;
}

function describeStatusError(error: MsHttpError): string {
  return serverMessageOf(error.details) ?? error.message;
}

export async function runServiceOsDna(context: WorkflowContext, options: ServiceOsDnaOptions): Promise<void> {
  const { client, logger, workDir } = context;
  const nodes = await readWorkFileAs(workDir, options.file, nodesFileSchema);
  const { action } = options;

  let configuration: unknown;
  if (action.kind === 'putTarget') {
    configuration = await readWorkFile(workDir, action.dnaFile);
    if (configuration === undefined) {
      throw new MsValidationError(`ServiceOS DNA file '${action.dnaFile}' does not exist`);
    }
  }

  for (const node of nodes) {
    const nodeDir = path.join(workDir, node.serialNumber);

    switch (action.kind) {
      case 'getCurrent': {
        const dna = await client.serviceOsDna.current(node.serialNumber);
        await writeWorkFile(nodeDir, 'current_service_os_dna.json', dna);
        logger.info('Current ServiceOS DNA configuration of node %s:\n%s', node.name, YAML.stringify(dna, { indent: 4 }));
        break;
      }
      case 'getTarget': {
        const dna = await client.serviceOsDna.target(node.serialNumber);
        await writeWorkFile(nodeDir, 'target_service_os_dna.json', dna);
        logger.info('Target ServiceOS DNA configuration of node %s:\n%s', node.name, YAML.stringify(dna, { indent: 4 }));
        break;
      }
      case 'status': {
        let status: unknown;
        try {
          status = await client.serviceOsDna.status(node.serialNumber);
        } catch (error) {
          if (!(error instanceof MsHttpError)) {
            throw error;
          }
          status = describeStatusError(error);
        }
        logger.info(
          "ServiceOS DNA status of node '%s': %s",
          node.name.padStart(25),
          typeof status === 'string' ? status : JSON.stringify(status)
        );
        break;
      }
      case 'putTarget':
        await client.serviceOsDna.putTarget(node.serialNumber, configuration);
        logger.info('ServiceOS DNA configuration deployed to node %s', node.name);
        break;
      case 'cancel':
        await client.serviceOsDna.cancelTarget(node.serialNumber);
        logger.info('ServiceOS DNA target deployment cancelled on node %s', node.name);
        break;
      case 'reapply':
        await client.serviceOsDna.reapplyTarget(node.serialNumber);
        logger.info('ServiceOS DNA target re-apply triggered on node %s', node.name);
        break;
    }
  }
}
