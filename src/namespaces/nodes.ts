import { z } from 'zod';

import {
  nodeDetailsSchema,
  nodeSchema,
  nodeWorkloadSchema,
  pagedSchema,
  remoteConnectionSchema,
  type MsNode,
  type MsNodeDetails,
  type MsNodeWorkload,
  type MsRemoteConnection
} from '../types/ms';
import type { EndpointCall } from '../types/client';
import { parseResponse, unwrapPage } from './response';

export interface WorkloadControlRequest {
  serialNumber: string;
  deviceId: string;
  /** Upper case, e.g. `START` or `UNDEPLOY`. */
  command: string;
}

export interface NodesNamespace {
  list(): Promise<MsNode[]>;
  tree(): Promise<unknown>;
  details(serialNumber: string): Promise<MsNodeDetails>;
  workloads(serialNumber: string): Promise<MsNodeWorkload[]>;
  reboot(serialNumber: string): Promise<void>;
  controlWorkload(request: WorkloadControlRequest): Promise<void>;
  remoteConnections(serialNumber: string): Promise<MsRemoteConnection[]>;
  addRemoteConnections(serialNumber: string, connections: Array<Record<string, unknown>>): Promise<void>;
  removeRemoteConnection(serialNumber: string, connectionId: string): Promise<void>;
  remoteConnectionUrl(serialNumber: string, connectionId: string): Promise<string>;
}

const connectionUrlSchema = z.union([
  z.object({ url: z.string() }).passthrough(),
  z.object({ message: z.string() }).transform((value) => ({ url: value.message }))
]);

export function createNodesNamespace(call: EndpointCall): NodesNamespace {
  return {
    list: async () => {
      const { data } = await call('nodes.list');
      return unwrapPage(parseResponse(pagedSchema(nodeSchema), data, 'nodes.list'));
    },
    tree: async () => (await call('nodes.tree')).data,
    details: async (serialNumber) => {
      const { data } = await call('nodes.details', { path: { serialNumber } });
      return parseResponse(nodeDetailsSchema, data, 'nodes.details');
    },
    workloads: async (serialNumber) => {
      const { data } = await call('nodes.workloads', { path: { serialNumber } });
      return unwrapPage(parseResponse(pagedSchema(nodeWorkloadSchema), data, 'nodes.workloads'));
    },
    reboot: async (serialNumber) => {
      await call('nodes.reboot', { path: { serialNumber } });
    },
    controlWorkload: async (request) => {
      await call('nodes.controlWorkload', { body: request });
    },
    remoteConnections: async (serialNumber) => {
      const { data } = await call('nodes.remoteConnections', { path: { serialNumber } });
      return unwrapPage(parseResponse(pagedSchema(remoteConnectionSchema), data ?? [], 'nodes.remoteConnections'));
    },
    addRemoteConnections: async (serialNumber, connections) => {
      await call('nodes.addRemoteConnections', { path: { serialNumber }, body: connections });
    },
    removeRemoteConnection: async (serialNumber, connectionId) => {
      await call('nodes.removeRemoteConnection', { path: { serialNumber, connectionId } });
    },
    remoteConnectionUrl: async (serialNumber, connectionId) => {
      const { data } = await call('nodes.remoteConnectionUrl', { path: { serialNumber, connectionId } });
      return parseResponse(connectionUrlSchema, data, 'nodes.remoteConnectionUrl').url;
    }
  };
}
