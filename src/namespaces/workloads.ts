import { Readable } from 'node:stream';

import { MsValidationError } from '../http/errors';
import {
  deploymentSchema,
  pagedSchema,
  workloadSchema,
  workloadVersionSchema,
  type MsDeployment,
  type MsWorkload,
  type MsWorkloadVersion
} from '../types/ms';
import type { EndpointCall } from '../types/client';
import { parseResponse, unwrapPage } from './response';

export interface WorkloadExport {
  fileName: string;
  /** The archive body, not yet read. */
  content: Readable;
}

export interface ProvisionFile {
  name: string;
  content: Uint8Array;
}

export interface ProvisionRequest {
  definition: Record<string, unknown>;
  files: ProvisionFile[];
  /** docker-compose workloads go through v3, everything else through v2. */
  apiVersion: 2 | 3;
}

export interface DeployRequest {
  deployName: string;
  workloadId: string;
  versionId: string;
  serialNumbers: string[];
}

export interface WorkloadsNamespace {
  list(): Promise<MsWorkload[]>;
  versions(workloadId: string): Promise<MsWorkloadVersion[]>;
  version(workloadId: string, versionId: string): Promise<MsWorkloadVersion>;
  exportVersion(workloadId: string, versionId: string): Promise<WorkloadExport>;
  deleteVersion(workloadId: string, versionId: string): Promise<void>;
  delete(workloadId: string): Promise<void>;
  provision(request: ProvisionRequest): Promise<unknown>;
  deploy(request: DeployRequest): Promise<MsDeployment>;
  deploymentStatus(operationId: string): Promise<MsDeployment>;
}

const PAGE_SIZE = 50;
const DEFAULT_EXPORT_NAME = 'workload_file';

export function fileNameFromDisposition(header: string | undefined): string {
  if (!header?.includes('filename=')) {
    return DEFAULT_EXPORT_NAME;
  }
  const value = header.slice(header.lastIndexOf('filename=') + 'filename='.length).trim().replace(/^"|"$/g, '');
  return value || DEFAULT_EXPORT_NAME;
}

export function createWorkloadsNamespace(call: EndpointCall): WorkloadsNamespace {
  return {
    list: async () => {
      const workloads: MsWorkload[] = [];
      for (let page = 1; ; page += 1) {
        const { data } = await call('workloads.list', { query: { limit: PAGE_SIZE, page } });
        const parsed = parseResponse(pagedSchema(workloadSchema), data, 'workloads.list');
        const items = unwrapPage(parsed);
        workloads.push(...items);
        const total = Array.isArray(parsed) ? undefined : parsed.count;
        if (items.length < PAGE_SIZE || total === undefined || workloads.length >= total) {
          return workloads;
        }
      }
    },
    versions: async (workloadId) => {
      const { data } = await call('workloads.versions', { path: { workloadId } });
      return unwrapPage(parseResponse(pagedSchema(workloadVersionSchema), data, 'workloads.versions'));
    },
    version: async (workloadId, versionId) => {
      const { data } = await call('workloads.version', { path: { workloadId, versionId } });
      return parseResponse(workloadVersionSchema, data, 'workloads.version');
    },
    exportVersion: async (workloadId, versionId) => {
      const { data, headers } = await call('workloads.exportVersion', { path: { workloadId, versionId } });
      if (!(data instanceof Readable)) {
        throw new MsValidationError('Unexpected response from workloads.exportVersion: expected a file download');
      }
      return { fileName: fileNameFromDisposition(headers['content-disposition']), content: data };
    },
    deleteVersion: async (workloadId, versionId) => {
      await call('workloads.deleteVersion', { path: { workloadId, versionId } });
    },
    delete: async (workloadId) => {
      await call('workloads.delete', { path: { workloadId } });
    },
    provision: async (request) => {
      const form = new FormData();
      form.append('data', JSON.stringify(request.definition));
      for (const file of request.files) {
        form.append('files', new Blob([file.content]), file.name);
      }
      const { data } = await call('workloads.provision', { path: { apiVersion: request.apiVersion }, body: form });
      return data;
    },
    deploy: async (request) => {
      const { data } = await call('workloads.deploy', {
        body: {
          deployName: request.deployName,
          workloadId: request.workloadId,
          versionId: request.versionId,
          nodes: request.serialNumbers.map((serialNumber) => ({ serialNumber }))
        }
      });
      return parseResponse(deploymentSchema, data ?? {}, 'workloads.deploy');
    },
    deploymentStatus: async (operationId) => {
      const { data } = await call('workloads.deploymentStatus', { path: { operationId } });
      return parseResponse(deploymentSchema, data, 'workloads.deploymentStatus');
    }
  };
}
