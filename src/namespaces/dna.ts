import { z } from 'zod';

import type { EndpointCall } from '../types/client';
import { parseResponse } from './response';

/** File name to file content, as the node reports it. */
export const dnaConfigurationSchema = z.record(z.unknown());

export type DnaConfiguration = z.infer<typeof dnaConfigurationSchema>;

export interface DnaTargetUpload {
  /** Zip archive holding the configuration files. */
  archive: Buffer;
  fileName: string;
  continueAfterRestart: boolean;
  restartAllWorkloads: boolean;
}

export interface DnaNamespace {
  current(serialNumber: string): Promise<DnaConfiguration>;
  target(serialNumber: string): Promise<DnaConfiguration>;
  status(serialNumber: string): Promise<unknown>;
  putTarget(serialNumber: string, upload: DnaTargetUpload): Promise<void>;
}

export function createDnaNamespace(call: EndpointCall): DnaNamespace {
  return {
    current: async (serialNumber) => {
      const { data } = await call('dna.current', { path: { serialNumber } });
      return parseResponse(dnaConfigurationSchema, data, 'dna.current');
    },
    target: async (serialNumber) => {
      const { data } = await call('dna.target', { path: { serialNumber } });
      return parseResponse(dnaConfigurationSchema, data, 'dna.target');
    },
    status: async (serialNumber) => (await call('dna.status', { path: { serialNumber } })).data,
    putTarget: async (serialNumber, upload) => {
      const form = new FormData();
      form.append('file', new Blob([upload.archive], { type: 'application/zip' }), upload.fileName);
      await call('dna.putTarget', {
        path: { serialNumber },
        query: {
          continueInCaseOfRestart: upload.continueAfterRestart,
          restartAllWorkloads: upload.restartAllWorkloads
        },
        body: form
      });
    }
  };
}
