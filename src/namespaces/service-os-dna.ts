import type { EndpointCall } from '../types/client';

export interface ServiceOsDnaNamespace {
  current(serialNumber: string): Promise<unknown>;
  target(serialNumber: string): Promise<unknown>;
  status(serialNumber: string): Promise<unknown>;
  putTarget(serialNumber: string, configuration: unknown): Promise<void>;
  cancelTarget(serialNumber: string): Promise<void>;
  reapplyTarget(serialNumber: string): Promise<void>;
}

export function createServiceOsDnaNamespace(call: EndpointCall): ServiceOsDnaNamespace {
  return {
    current: async (serialNumber) => (await call('serviceOsDna.current', { path: { serialNumber } })).data,
    target: async (serialNumber) => (await call('serviceOsDna.target', { path: { serialNumber } })).data,
    status: async (serialNumber) => (await call('serviceOsDna.status', { path: { serialNumber } })).data,
    putTarget: async (serialNumber, configuration) => {
      await call('serviceOsDna.putTarget', { path: { serialNumber }, body: configuration });
    },
    cancelTarget: async (serialNumber) => {
      await call('serviceOsDna.cancelTarget', { path: { serialNumber } });
    },
    reapplyTarget: async (serialNumber) => {
      await call('serviceOsDna.reapplyTarget', { path: { serialNumber } });
    }
  };
}
