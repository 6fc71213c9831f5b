import { labelSchema, pagedSchema, type MsLabel } from '../types/ms';
import type { EndpointCall } from '../types/client';
import { parseResponse, unwrapPage } from './response';

export interface LabelsNamespace {
  list(): Promise<MsLabel[]>;
  create(label: { key: string; value: string }): Promise<MsLabel>;
  delete(labelId: string): Promise<void>;
}

const PAGE_SIZE = 100;

export function createLabelsNamespace(call: EndpointCall): LabelsNamespace {
  return {
    list: async () => {
      const labels: MsLabel[] = [];
      for (let page = 1; ; page += 1) {
        const { data } = await call('labels.list', { query: { limit: PAGE_SIZE, page } });
        const parsed = parseResponse(pagedSchema(labelSchema), data, 'labels.list');
        const items = unwrapPage(parsed);
        labels.push(...items);
        const total = Array.isArray(parsed) ? undefined : parsed.count;
        if (items.length < PAGE_SIZE || total === undefined || labels.length >= total) {
          return labels;
        }
      }
    },
    create: async (label) => {
      const { data } = await call('labels.create', { body: { key: label.key, value: label.value } });
      const created = labelSchema.safeParse(data);
      return created.success ? created.data : { key: label.key, value: label.value };
    },
    delete: async (labelId) => {
      await call('labels.delete', { path: { labelId } });
    }
  };
}
