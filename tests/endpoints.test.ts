import { describe, expect, it } from 'vitest';

import { getEndpoint, hasEndpoint, listEndpoints } from '../src/client/catalog';

describe('endpoint catalog', () => {
  it('maps every key uniquely', () => {
    const keys = listEndpoints().map((endpoint) => endpoint.key);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('declares every path parameter in its template', () => {
    for (const endpoint of listEndpoints()) {
      for (const param of endpoint.pathParams) {
        expect(endpoint.pathTemplate).toContain(`:${param}`);
      }
    }
  });

  it('filters by namespace', () => {
    const labels = listEndpoints('labels').map((endpoint) => endpoint.key);
    expect(labels).toEqual(['labels.list', 'labels.create', 'labels.delete']);
  });

  it('only lets the login call through without a session', () => {
    const open = listEndpoints()
      .filter((endpoint) => !endpoint.authenticated)
      .map((endpoint) => endpoint.key);
    expect(open).toEqual(['auth.login']);
  });

  it('streams exports and provisions as multipart', () => {
    expect(getEndpoint('workloads.exportVersion').responseType).toBe('stream');
    expect(getEndpoint('workloads.provision')).toMatchObject({
      method: 'POST',
      pathTemplate: '/nerve/v:apiVersion/workloads',
      bodyType: 'multipart-form'
    });
  });

  it('rejects unknown keys', () => {
    expect(hasEndpoint('nodes.list')).toBe(true);
    expect(hasEndpoint('nodes.unknown')).toBe(false);
    expect(() => getEndpoint('nodes.unknown')).toThrow();
  });
});
