import { z } from 'zod';

import rawEndpoints from './endpoints.json';
import { endpointSpecSchema, type EndpointNamespace, type EndpointSpec } from '../types/endpoints';

const endpoints: EndpointSpec[] = z.array(endpointSpecSchema).parse(rawEndpoints);
const endpointMap = new Map(endpoints.map((endpoint) => [endpoint.key, endpoint]));

export function listEndpoints(namespace?: EndpointNamespace): EndpointSpec[] {
  if (!namespace) {
    return endpoints.slice();
  }
  return endpoints.filter((endpoint) => endpoint.namespace === namespace);
}

export function getEndpoint(key: string): EndpointSpec {
  const endpoint = endpointMap.get(key);
  if (!endpoint) {
    throw new Error(`Unknown endpoint key: ${key}`);
  }
  return endpoint;
}

export function hasEndpoint(key: string): boolean {
  return endpointMap.has(key);
}
