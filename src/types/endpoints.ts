import { z } from 'zod';

export const endpointNamespaces = ['auth', 'nodes', 'workloads', 'labels', 'serviceOsDna', 'dna'] as const;

export type EndpointNamespace = (typeof endpointNamespaces)[number];

export const endpointSpecSchema = z.object({
  key: z.string(),
  namespace: z.enum(endpointNamespaces),
  action: z.string(),
  title: z.string(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
  pathTemplate: z.string(),
  pathParams: z.array(z.string()),
  queryParams: z.array(z.string()),
  bodyType: z.enum(['none', 'json', 'multipart-form']),
  /** Whether the call needs a session. */
  authenticated: z.boolean(),
  responseType: z.enum(['auto', 'stream'])
});

export type EndpointSpec = z.infer<typeof endpointSpecSchema>;
