import { z } from 'zod';

/*
 * Shapes of the Management System payloads the subcommands read. Everything is `passthrough`: fields not named
 * here are carried into the work files untouched.
 */

export const loginResponseSchema = z.object({ sessionId: z.string().min(1) }).passthrough();

export const nodeSchema = z
  .object({
    serialNumber: z.string(),
    name: z.string(),
    connectionStatus: z.string().optional(),
    currentFWVersion: z.string().optional()
  })
  .passthrough();

export type MsNode = z.infer<typeof nodeSchema>;

export const labelSchema = z
  .object({
    _id: z.string().optional(),
    key: z.string(),
    value: z.string()
  })
  .passthrough();

export type MsLabel = z.infer<typeof labelSchema>;

export const nodeDetailsSchema = z
  .object({
    model: z.string().optional(),
    labels: z.array(labelSchema).default([])
  })
  .passthrough();

export type MsNodeDetails = z.infer<typeof nodeDetailsSchema>;

export const servicePropertySchema = z
  .object({
    name: z.string(),
    value: z.unknown(),
    options: z.unknown().optional()
  })
  .passthrough();

export const workloadServiceSchema = z
  .object({
    name: z.string(),
    property_list: z.array(servicePropertySchema).default([])
  })
  .passthrough();

export const nodeWorkloadSchema = z
  .object({
    id: z.string(),
    device_name: z.string(),
    type: z.string(),
    workloadId: z.string(),
    versionId: z.string(),
    service_list: z.array(workloadServiceSchema).default([])
  })
  .passthrough();

export type MsNodeWorkload = z.infer<typeof nodeWorkloadSchema>;

export const workloadFileSchema = z
  .object({
    name: z.string().optional(),
    originalName: z.string().optional(),
    size: z.union([z.number(), z.string()]).optional()
  })
  .passthrough();

export const workloadVersionSchema = z
  .object({
    _id: z.string(),
    name: z.string(),
    releaseName: z.string().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    files: z.array(workloadFileSchema).optional()
  })
  .passthrough();

export type MsWorkloadVersion = z.infer<typeof workloadVersionSchema>;

export const workloadSchema = z
  .object({
    _id: z.string(),
    name: z.string(),
    type: z.string(),
    disabled: z.boolean().optional(),
    internalDockerRegistry: z.boolean().optional(),
    versions: z.array(workloadVersionSchema).optional()
  })
  .passthrough();

export type MsWorkload = z.infer<typeof workloadSchema>;

export const remoteConnectionSchema = z
  .object({
    _id: z.string().optional(),
    name: z.string().optional(),
    type: z.string().optional()
  })
  .passthrough();

export type MsRemoteConnection = z.infer<typeof remoteConnectionSchema>;

export const deploymentSchema = z
  .object({
    operationId: z.string().optional(),
    _id: z.string().optional(),
    status: z.string().optional()
  })
  .passthrough();

export type MsDeployment = z.infer<typeof deploymentSchema>;

/**
 * List endpoints answer either with a bare array or with `{ data: [...], count }`.
 */
export function pagedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.union([
    z.array(item),
    z.object({ data: z.array(item), count: z.number().optional() }).passthrough()
  ]);
}
