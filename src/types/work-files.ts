import { z } from 'zod';

import { labelSchema, nodeSchema, workloadSchema } from './ms';

/*
 * Work files are written by one subcommand and read back by another, possibly after the user edited them.
 */

export const nodeWorkloadEntrySchema = z
  .object({
    name: z.string(),
    type: z.string().optional(),
    _id: z.string().optional(),
    version_id: z.string().optional(),
    version_name: z.string().optional(),
    state: z.string().optional(),
    device_id: z.string().optional()
  })
  .passthrough();

export type NodeWorkloadEntry = z.infer<typeof nodeWorkloadEntrySchema>;

export const nodeEntrySchema = nodeSchema.extend({
  workloads: z.array(nodeWorkloadEntrySchema).optional()
});

export type NodeEntry = z.infer<typeof nodeEntrySchema>;

export const nodesFileSchema = z.array(nodeEntrySchema);

export const labelsFileSchema = z.array(labelSchema);

export const remotesFileSchema = z.array(z.record(z.unknown()));

export const workloadsFileSchema = z.array(workloadSchema);
