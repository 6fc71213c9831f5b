import { labelsFileSchema } from '../types/work-files';
import { formatJson } from '../utils/json';
import { readWorkFileAs, writeWorkFile } from '../utils/work-files';
import type { WorkflowContext } from './types';

export type LabelsAction = 'list' | 'add' | 'delete';

export interface LabelsOptions {
  file: string;
  action: LabelsAction;
}

export interface LabelPair {
  key: string;
  value: string;
}

export async function runLabels(context: WorkflowContext, options: LabelsOptions): Promise<LabelPair[]> {
  const { client, logger, workDir } = context;

  if (options.action === 'list') {
    const labels = (await client.labels.list()).map((label) => ({ key: label.key, value: label.value }));
    await writeWorkFile(workDir, options.file, labels);
    logger.info('Labels read from management system and written to %s:\n%s', options.file, formatJson(labels));
    return labels;
  }

  const fileLabels = (await readWorkFileAs(workDir, options.file, labelsFileSchema)).map((label) => ({
    key: label.key,
    value: label.value
  }));

  if (options.action === 'add') {
    for (const label of fileLabels) {
      await client.labels.create(label);
      logger.info("Label '%s=%s' created", label.key, label.value);
    }
    return fileLabels;
  }

  const existing = await client.labels.list();
  const deleted: LabelPair[] = [];
  for (const label of fileLabels) {
    const match = existing.find((item) => item.key === label.key && item.value === label.value);
    if (!match?._id) {
      logger.warn("Label '%s=%s' does not exist on the management system", label.key, label.value);
      continue;
    }
    await client.labels.delete(match._id);
    logger.info("Label '%s=%s' deleted", label.key, label.value);
    deleted.push(label);
  }
  return deleted;
}
