import type { z } from 'zod';

import { MsValidationError } from '../http/errors';

export function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, endpointKey: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MsValidationError(`Unexpected response from ${endpointKey}${where}: ${issue?.message ?? 'invalid payload'}`);
  }
  return result.data;
}

export function unwrapPage<T>(page: T[] | { data: T[] }): T[] {
  return Array.isArray(page) ? page : page.data;
}
