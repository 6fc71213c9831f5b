export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function tryParseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

/**
 * Four-space indentation, no trailing newline.
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 4);
}
