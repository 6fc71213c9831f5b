import { MsValidationError } from '../http/errors';

export type FilterValue = string | number | boolean | undefined;

const REGEX_PREFIX = 'regex:';

/**
 * Command line filter check. `regex:<re>` searches string values, anything else compares for equality.
 * An empty or absent filter matches everything.
 */
export function matchesFilter(filter: FilterValue, value: unknown): boolean {
  if (filter === undefined || filter === '') {
    return true;
  }

  if (typeof filter === 'string' && filter.startsWith(REGEX_PREFIX)) {
    return typeof value === 'string' && new RegExp(filter.slice(REGEX_PREFIX.length)).test(value);
  }

  return filter === value;
}

const SIZE_UNITS: Array<[string, number]> = [
  ['GB', 1024 * 1024 * 1024],
  ['MB', 1024 * 1024],
  ['KB', 1024],
  ['B', 1]
];

/**
 * `'100MB'` → bytes. Units are binary and the suffix is mandatory.
 */
export function parseSize(value: string): number {
  const trimmed = value.trim();
  for (const [unit, factor] of SIZE_UNITS) {
    if (!trimmed.endsWith(unit)) {
      continue;
    }
    const amount = Number(trimmed.slice(0, -unit.length));
    if (trimmed.length === unit.length || Number.isNaN(amount)) {
      break;
    }
    return Math.trunc(amount * factor);
  }
  throw new MsValidationError(`Invalid size format '${value}', must end with one of GB, MB, KB, B`);
}

export function formatSize(bytes: number): string {
  if (bytes > 10 * 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GB`;
  }
  if (bytes > 10 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }
  if (bytes > 10 * 1024) {
    return `${(bytes / 1024).toFixed(2)}KB`;
  }
  return `${bytes}B`;
}

function parseIndex(part: string): number | undefined {
  if (part === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(part.trim())) {
    throw new MsValidationError('Invalid version_list_filter format.');
  }
  return Number(part);
}

/**
 * Applies `<start>:<end>` (either side optional) or a single `<index>`; negative values count from the end.
 */
export function applyListFilter<T>(items: T[], expression: string): T[] {
  const parts = expression.split(':');
  if (parts.length === 2) {
    return items.slice(parseIndex(parts[0]), parseIndex(parts[1]));
  }

  if (parts.length === 1) {
    const index = parseIndex(parts[0]);
    const item = index === undefined ? undefined : items.at(index);
    if (item === undefined) {
      throw new MsValidationError('Invalid version_list_filter format.');
    }
    return [item];
  }

  throw new MsValidationError('Invalid version_list_filter format.');
}

/**
 * Parses a `YYYY-MM-DD` command line date as UTC midnight.
 */
export function parseDateArg(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  const date = match ? new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new MsValidationError(`Invalid date '${value}', expected YYYY-MM-DD`);
  }
  return date;
}
