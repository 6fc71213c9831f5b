export type CliErrorFormat = 'text' | 'json';

const ERROR_FORMAT_FLAG = '--error_format';

function isCliErrorFormat(value: string | undefined): value is CliErrorFormat {
  return value === 'text' || value === 'json';
}

export function parseErrorFormatArg(argv: string[]): CliErrorFormat | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === ERROR_FORMAT_FLAG) {
      const next = argv[index + 1];
      if (isCliErrorFormat(next)) {
        return next;
      }
      continue;
    }

    if (arg.startsWith(`${ERROR_FORMAT_FLAG}=`)) {
      const value = arg.slice(ERROR_FORMAT_FLAG.length + 1);
      if (isCliErrorFormat(value)) {
        return value;
      }
    }
  }

  return undefined;
}

/**
 * `--error_format` wins over `NERVE_ERROR_FORMAT`; anything unrecognised means text.
 */
export function resolveCliErrorFormat(argv: string[], envValue?: string): CliErrorFormat {
  return parseErrorFormatArg(argv) ?? (envValue === 'json' ? 'json' : 'text');
}
