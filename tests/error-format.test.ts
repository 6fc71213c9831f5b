import { describe, expect, it } from 'vitest';

import { parseErrorFormatArg, resolveCliErrorFormat } from '../src/utils/error-format';

describe('error format argv parsing', () => {
  it('parses --error_format <value>', () => {
    expect(parseErrorFormatArg(['--error_format', 'json', 'nodes_list'])).toBe('json');
    expect(parseErrorFormatArg(['--error_format', 'text', 'nodes_list'])).toBe('text');
  });

  it('parses --error_format=<value>', () => {
    expect(parseErrorFormatArg(['--error_format=json', 'labels', '-l'])).toBe('json');
    expect(parseErrorFormatArg(['--error_format=text', 'labels', '-l'])).toBe('text');
  });

  it('ignores unknown values', () => {
    expect(parseErrorFormatArg(['--error_format', 'yaml', 'labels'])).toBeUndefined();
  });

  it('prefers explicit CLI value over environment fallback', () => {
    expect(resolveCliErrorFormat(['--error_format', 'text'], 'json')).toBe('text');
    expect(resolveCliErrorFormat(['--error_format=json'], 'text')).toBe('json');
  });

  it('falls back to environment when flag is absent', () => {
    expect(resolveCliErrorFormat(['nodes_list'], 'json')).toBe('json');
    expect(resolveCliErrorFormat(['nodes_list'], 'text')).toBe('text');
    expect(resolveCliErrorFormat(['nodes_list'], undefined)).toBe('text');
  });
});
