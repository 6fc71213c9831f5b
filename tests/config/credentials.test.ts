import { describe, expect, it, vi } from 'vitest';

import { normalizeHost, resolveCredentials } from '../../src/config/credentials';
import { parseCredentials, type CredentialsFile } from '../../src/config/credentials-file';
import {
  AmbiguousCredentialsFileError,
  MalformedCredentialsFileError,
  MissingConfigurationError
} from '../../src/http/errors';

function fileWith(...sections: CredentialsFile['sections']): CredentialsFile {
  return { path: 'credentials.ini', sections };
}

describe('host normalisation', () => {
  it('strips scheme and trailing slashes', () => {
    expect(normalizeHost('https://ms.example.test/')).toBe('ms.example.test');
    expect(normalizeHost(' http://ms.example.test// ')).toBe('ms.example.test');
    expect(normalizeHost('ms.example.test')).toBe('ms.example.test');
  });
});

describe('credential resolution', () => {
  it('takes the only section of the credentials file when no url is given', () => {
    const resolved = resolveCredentials({
      credentialsFile: fileWith({ host: 'ms.example.test', username: 'file-user', password: 'file-secret' }),
      env: {}
    });

    expect(resolved).toEqual({
      url: 'ms.example.test',
      username: 'file-user',
      password: 'file-secret',
      hostSource: 'credentials-file',
      credentialSource: 'credentials-file'
    });
  });

  it('prefers the command line url over the file and the environment', () => {
    const resolved = resolveCredentials({
      cliUrl: 'https://other.example.test',
      cliUser: 'cli-user',
      cliPassword: 'cli-secret',
      credentialsFile: fileWith({ host: 'ms.example.test', username: 'file-user', password: 'file-secret' }),
      env: { MS_URL: 'env.example.test', MS_USR: 'env-user', MS_PSW: 'env-secret' }
    });

    expect(resolved.url).toBe('other.example.test');
    expect(resolved.hostSource).toBe('cli');
    expect(resolved.username).toBe('cli-user');
    expect(resolved.password).toBe('cli-secret');
    expect(resolved.credentialSource).toBe('cli');
  });

  it('overrides file credentials field by field', () => {
    const resolved = resolveCredentials({
      cliUrl: 'ms.example.test',
      cliUser: 'cli-user',
      credentialsFile: fileWith({ host: 'ms.example.test', username: 'file-user', password: 'file-secret' }),
      env: {}
    });

    expect(resolved.username).toBe('cli-user');
    expect(resolved.password).toBe('file-secret');
    expect(resolved.credentialSource).toBe('credentials-file');
  });

  it('falls back to MS_URL, MS_USR and MS_PSW', () => {
    const resolved = resolveCredentials({
      env: { MS_URL: 'https://env.example.test/', MS_USR: 'env-user', MS_PSW: 'env-secret' }
    });

    expect(resolved).toEqual({
      url: 'env.example.test',
      username: 'env-user',
      password: 'env-secret',
      hostSource: 'env',
      credentialSource: 'env'
    });
  });

  it('passes credentials with surrounding spaces through unchanged', () => {
    const resolved = resolveCredentials({
      cliUrl: ' ms.example.test ',
      cliUser: 'u',
      cliPassword: ' secret ',
      env: {}
    });

    expect(resolved.url).toBe('ms.example.test');
    expect(resolved.username).toBe('u');
    expect(resolved.password).toBe(' secret ');
  });

  it('treats an empty MS_PSW as missing but keeps a blank one', () => {
    expect(resolveCredentials({ cliUrl: 'ms.example.test', env: { MS_USR: 'u', MS_PSW: '' } }).password).toBeUndefined();
    expect(resolveCredentials({ cliUrl: 'ms.example.test', env: { MS_USR: 'u', MS_PSW: '  ' } }).password).toBe('  ');
  });

  it('lets a command line user win over MS_USR', () => {
    const resolved = resolveCredentials({
      cliUrl: 'ms.example.test',
      cliUser: 'cli-user',
      env: { MS_USR: 'env-user', MS_PSW: 'env-secret' }
    });

    expect(resolved.username).toBe('cli-user');
    expect(resolved.password).toBe('env-secret');
    expect(resolved.credentialSource).toBe('env');
  });

  it('uses environment credentials when the file has no section for the url', () => {
    const resolved = resolveCredentials({
      cliUrl: 'other.example.test',
      credentialsFile: fileWith({ host: 'ms.example.test', username: 'file-user', password: 'file-secret' }),
      env: { MS_USR: 'env-user', MS_PSW: 'env-secret' }
    });

    expect(resolved.username).toBe('env-user');
    expect(resolved.credentialSource).toBe('env');
  });

  it('warns and leaves credentials unresolved when nothing provides them', () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const resolved = resolveCredentials({ cliUrl: 'ms.example.test', env: {}, logger });

    expect(resolved.username).toBeUndefined();
    expect(resolved.password).toBeUndefined();
    expect(resolved.credentialSource).toBe('none');
    expect(logger.warn).toHaveBeenCalledWith(
      'No credentials provided for MS. Please provide credentials in the environment variables MS_USR and MS_PSW or in the credentials file.'
    );
  });

  it('fails without any url', () => {
    expect(() => resolveCredentials({ env: { MS_USR: 'env-user', MS_PSW: 'env-secret' } })).toThrow(
      MissingConfigurationError
    );
  });

  it('refuses to pick one of several file sections', () => {
    const credentialsFile = fileWith(
      { host: 'a.example.test', username: 'a', password: 'test-secret' },
      { host: 'b.example.test', username: 'b', password: 'test-secret' }
    );

    expect(() => resolveCredentials({ credentialsFile, env: { MS_URL: 'a.example.test' } })).toThrow(
      AmbiguousCredentialsFileError
    );

    const selected = resolveCredentials({ cliUrl: 'b.example.test', credentialsFile, env: {} });
    expect(selected.username).toBe('b');
  });

  it('reports a selected section without a password', () => {
    const credentialsFile = fileWith({ host: 'ms.example.test', username: 'file-user' });

    expect(() => resolveCredentials({ credentialsFile, env: {} })).toThrow(MalformedCredentialsFileError);
    expect(() => resolveCredentials({ credentialsFile, env: {} })).toThrow(
      'Section [ms.example.test] of credentials.ini has no password.'
    );
    expect(resolveCredentials({ credentialsFile, cliPassword: 'cli-secret', env: {} }).password).toBe('cli-secret');
  });

  it('resolves hosts parsed from an INI file', () => {
    const credentialsFile = parseCredentials('[ms.example.test]\nusername = file-user\npassword = file-secret\n');

    expect(resolveCredentials({ cliUrl: 'https://ms.example.test', credentialsFile, env: {} })).toMatchObject({
      url: 'ms.example.test',
      username: 'file-user',
      password: 'file-secret'
    });
  });
});
