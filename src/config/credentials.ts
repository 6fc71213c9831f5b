import type { Logger } from 'pino';

import {
  AmbiguousCredentialsFileError,
  MalformedCredentialsFileError,
  MissingConfigurationError
} from '../http/errors';
import type { CredentialsFile } from './credentials-file';

export interface CredentialsEnv {
  MS_URL?: string;
  MS_USR?: string;
  MS_PSW?: string;
}

export type HostSource = 'cli' | 'credentials-file' | 'env';

export type CredentialSource = 'cli' | 'credentials-file' | 'env' | 'none';

export interface ResolveCredentialsInput {
  cliUrl?: string;
  cliUser?: string;
  cliPassword?: string;
  credentialsFile?: CredentialsFile;
  env?: CredentialsEnv;
  logger?: Pick<Logger, 'debug' | 'warn'>;
}

export interface ResolvedCredentials {
  url: string;
  username?: string;
  password?: string;
  hostSource: HostSource;
  credentialSource: CredentialSource;
}

function presentHost(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Only a missing or empty value is absent; surrounding spaces belong to the credential. */
function presentCredential(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * `https://ms.example.com/` and `ms.example.com` name the same credentials section.
 */
export function normalizeHost(value: string): string {
  const trimmed = value.trim();
  const schemeEnd = trimmed.indexOf('://');
  const withoutScheme = schemeEnd === -1 ? trimmed : trimmed.slice(schemeEnd + 3);
  return withoutScheme.replace(/\/+$/, '');
}

export function resolveHost(input: ResolveCredentialsInput): { url: string; source: HostSource } {
  const cliUrl = presentHost(input.cliUrl);
  if (cliUrl) {
    return { url: normalizeHost(cliUrl), source: 'cli' };
  }

  const sections = input.credentialsFile?.sections ?? [];
  if (sections.length === 1) {
    return { url: sections[0].host, source: 'credentials-file' };
  }
  if (sections.length > 1) {
    throw new AmbiguousCredentialsFileError(sections.map((section) => section.host));
  }

  const envUrl = presentHost(input.env?.MS_URL);
  if (envUrl) {
    return { url: normalizeHost(envUrl), source: 'env' };
  }

  throw new MissingConfigurationError();
}

/**
 * Picks the host and the username/password for one invocation.
 *
 * Command line beats the credentials file, which beats `MS_URL`/`MS_USR`/`MS_PSW`. Credentials are looked
 * up field by field, so `--ms_user` combined with a file password works. Nothing here touches the network;
 * missing credentials only surface once the client has to log in.
 */
export function resolveCredentials(input: ResolveCredentialsInput): ResolvedCredentials {
  const { url, source: hostSource } = resolveHost(input);
  const cliUser = presentCredential(input.cliUser);
  const cliPassword = presentCredential(input.cliPassword);

  const section = input.credentialsFile?.sections.find((item) => item.host === url);
  if (section) {
    const username = cliUser ?? section.username;
    const password = cliPassword ?? section.password;
    const missing = [username ? undefined : 'username', password ? undefined : 'password'].filter(Boolean);
    if (missing.length > 0) {
      throw new MalformedCredentialsFileError(
        `Section [${url}] of ${input.credentialsFile?.path ?? 'the credentials file'} has no ${missing.join(' or ')}.`
      );
    }

    input.logger?.debug('Using credentials from %s for %s', input.credentialsFile?.path, url);
    return {
      url,
      username,
      password,
      hostSource,
      credentialSource: cliUser && cliPassword ? 'cli' : 'credentials-file'
    };
  }

  if (cliUser && cliPassword) {
    return { url, username: cliUser, password: cliPassword, hostSource, credentialSource: 'cli' };
  }

  const username = cliUser ?? presentCredential(input.env?.MS_USR);
  const password = cliPassword ?? presentCredential(input.env?.MS_PSW);
  if (username && password) {
    input.logger?.debug('Using credentials from environment variables for %s', url);
    return { url, username, password, hostSource, credentialSource: 'env' };
  }

  input.logger?.warn(
    'No credentials provided for MS. Please provide credentials in the environment variables MS_USR and MS_PSW or in the credentials file.'
  );
  return { url, username, password, hostSource, credentialSource: 'none' };
}
