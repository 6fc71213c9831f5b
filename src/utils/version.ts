import { readFileSync } from 'node:fs';
import path from 'node:path';

import { isPlainRecord, tryParseJson } from './json';

let cachedVersion: string | undefined;

function readPackageVersion(): string | undefined {
  // src/utils and dist/utils both sit two levels below the package root.
  const packageJsonPath = path.resolve(__dirname, '../../package.json');
  let content: string;
  try {
    content = readFileSync(packageJsonPath, 'utf8');
  } catch {
    return undefined;
  }

  const packageJson = tryParseJson(content);
  if (isPlainRecord(packageJson) && typeof packageJson.version === 'string' && packageJson.version.trim()) {
    return packageJson.version;
  }
  return undefined;
}

export function getCliVersion(): string {
  if (!cachedVersion) {
    cachedVersion = readPackageVersion() ?? '0.0.0';
  }
  return cachedVersion;
}
