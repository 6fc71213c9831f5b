import os from 'node:os';
import path from 'node:path';

export function getConfigDir(): string {
  if (process.env.NERVE_CLI_CONFIG_DIR) {
    return process.env.NERVE_CLI_CONFIG_DIR;
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'nerve-cli');
  }

  if (process.platform === 'win32') {
    const appData = process.env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'nerve-cli');
  }

  const xdg = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(xdg, 'nerve-cli');
}
