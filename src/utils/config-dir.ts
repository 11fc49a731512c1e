import os from 'node:os';
import path from 'node:path';

export function getVaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.MEMORY_VAULT_CONFIG_DIR) {
    return env.MEMORY_VAULT_CONFIG_DIR;
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'memory-vault');
  }

  if (process.platform === 'win32') {
    const appData = env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'memory-vault');
  }

  const xdg = env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(xdg, 'memory-vault');
}
