import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';

import { getLogger } from '../observability/logger';

const execFileAsync = promisify(execFile);
const SERVICE_NAME = 'memory-vault';

export interface KeychainStore {
  readonly backend: 'darwin-security' | 'secret-tool' | 'memory';
  setSecret(name: string, value: string): Promise<void>;
  getSecret(name: string): Promise<string | undefined>;
  clearSecret(name: string): Promise<void>;
}

async function commandExists(command: string): Promise<boolean> {
  try {
    await execFileAsync('bash', ['-lc', `command -v ${command}`]);
    return true;
  } catch {
    return false;
  }
}

class DarwinSecurityKeychain implements KeychainStore {
  readonly backend = 'darwin-security' as const;

  async setSecret(name: string, value: string): Promise<void> {
    await execFileAsync('security', ['add-generic-password', '-a', name, '-s', SERVICE_NAME, '-w', value, '-U']);
  }

  async getSecret(name: string): Promise<string | undefined> {
    try {
      const { stdout } = await execFileAsync('security', ['find-generic-password', '-a', name, '-s', SERVICE_NAME, '-w']);
      return stdout.trim() || undefined;
    } catch {
      return undefined;
    }
  }

  async clearSecret(name: string): Promise<void> {
    try {
      await execFileAsync('security', ['delete-generic-password', '-a', name, '-s', SERVICE_NAME]);
    } catch (error) {
      getLogger().debug({ name, error: error instanceof Error ? error.message : String(error) }, 'Keychain entry not removed');
    }
  }
}

class LinuxSecretToolKeychain implements KeychainStore {
  readonly backend = 'secret-tool' as const;

  async setSecret(name: string, value: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const child = spawn('secret-tool', ['store', '--label', `${SERVICE_NAME} ${name}`, 'service', SERVICE_NAME, 'account', name], {
        stdio: ['pipe', 'ignore', 'pipe']
      });

      let stderr = '';
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new Error(stderr || `secret-tool exited with code ${code ?? -1}`));
      });

      child.stdin.write(value);
      child.stdin.end();
    });
  }

  async getSecret(name: string): Promise<string | undefined> {
    try {
      const { stdout } = await execFileAsync('secret-tool', ['lookup', 'service', SERVICE_NAME, 'account', name]);
      return stdout.trim() || undefined;
    } catch {
      return undefined;
    }
  }

  async clearSecret(name: string): Promise<void> {
    try {
      await execFileAsync('secret-tool', ['clear', 'service', SERVICE_NAME, 'account', name]);
    } catch (error) {
      getLogger().debug({ name, error: error instanceof Error ? error.message : String(error) }, 'Keychain entry not removed');
    }
  }
}

export class MemoryKeychain implements KeychainStore {
  readonly backend = 'memory' as const;
  private readonly values = new Map<string, string>();

  async setSecret(name: string, value: string): Promise<void> {
    this.values.set(name, value);
  }

  async getSecret(name: string): Promise<string | undefined> {
    return this.values.get(name);
  }

  async clearSecret(name: string): Promise<void> {
    this.values.delete(name);
  }
}

/**
 * Picks the OS keychain backend. Returns undefined when none is usable, or when
 * `MEMORY_VAULT_KEYCHAIN_BACKEND=none`; `memory` forces an in-process store.
 */
export async function createKeychainStore(env: NodeJS.ProcessEnv = process.env): Promise<KeychainStore | undefined> {
  const requested = env.MEMORY_VAULT_KEYCHAIN_BACKEND?.trim().toLowerCase();
  if (requested === 'none') {
    return undefined;
  }
  if (requested === 'memory') {
    return new MemoryKeychain();
  }

  if (process.platform === 'darwin') {
    return new DarwinSecurityKeychain();
  }

  if (process.platform === 'linux' && (await commandExists('secret-tool'))) {
    return new LinuxSecretToolKeychain();
  }

  return undefined;
}
