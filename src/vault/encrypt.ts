import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';

import { errorMessage } from '../errors';
import { getLogger } from '../observability/logger';
import { ENCRYPTED_SUFFIX } from './content-store';
import { VaultCipher, decodeVaultKey, generateVaultKey } from './cipher';

export const VAULT_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.mp4', '.mov', '.json', '.txt'] as const;

export interface VaultKeyFile {
  key: string;
  path: string;
  created: boolean;
}

export interface VaultTargetOptions {
  assetsDir: string;
  chatTranscriptPath: string;
}

export interface EncryptVaultResult {
  encrypted: Array<{ source: string; target: string }>;
  failed: Array<{ source: string; error: string }>;
}

/** Reads the key file, or generates a key and writes it with owner-only permissions. */
export async function loadOrCreateKey(keyFile: string): Promise<VaultKeyFile> {
  try {
    const key = (await fs.readFile(keyFile, 'utf8')).trim();
    if (!decodeVaultKey(key)) {
      throw new Error(`Key file ${keyFile} does not hold a valid vault key.`);
    }
    return { key, path: keyFile, created: false };
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const key = generateVaultKey();
  await fs.mkdir(path.dirname(keyFile), { recursive: true });
  await fs.writeFile(keyFile, `${key}\n`, { encoding: 'utf8', mode: 0o600 });
  return { key, path: keyFile, created: true };
}

export function isVaultTarget(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(ENCRYPTED_SUFFIX) || fileName.includes('example')) {
    return false;
  }
  return VAULT_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

async function walk(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries.sort((left, right) => left.name.localeCompare(right.name))) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(fullPath)));
    } else if (entry.isFile() && isVaultTarget(entry.name)) {
      files.push(fullPath);
    }
  }
  return files;
}

/** Chat transcript first (when present), then matching files under the assets tree. */
export async function collectVaultTargets(rootDir: string, options: VaultTargetOptions): Promise<string[]> {
  const targets: string[] = [];
  const transcript = path.resolve(rootDir, options.chatTranscriptPath);
  try {
    if ((await fs.stat(transcript)).isFile()) {
      targets.push(transcript);
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  targets.push(...(await walk(path.resolve(rootDir, options.assetsDir))));
  return targets;
}

export async function encryptVault(args: {
  rootDir: string;
  key: string;
  targets: VaultTargetOptions;
}): Promise<EncryptVaultResult> {
  const logger = getLogger();
  const keyBytes = decodeVaultKey(args.key);
  if (!keyBytes) {
    throw new Error('Vault key is malformed.');
  }
  const cipher = new VaultCipher(keyBytes);
  const files = await collectVaultTargets(args.rootDir, args.targets);
  logger.info({ count: files.length }, 'Encrypting vault files');

  const result: EncryptVaultResult = { encrypted: [], failed: [] };
  for (const source of files) {
    const target = `${source}${ENCRYPTED_SUFFIX}`;
    try {
      await fs.writeFile(target, cipher.encrypt(await fs.readFile(source)));
      result.encrypted.push({ source, target });
    } catch (error) {
      logger.error({ source, error: errorMessage(error) }, 'Encryption failed');
      result.failed.push({ source, error: errorMessage(error) });
    }
  }
  return result;
}
