import { promises as fs } from 'node:fs';
import path from 'node:path';

import { errorMessage } from '../errors';
import { getLogger } from '../observability/logger';
import type { ResolveSecret } from '../secure/secrets';
import { isRecord } from '../utils/json';
import { ComputeOnceCache } from './cache';
import { createVaultCipher, decodeVaultKey, type VaultCipher } from './cipher';

export type ContentKind = 'bytes' | 'text' | 'json';

export type MemoryEntry = Record<string, unknown>;

export const ENCRYPTED_SUFFIX = '.enc';

export interface ContentStoreOptions {
  rootDir: string;
  resolveSecret: ResolveSecret;
  memoriesPath?: string;
  chatTranscriptPath?: string;
  chatTailChars?: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decode(data: Buffer, kind: ContentKind): unknown {
  if (kind === 'bytes') {
    return data;
  }
  const text = utf8.decode(data);
  if (kind === 'text') {
    return text;
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/** Trailing `limit` characters, counted in code points. */
export function tailText(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(-limit).join('');
}

/**
 * Resolves logical asset paths to content. `<path>.enc` wins whenever it
 * exists and a cipher is configured; a failed decrypt is final and the
 * plaintext sibling is not consulted.
 */
export class ContentStore {
  readonly rootDir: string;
  private readonly resolveSecret: ResolveSecret;
  private readonly memoriesPath: string;
  private readonly chatTranscriptPath: string;
  private readonly chatTailChars: number;
  private readonly memoriesCache = new ComputeOnceCache<MemoryEntry[]>();
  private readonly chatCache = new ComputeOnceCache<string>();
  private readonly logger = getLogger();
  private cipherPromise?: Promise<VaultCipher | undefined>;

  constructor(options: ContentStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.resolveSecret = options.resolveSecret;
    this.memoriesPath = options.memoriesPath ?? 'assets/memories.json';
    this.chatTranscriptPath = options.chatTranscriptPath ?? 'whatsapp_chat.txt';
    this.chatTailChars = options.chatTailChars ?? 15_000;
  }

  resolve(logicalPath: string, kind: 'bytes'): Promise<Buffer | undefined>;
  resolve(logicalPath: string, kind: 'text'): Promise<string | undefined>;
  resolve(logicalPath: string, kind: 'json'): Promise<unknown>;
  resolve(logicalPath: string, kind: ContentKind): Promise<unknown>;
  async resolve(logicalPath: string, kind: ContentKind): Promise<unknown> {
    const plainPath = this.toAbsolute(logicalPath);
    if (!plainPath) {
      this.logger.warn({ path: logicalPath }, 'Asset path escapes the vault root');
      return undefined;
    }
    const encPath = `${plainPath}${ENCRYPTED_SUFFIX}`;

    try {
      const cipher = await this.getCipher();
      if (cipher && (await isFile(encPath))) {
        return await this.readEncrypted(cipher, encPath, logicalPath, kind);
      }

      if (await isFile(plainPath)) {
        return decode(await fs.readFile(plainPath), kind);
      }
    } catch (error) {
      this.logger.error({ path: logicalPath, kind, error: errorMessage(error) }, 'Asset read failed');
      return undefined;
    }

    this.logger.debug({ path: logicalPath }, 'Asset absent');
    return undefined;
  }

  loadMemories(): Promise<MemoryEntry[]> {
    return this.memoriesCache.get(this.memoriesPath, async () => {
      const data = await this.resolve(this.memoriesPath, 'json');
      if (!Array.isArray(data)) {
        return [];
      }
      const entries: MemoryEntry[] = [];
      for (const item of data) {
        if (isRecord(item)) {
          entries.push(item);
        }
      }
      if (entries.length !== data.length) {
        this.logger.warn({ dropped: data.length - entries.length }, 'Ignored memories that are not JSON objects');
      }
      return entries;
    });
  }

  loadChatHistory(): Promise<string> {
    return this.chatCache.get(this.chatTranscriptPath, async () => {
      const text = await this.resolve(this.chatTranscriptPath, 'text');
      return text ? tailText(text, this.chatTailChars) : '';
    });
  }

  hasCipher(): Promise<boolean> {
    return this.getCipher().then((cipher) => cipher !== undefined);
  }

  private async readEncrypted(cipher: VaultCipher, encPath: string, logicalPath: string, kind: ContentKind): Promise<unknown> {
    try {
      return decode(cipher.decrypt(await fs.readFile(encPath)), kind);
    } catch (error) {
      this.logger.error({ path: logicalPath, error: errorMessage(error) }, 'Decryption failed');
      return undefined;
    }
  }

  private toAbsolute(logicalPath: string): string | undefined {
    const absolute = path.resolve(this.rootDir, logicalPath);
    const relative = path.relative(this.rootDir, absolute);
    if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return undefined;
    }
    return absolute;
  }

  private getCipher(): Promise<VaultCipher | undefined> {
    if (!this.cipherPromise) {
      this.cipherPromise = this.resolveSecret('VAULT_KEY').then((key) => {
        if (!key) {
          this.logger.debug('VAULT_KEY not set; encrypted assets are skipped');
          return undefined;
        }
        if (!decodeVaultKey(key)) {
          this.logger.warn('VAULT_KEY is malformed; encrypted assets are skipped');
          return undefined;
        }
        return createVaultCipher(key);
      });
    }
    return this.cipherPromise;
  }
}
