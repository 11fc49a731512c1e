import { promises as fs } from 'node:fs';
import path from 'node:path';

import { getLogger } from '../observability/logger';
import { errorMessage } from '../errors';
import { isRecord } from '../utils/json';
import type { KeychainStore } from './keychain';

export type SecretName = 'GOOGLE_API_KEY' | 'MISTRAL_API_KEY' | 'GROQ_API_KEY' | 'VAULT_KEY';

export type ResolveSecret = (name: SecretName) => Promise<string | undefined>;

export interface SecretSource {
  readonly name: string;
  get(name: SecretName): Promise<string | undefined>;
}

function nonBlank(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Managed secrets kept as a flat JSON object, `<configDir>/secrets.json`.
 * The file is read once; a missing file means no secrets.
 */
export class FileSecretSource implements SecretSource {
  readonly name = 'secrets-file';
  private readonly filePath: string;
  private loaded?: Promise<Record<string, unknown>>;

  constructor(configDir: string) {
    this.filePath = path.join(configDir, 'secrets.json');
  }

  async get(name: SecretName): Promise<string | undefined> {
    const values = await this.load();
    return nonBlank(values[name]);
  }

  private load(): Promise<Record<string, unknown>> {
    if (!this.loaded) {
      this.loaded = this.read();
    }
    return this.loaded;
  }

  private async read(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        getLogger().warn({ path: this.filePath, error: errorMessage(error) }, 'Secrets file unreadable; ignoring it');
      }
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(text);
      if (isRecord(parsed)) {
        return parsed;
      }
      getLogger().warn({ path: this.filePath }, 'Secrets file is not a JSON object; ignoring it');
    } catch (error) {
      getLogger().warn({ path: this.filePath, error: errorMessage(error) }, 'Secrets file is not valid JSON; ignoring it');
    }
    return {};
  }
}

export class KeychainSecretSource implements SecretSource {
  readonly name = 'keychain';

  constructor(private readonly keychain: KeychainStore) {}

  async get(name: SecretName): Promise<string | undefined> {
    return nonBlank(await this.keychain.getSecret(name));
  }
}

export class EnvSecretSource implements SecretSource {
  readonly name = 'environment';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(name: SecretName): Promise<string | undefined> {
    return nonBlank(this.env[name]);
  }
}

/** First source with a non-blank value wins. */
export function createSecretResolver(sources: SecretSource[]): ResolveSecret {
  return async (name) => {
    for (const source of sources) {
      const value = await source.get(name);
      if (value !== undefined) {
        getLogger().debug({ secret: name, source: source.name }, 'Secret resolved');
        return value;
      }
    }
    return undefined;
  };
}

export function createDefaultSecretResolver(args: {
  configDir: string;
  keychain?: KeychainStore;
  env?: NodeJS.ProcessEnv;
}): ResolveSecret {
  const sources: SecretSource[] = [new FileSecretSource(args.configDir)];
  if (args.keychain) {
    sources.push(new KeychainSecretSource(args.keychain));
  }
  sources.push(new EnvSecretSource(args.env));
  return createSecretResolver(sources);
}
