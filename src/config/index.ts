import path from 'node:path';

import { z } from 'zod';

import { VaultConfigError } from '../errors';
import { getVaultConfigDir } from '../utils/config-dir';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ParticipantsSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  )
  .refine((names) => names.length === 2 && names[0] !== names[1], {
    message: 'Expected exactly two distinct comma-separated names.'
  })
  .transform((names): [string, string] => [names[0], names[1]]);

const EnvSchema = z.object({
  MEMORY_VAULT_ROOT: z.string().min(1).optional(),
  MEMORY_VAULT_CONFIG_DIR: z.string().min(1).optional(),
  MEMORY_VAULT_ASSETS_DIR: z.string().min(1).default('assets'),
  MEMORY_VAULT_MEMORIES_PATH: z.string().min(1).default('assets/memories.json'),
  MEMORY_VAULT_CHAT_PATH: z.string().min(1).default('whatsapp_chat.txt'),
  MEMORY_VAULT_CHAT_TAIL_CHARS: positiveInt(15_000),
  MEMORY_VAULT_KEY_FILE: z.string().min(1).default('secret.key'),
  MEMORY_VAULT_PROVIDER_TIMEOUT_MS: positiveInt(30_000),
  MEMORY_VAULT_GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  MEMORY_VAULT_MISTRAL_MODEL: z.string().min(1).default('mistral-large-latest'),
  MEMORY_VAULT_GROQ_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),
  MEMORY_VAULT_PARTICIPANTS: ParticipantsSchema.optional(),
  MEMORY_VAULT_GATE_MIN_INTERVAL_MS: positiveInt(500),
  MEMORY_VAULT_GATE_WINDOW_MS: positiveInt(3_600_000),
  MEMORY_VAULT_GATE_MAX_FAILURES: positiveInt(10)
});

export interface GateConfig {
  minIntervalMs: number;
  windowMs: number;
  maxFailures: number;
}

export interface ProviderModels {
  gemini: string;
  mistral: string;
  groq: string;
}

export interface VaultConfig {
  rootDir: string;
  configDir: string;
  assetsDir: string;
  memoriesPath: string;
  chatTranscriptPath: string;
  chatTailChars: number;
  keyFile: string;
  providerTimeoutMs: number;
  models: ProviderModels;
  participants?: [string, string];
  gate: GateConfig;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    out[key] = value ? value : undefined;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): VaultConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new VaultConfigError(`Invalid configuration. ${issues.join('; ')}`);
  }

  const values = parsed.data;
  const rootDir = path.resolve(cwd, values.MEMORY_VAULT_ROOT ?? '.');

  return {
    rootDir,
    configDir: values.MEMORY_VAULT_CONFIG_DIR ?? getVaultConfigDir(env),
    assetsDir: values.MEMORY_VAULT_ASSETS_DIR,
    memoriesPath: values.MEMORY_VAULT_MEMORIES_PATH,
    chatTranscriptPath: values.MEMORY_VAULT_CHAT_PATH,
    chatTailChars: values.MEMORY_VAULT_CHAT_TAIL_CHARS,
    keyFile: path.resolve(rootDir, values.MEMORY_VAULT_KEY_FILE),
    providerTimeoutMs: values.MEMORY_VAULT_PROVIDER_TIMEOUT_MS,
    models: {
      gemini: values.MEMORY_VAULT_GEMINI_MODEL,
      mistral: values.MEMORY_VAULT_MISTRAL_MODEL,
      groq: values.MEMORY_VAULT_GROQ_MODEL
    },
    participants: values.MEMORY_VAULT_PARTICIPANTS,
    gate: {
      minIntervalMs: values.MEMORY_VAULT_GATE_MIN_INTERVAL_MS,
      windowMs: values.MEMORY_VAULT_GATE_WINDOW_MS,
      maxFailures: values.MEMORY_VAULT_GATE_MAX_FAILURES
    }
  };
}
