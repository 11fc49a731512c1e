import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCli, type CliRuntime } from '../src/cli/index';
import { createScriptedPrompter } from '../src/cli/prompt';
import { AssetAbsentError, GateRejectedError } from '../src/errors';
import type { ProviderAdapter } from '../src/llm/provider';
import { MemoryKeychain } from '../src/secure/keychain';
import type { SecretName } from '../src/secure/secrets';

function collect(mock: { mock: { calls: unknown[][] } }): string {
  return mock.mock.calls.map((call) => String(call[0])).join('');
}

describe('cli integration', () => {
  let root: string;
  let configDir: string;
  let stdout: { write: ReturnType<typeof vi.fn> };
  let stderr: { write: ReturnType<typeof vi.fn> };
  let groqReply: string;

  const secrets: Partial<Record<SecretName, string>> = { GROQ_API_KEY: 'test-groq' };

  function runtime(overrides: CliRuntime = {}): CliRuntime {
    const groq: ProviderAdapter = { id: 'groq', generate: vi.fn(async () => ({ text: groqReply, raw: null })) };
    return {
      env: {
        MEMORY_VAULT_ROOT: root,
        MEMORY_VAULT_CONFIG_DIR: configDir,
        MEMORY_VAULT_PARTICIPANTS: 'Maya,Leo'
      },
      cwd: root,
      keychain: null,
      resolveSecret: async (name) => secrets[name],
      adapterFactories: { groq: () => groq },
      stdout,
      stderr,
      ...overrides
    };
  }

  function run(args: string[], overrides: CliRuntime = {}) {
    return createCli(runtime(overrides)).parseAsync(['node', 'memory-vault', ...args]);
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'memory-vault-cli-'));
    configDir = join(root, '.config');
    mkdirSync(join(root, 'assets'));
    writeFileSync(join(root, 'assets', 'memories.json'), JSON.stringify([{ file_path: 'assets/beach.jpg' }]));
    writeFileSync(join(root, 'assets', 'beach.jpg'), 'jpeg-bytes');
    writeFileSync(join(root, 'whatsapp_chat.txt'), 'Leo: hello');
    stdout = { write: vi.fn() };
    stderr = { write: vi.fn() };
    groqReply = 'hey';
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('prints the gate decision for a valid phrase', async () => {
    await run(['unlock', '1/1/26']);
    expect(collect(stdout.write)).toBe('{\n  "verdict": true,\n  "reason": "granted"\n}\n');
  });

  it('rejects an invalid phrase with the denial notice', async () => {
    const failure = run(['unlock', '2026-01-01']);
    await expect(failure).rejects.toThrow(GateRejectedError);
    await expect(failure).rejects.toThrow('Access Denied.');
  });

  it('lists providers in fallback order', async () => {
    await run(['providers', '--format', 'text']);
    expect(collect(stdout.write)).toBe(
      [
        '1. Gemini [gemini-2.0-flash] unavailable (GOOGLE_API_KEY not found)',
        '2. Mistral [mistral-large-latest] unavailable (MISTRAL_API_KEY not found)',
        '3. Groq [llama-3.3-70b-versatile] available',
        ''
      ].join('\n')
    );
  });

  it('answers as the other participant', async () => {
    await run(['ghost', '--key', '1 jan 2026', '--as', 'maya', '--message', 'hi', '--format', 'text']);
    expect(collect(stdout.write)).toBe('Leo: hey\n(Thought from: Groq)\n');
  });

  it('requires the access phrase for ghost messages', async () => {
    await expect(run(['ghost', '--as', 'Maya', '--message', 'hi'])).rejects.toThrow(
      /required option '--key <phrase>' not specified/
    );
  });

  it('saves the artifact the oracle picked', async () => {
    groqReply = '{"reasoning":"sunset","file_path":"assets/beach.jpg","poetic_message":"the sea"}';

    await run(['oracle', '--key', '1 jan 2026', '--as', 'Leo', '--mood', 'calm', '--save', 'out.jpg']);

    expect(JSON.parse(collect(stdout.write))).toEqual({
      status: 'ok',
      provider: 'Groq',
      selection: { reasoning: 'sunset', filePath: 'assets/beach.jpg', poeticMessage: 'the sea' },
      artifact: { path: 'assets/beach.jpg', kind: 'image', bytes: 10, savedTo: join(root, 'out.jpg') }
    });
    expect(readFileSync(join(root, 'out.jpg'), 'utf8')).toBe('jpeg-bytes');
  });

  it('creates a vault key and encrypts the assets', async () => {
    await run(['vault', 'keygen']);
    const keygen = JSON.parse(collect(stdout.write));
    expect(keygen.path).toBe(join(root, 'secret.key'));
    expect(keygen.created).toBe(true);
    expect(collect(stderr.write)).toBe('IMPORTANT: add this key to your secrets as VAULT_KEY.\n');

    stdout.write.mockClear();
    await run(['vault', 'encrypt']);
    expect(JSON.parse(collect(stdout.write))).toEqual({
      encrypted: ['whatsapp_chat.txt.enc', join('assets', 'beach.jpg.enc'), join('assets', 'memories.json.enc')],
      failed: []
    });
    expect(existsSync(join(root, 'assets', 'beach.jpg.enc'))).toBe(true);
  });

  it('reads assets through the store and reports missing ones', async () => {
    await run(['vault', 'read', 'whatsapp_chat.txt', '--key', '1 jan 2026']);
    expect(collect(stdout.write)).toBe('Leo: hello\n');

    const failure = run(['vault', 'read', 'assets/missing.jpg', '--kind', 'bytes', '--key', '1 jan 2026']);
    await expect(failure).rejects.toThrow(AssetAbsentError);
    await expect(failure).rejects.toThrow('Asset missing: assets/missing.jpg');
  });

  it('keeps vault contents behind the access gate', async () => {
    await expect(run(['vault', 'read', 'whatsapp_chat.txt'])).rejects.toThrow(
      /required option '--key <phrase>' not specified/
    );

    const denied = run(['vault', 'read', 'whatsapp_chat.txt', '--key', '2026-01-01']);
    await expect(denied).rejects.toThrow(GateRejectedError);
    await expect(denied).rejects.toThrow('Access Denied.');
    expect(stdout.write).not.toHaveBeenCalled();
  });

  it('stores secrets in the keychain', async () => {
    const keychain = new MemoryKeychain();

    await run(['secrets', 'set', 'groq_api_key', '--value', 'test-secret'], { keychain });

    expect(collect(stdout.write)).toBe('Stored GROQ_API_KEY in memory keychain\n');
    await expect(keychain.getSecret('GROQ_API_KEY')).resolves.toBe('test-secret');
    await expect(run(['secrets', 'set', 'OTHER', '--value', 'x'], { keychain })).rejects.toThrow('Invalid secret: OTHER.');
  });

  it('walks an interactive session from the gate to the ghost writer', async () => {
    let clock = 1_000_000;
    const prompter = createScriptedPrompter(['wrong', '1 jan 2026', 'Sam', 'maya', 'ghost hi', 'history', 'quit']);

    await run(['start'], { prompter, now: () => (clock += 1_000) });

    expect(collect(stdout.write)).toBe(
      [
        'MEMORY VAULT :: SECURE ACCESS',
        'USER AUTHENTICATED: MAYA',
        'Commands: oracle <mood>, ghost <message>, history, quit',
        'Leo: hey',
        '(Thought from: Groq)',
        '[user] hi',
        '[assistant] hey',
        ''
      ].join('\n')
    );
    expect(collect(stderr.write)).toBe('Access Denied.\nUnknown identity "Sam". Expected Maya or Leo.\n');
  });
});
