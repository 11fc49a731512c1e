import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ResolveSecret } from '../src/secure/secrets';
import { ComputeOnceCache } from '../src/vault/cache';
import { createVaultCipher, generateVaultKey } from '../src/vault/cipher';
import { ContentStore, tailText } from '../src/vault/content-store';

function secretsWith(vaultKey?: string): ResolveSecret {
  return async (name) => (name === 'VAULT_KEY' ? vaultKey : undefined);
}

function encryptTo(filePath: string, key: string, content: string) {
  const cipher = createVaultCipher(key);
  if (!cipher) {
    throw new Error('expected a cipher');
  }
  writeFileSync(filePath, cipher.encrypt(Buffer.from(content)));
}

describe('content store', () => {
  let root: string;
  let key: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'memory-vault-store-'));
    mkdirSync(join(root, 'assets'));
    key = generateVaultKey();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('prefers the encrypted sibling when a key is configured', async () => {
    writeFileSync(join(root, 'assets', 'note.txt'), 'plain copy');
    encryptTo(join(root, 'assets', 'note.txt.enc'), key, 'sealed copy');

    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(key) });

    await expect(store.resolve('assets/note.txt', 'text')).resolves.toBe('sealed copy');
    await expect(store.hasCipher()).resolves.toBe(true);
  });

  it('does not fall back to plaintext when decryption fails', async () => {
    writeFileSync(join(root, 'assets', 'note.txt'), 'plain copy');
    encryptTo(join(root, 'assets', 'note.txt.enc'), generateVaultKey(), 'sealed with another key');

    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(key) });

    await expect(store.resolve('assets/note.txt', 'text')).resolves.toBeUndefined();
  });

  it('reads plaintext when no key is configured', async () => {
    writeFileSync(join(root, 'assets', 'note.txt'), 'plain copy');
    encryptTo(join(root, 'assets', 'note.txt.enc'), key, 'sealed copy');

    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(undefined) });

    await expect(store.resolve('assets/note.txt', 'text')).resolves.toBe('plain copy');
    await expect(store.hasCipher()).resolves.toBe(false);
  });

  it('treats a malformed key as no key', async () => {
    writeFileSync(join(root, 'assets', 'note.txt'), 'plain copy');
    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith('not-a-key') });

    await expect(store.hasCipher()).resolves.toBe(false);
    await expect(store.resolve('assets/note.txt', 'text')).resolves.toBe('plain copy');
  });

  it('returns bytes, parsed JSON and nothing for missing assets', async () => {
    writeFileSync(join(root, 'assets', 'pixel.png'), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    writeFileSync(join(root, 'assets', 'data.json'), '{"mood":"calm"}');
    writeFileSync(join(root, 'assets', 'broken.json'), '{nope');

    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(key) });

    const bytes = await store.resolve('assets/pixel.png', 'bytes');
    expect(bytes?.equals(Buffer.from([0x89, 0x50, 0x4e, 0x47]))).toBe(true);
    await expect(store.resolve('assets/data.json', 'json')).resolves.toEqual({ mood: 'calm' });
    await expect(store.resolve('assets/broken.json', 'json')).resolves.toBeUndefined();
    await expect(store.resolve('assets/missing.jpg', 'bytes')).resolves.toBeUndefined();
  });

  it('refuses paths outside the vault root', async () => {
    writeFileSync(join(root, 'inside.txt'), 'ok');
    const store = new ContentStore({ rootDir: join(root, 'assets'), resolveSecret: secretsWith(key) });

    await expect(store.resolve('../inside.txt', 'text')).resolves.toBeUndefined();
  });

  it('loads object memories once and drops other entries', async () => {
    writeFileSync(
      join(root, 'assets', 'memories.json'),
      JSON.stringify([{ file_path: 'assets/beach.jpg', description: 'Beach day' }, 3, 'loose'])
    );
    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(undefined) });

    const first = await store.loadMemories();
    expect(first).toEqual([{ file_path: 'assets/beach.jpg', description: 'Beach day' }]);

    rmSync(join(root, 'assets', 'memories.json'));
    await expect(store.loadMemories()).resolves.toBe(first);
  });

  it('treats a missing or non-array memories file as empty', async () => {
    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(undefined) });
    await expect(store.loadMemories()).resolves.toEqual([]);

    writeFileSync(join(root, 'assets', 'other.json'), '{"file_path":"x"}');
    const other = new ContentStore({
      rootDir: root,
      resolveSecret: secretsWith(undefined),
      memoriesPath: 'assets/other.json'
    });
    await expect(other.loadMemories()).resolves.toEqual([]);
  });

  it('keeps only the tail of the chat transcript', async () => {
    encryptTo(join(root, 'chat.txt.enc'), key, 'hello world');
    const store = new ContentStore({
      rootDir: root,
      resolveSecret: secretsWith(key),
      chatTranscriptPath: 'chat.txt',
      chatTailChars: 5
    });

    await expect(store.loadChatHistory()).resolves.toBe('world');
  });

  it('keeps the tail of an emoji-heavy transcript in characters', async () => {
    writeFileSync(join(root, 'chat.txt'), `x${'\u{1F600}'.repeat(20)}`);
    const store = new ContentStore({
      rootDir: root,
      resolveSecret: secretsWith(undefined),
      chatTranscriptPath: 'chat.txt',
      chatTailChars: 10
    });

    const history = await store.loadChatHistory();
    expect(Array.from(history)).toHaveLength(10);
    expect(history).toBe('\u{1F600}'.repeat(10));
  });

  it('returns an empty history when there is no transcript', async () => {
    const store = new ContentStore({ rootDir: root, resolveSecret: secretsWith(key) });
    await expect(store.loadChatHistory()).resolves.toBe('');
  });
});

describe('tailText', () => {
  it('returns short text unchanged', () => {
    expect(tailText('abc', 5)).toBe('abc');
  });

  it('counts astral characters as one character', () => {
    expect(tailText('a\u{1F600}b', 2)).toBe('\u{1F600}b');
    expect(tailText('a\u{1F600}b', 3)).toBe('a\u{1F600}b');
    expect(tailText('\u{1F600}\u{1F601}\u{1F602}', 1)).toBe('\u{1F602}');
  });
});

describe('compute-once cache', () => {
  it('shares one pending load between concurrent readers', async () => {
    const cache = new ComputeOnceCache<number>();
    const compute = vi.fn(async () => 42);

    const [first, second] = await Promise.all([cache.get('k', compute), cache.get('k', compute)]);

    expect(first).toBe(42);
    expect(second).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
    await expect(cache.get('k', compute)).resolves.toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('evicts a failed load so the next reader retries', async () => {
    const cache = new ComputeOnceCache<number>();

    await expect(cache.get('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    const retry = vi.fn(async () => 7);
    await expect(cache.get('k', retry)).resolves.toBe(7);
    expect(retry).toHaveBeenCalledTimes(1);
  });
});
