import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ContentStore } from '../src/vault/content-store';
import { collectVaultTargets, encryptVault, isVaultTarget, loadOrCreateKey } from '../src/vault/encrypt';

const targets = { assetsDir: 'assets', chatTranscriptPath: 'whatsapp_chat.txt' };

describe('vault encryption utility', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'memory-vault-encrypt-'));
    mkdirSync(join(root, 'assets', 'sub'), { recursive: true });
    writeFileSync(join(root, 'whatsapp_chat.txt'), '[1/1/26] Maya: hi');
    writeFileSync(join(root, 'assets', 'b.png'), 'png-bytes');
    writeFileSync(join(root, 'assets', 'a.jpg'), 'jpg-bytes');
    writeFileSync(join(root, 'assets', 'a.jpg.enc'), 'stale');
    writeFileSync(join(root, 'assets', 'example.jpg'), 'sample');
    writeFileSync(join(root, 'assets', 'readme.md'), '# notes');
    writeFileSync(join(root, 'assets', 'memories.json'), '[]');
    writeFileSync(join(root, 'assets', 'sub', 'c.mp4'), 'mp4-bytes');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('selects media, JSON and text files but not samples or ciphertext', () => {
    expect(isVaultTarget('photo.JPG')).toBe(true);
    expect(isVaultTarget('clip.mov')).toBe(true);
    expect(isVaultTarget('photo.jpg.enc')).toBe(false);
    expect(isVaultTarget('memories.example.json')).toBe(false);
    expect(isVaultTarget('notes.md')).toBe(false);
  });

  it('lists the transcript first, then the assets tree in name order', async () => {
    const files = await collectVaultTargets(root, targets);

    expect(files).toEqual([
      join(root, 'whatsapp_chat.txt'),
      join(root, 'assets', 'a.jpg'),
      join(root, 'assets', 'b.png'),
      join(root, 'assets', 'memories.json'),
      join(root, 'assets', 'sub', 'c.mp4')
    ]);
  });

  it('returns nothing when neither transcript nor assets exist', async () => {
    const empty = mkdtempSync(join(tmpdir(), 'memory-vault-empty-'));
    try {
      await expect(collectVaultTargets(empty, targets)).resolves.toEqual([]);
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });

  it('creates a key file once with owner-only permissions', async () => {
    const keyFile = join(root, 'secret.key');

    const created = await loadOrCreateKey(keyFile);
    expect(created.created).toBe(true);
    expect(readFileSync(keyFile, 'utf8')).toBe(`${created.key}\n`);
    if (process.platform !== 'win32') {
      expect(statSync(keyFile).mode & 0o777).toBe(0o600);
    }

    const loaded = await loadOrCreateKey(keyFile);
    expect(loaded).toEqual({ key: created.key, path: keyFile, created: false });
  });

  it('refuses a key file that does not hold a vault key', async () => {
    const keyFile = join(root, 'secret.key');
    writeFileSync(keyFile, 'garbage');

    await expect(loadOrCreateKey(keyFile)).rejects.toThrow(`Key file ${keyFile} does not hold a valid vault key.`);
  });

  it('writes .enc siblings that the content store can read back', async () => {
    const { key } = await loadOrCreateKey(join(root, 'secret.key'));

    const result = await encryptVault({ rootDir: root, key, targets });

    expect(result.failed).toEqual([]);
    expect(result.encrypted.map((item) => item.target)).toEqual([
      join(root, 'whatsapp_chat.txt.enc'),
      join(root, 'assets', 'a.jpg.enc'),
      join(root, 'assets', 'b.png.enc'),
      join(root, 'assets', 'memories.json.enc'),
      join(root, 'assets', 'sub', 'c.mp4.enc')
    ]);
    expect(existsSync(join(root, 'assets', 'example.jpg.enc'))).toBe(false);

    rmSync(join(root, 'assets', 'a.jpg'));
    const store = new ContentStore({
      rootDir: root,
      resolveSecret: async (name) => (name === 'VAULT_KEY' ? key : undefined)
    });
    const bytes = await store.resolve('assets/a.jpg', 'bytes');
    expect(bytes?.toString()).toBe('jpg-bytes');
    await expect(store.loadChatHistory()).resolves.toBe('[1/1/26] Maya: hi');
  });

  it('rejects a malformed key', async () => {
    await expect(encryptVault({ rootDir: root, key: 'nope', targets })).rejects.toThrow('Vault key is malformed.');
  });
});
