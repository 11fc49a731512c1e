import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { DecryptionError, errorMessage } from '../errors';

const MAGIC = Buffer.from('MVLT', 'ascii');
const VERSION = 0x01;
const HEADER = Buffer.concat([MAGIC, Buffer.from([VERSION])]);
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const ALGORITHM = 'aes-256-gcm';
const KEY_PATTERN = /^[A-Za-z0-9_-]{43}=?$/;

/** 32 random bytes as base64url, the format `VAULT_KEY` and the key file hold. */
export function generateVaultKey(): string {
  return randomBytes(KEY_LENGTH).toString('base64url');
}

export function decodeVaultKey(encoded: string): Buffer | undefined {
  const trimmed = encoded.trim();
  if (!KEY_PATTERN.test(trimmed)) {
    return undefined;
  }
  const key = Buffer.from(trimmed.replace(/=$/, ''), 'base64url');
  return key.length === KEY_LENGTH ? key : undefined;
}

/**
 * AES-256-GCM with a fixed envelope:
 * `MVLT` | version | 12-byte IV | 16-byte tag | ciphertext.
 * The header is bound as additional authenticated data.
 */
export class VaultCipher {
  constructor(private readonly key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new RangeError(`Vault key must be ${KEY_LENGTH} bytes, got ${key.length}.`);
    }
  }

  encrypt(plaintext: Buffer): Buffer {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    cipher.setAAD(HEADER);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([HEADER, iv, cipher.getAuthTag(), ciphertext]);
  }

  decrypt(envelope: Buffer): Buffer {
    const minimum = HEADER.length + IV_LENGTH + TAG_LENGTH;
    if (envelope.length < minimum) {
      throw new DecryptionError(`Ciphertext too short (${envelope.length} bytes).`);
    }
    if (!envelope.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw new DecryptionError('Not a vault envelope.');
    }
    const version = envelope[MAGIC.length];
    if (version !== VERSION) {
      throw new DecryptionError(`Unsupported envelope version ${version}.`);
    }

    const ivStart = HEADER.length;
    const tagStart = ivStart + IV_LENGTH;
    const iv = envelope.subarray(ivStart, tagStart);
    const tag = envelope.subarray(tagStart, tagStart + TAG_LENGTH);
    const ciphertext = envelope.subarray(tagStart + TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAAD(HEADER);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new DecryptionError(`Authentication failed: ${errorMessage(error)}`);
    }
  }
}

/** Returns undefined for a missing or malformed key rather than throwing. */
export function createVaultCipher(encodedKey: string | undefined): VaultCipher | undefined {
  if (!encodedKey) {
    return undefined;
  }
  const key = decodeVaultKey(encodedKey);
  return key ? new VaultCipher(key) : undefined;
}
