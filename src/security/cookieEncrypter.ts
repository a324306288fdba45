import crypto from 'crypto';
import { CsrfConfigError } from './errors';

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;

/**
 * Supplies symmetric keys for the side-channel cookie. Encryption always uses
 * the current key; decryption accepts the current key and any retired ones.
 */
export interface KeyProvider {
  currentKey(): Buffer;
  decryptionKeys(): readonly Buffer[];
}

export class StaticKeyProvider implements KeyProvider {
  private readonly current: Buffer;
  private readonly keys: readonly Buffer[];

  constructor(current: Buffer, previous: readonly Buffer[] = []) {
    for (const key of [current, ...previous]) {
      if (key.length !== KEY_BYTES) {
        throw new CsrfConfigError('KeyInvalid', `Encryption keys must be ${KEY_BYTES} bytes, got ${key.length}`);
      }
    }
    this.current = current;
    this.keys = Object.freeze([current, ...previous]);
  }

  currentKey(): Buffer {
    return this.current;
  }

  decryptionKeys(): readonly Buffer[] {
    return this.keys;
  }
}

/**
 * Parse an application key written as `base64:<data>` or as 64 hex characters.
 */
export function parseAppKey(raw: string): Buffer {
  const value = raw.trim();
  let key: Buffer;

  if (value.startsWith('base64:')) {
    key = Buffer.from(value.slice('base64:'.length), 'base64');
  } else if (/^[0-9a-f]{64}$/i.test(value)) {
    key = Buffer.from(value, 'hex');
  } else {
    throw new CsrfConfigError('KeyInvalid', 'Application key must be "base64:<32 bytes>" or 64 hex characters');
  }

  if (key.length !== KEY_BYTES) {
    throw new CsrfConfigError('KeyInvalid', `Application key must decode to ${KEY_BYTES} bytes, got ${key.length}`);
  }
  return key;
}

/**
 * Authenticated encryption for cookie values.
 * Payload layout: base64url(iv | tag | ciphertext). The `purpose` (cookie name) is
 * bound as additional authenticated data so a value cannot be replayed under another name.
 */
export class CookieEncrypter {
  private readonly keys: KeyProvider;

  constructor(keys: KeyProvider) {
    this.keys = keys;
  }

  encrypt(value: string, purpose: string): string {
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv(ALGORITHM, this.keys.currentKey(), iv);
    cipher.setAAD(Buffer.from(purpose, 'utf8'));

    const ciphertext = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return Buffer.concat([iv, tag, ciphertext]).toString('base64url');
  }

  /**
   * Returns null when the payload is malformed or no known key authenticates it.
   */
  decrypt(payload: string, purpose: string): string | null {
    if (!/^[A-Za-z0-9_-]+$/.test(payload)) return null;

    const raw = Buffer.from(payload, 'base64url');
    if (raw.length <= IV_BYTES + TAG_BYTES) return null;

    const iv = raw.subarray(0, IV_BYTES);
    const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
    const ciphertext = raw.subarray(IV_BYTES + TAG_BYTES);

    for (const key of this.keys.decryptionKeys()) {
      const plain = this.tryDecrypt(key, iv, tag, ciphertext, purpose);
      if (plain !== null) return plain;
    }
    return null;
  }

  private tryDecrypt(key: Buffer, iv: Buffer, tag: Buffer, ciphertext: Buffer, purpose: string): string | null {
    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    decipher.setAAD(Buffer.from(purpose, 'utf8'));
    decipher.setAuthTag(tag);

    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      // authentication failed under this key
      return null;
    }
  }
}
