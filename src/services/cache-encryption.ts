/**
 * Cache encryption - key derivation and AES-256-GCM payload sealing
 *
 * Key sources, in order of precedence:
 * 1. Explicit key bytes (truncated or zero-padded to 32 bytes)
 * 2. Passphrase, stretched with PBKDF2-HMAC-SHA256 (stable across restarts)
 * 3. Random per-process key (disk entries die with the process)
 *
 * Sealed layout: version (1) | iv (12) | auth tag (16) | ciphertext
 */

import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'node:crypto';
import { CacheIOError, errorMessage } from '../utils/errors';

const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const FORMAT_VERSION = 1;
const HEADER_LENGTH = 1 + IV_LENGTH + TAG_LENGTH;

/**
 * Fixed salt: the passphrase alone must reproduce the key
 */
const KDF_SALT = Buffer.from('foxess_cache_salt_v1', 'utf8');
const KDF_ITERATIONS = 100_000;

export type KeySource = 'explicit' | 'passphrase' | 'ephemeral';

export interface EncryptionKeyOptions {
  key?: Uint8Array;
  passphrase?: string;
}

export interface DerivedKey {
  key: Buffer;
  source: KeySource;
}

export function deriveKey(options: EncryptionKeyOptions = {}): DerivedKey {
  if (options.key && options.key.length > 0) {
    const key = Buffer.alloc(KEY_LENGTH);
    Buffer.from(options.key).copy(key, 0, 0, KEY_LENGTH);
    return { key, source: 'explicit' };
  }

  if (options.passphrase) {
    const key = pbkdf2Sync(options.passphrase, KDF_SALT, KDF_ITERATIONS, KEY_LENGTH, 'sha256');
    return { key, source: 'passphrase' };
  }

  return { key: randomBytes(KEY_LENGTH), source: 'ephemeral' };
}

export class CacheEncryption {
  private readonly key: Buffer;
  readonly keySource: KeySource;

  constructor(options: EncryptionKeyOptions = {}) {
    const derived = deriveKey(options);
    this.key = derived.key;
    this.keySource = derived.source;
  }

  encrypt(data: Uint8Array): Buffer {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
    const tag = cipher.getAuthTag();
    return Buffer.concat([Buffer.from([FORMAT_VERSION]), iv, tag, ciphertext]);
  }

  /**
   * @throws CacheIOError on a wrong key, tampered or truncated payload
   */
  decrypt(sealed: Uint8Array): Buffer {
    const buffer = Buffer.from(sealed);
    if (buffer.length < HEADER_LENGTH) {
      throw new CacheIOError('Encrypted payload is truncated', { length: buffer.length });
    }
    if (buffer[0] !== FORMAT_VERSION) {
      throw new CacheIOError('Unknown encrypted payload version', { version: buffer[0] });
    }

    const iv = buffer.subarray(1, 1 + IV_LENGTH);
    const tag = buffer.subarray(1 + IV_LENGTH, HEADER_LENGTH);
    const ciphertext = buffer.subarray(HEADER_LENGTH);

    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, iv);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new CacheIOError(`Failed to decrypt payload: ${errorMessage(error)}`);
    }
  }
}

/**
 * How disk payloads are turned into bytes and back. Picked once when the
 * cache is constructed.
 */
export interface PayloadCodec {
  readonly encrypted: boolean;
  encode(json: string): Buffer;
  decode(payload: Buffer): string;
}

export class PlainCodec implements PayloadCodec {
  readonly encrypted = false;

  encode(json: string): Buffer {
    return Buffer.from(json, 'utf8');
  }

  decode(payload: Buffer): string {
    return payload.toString('utf8');
  }
}

export class EncryptedCodec implements PayloadCodec {
  readonly encrypted = true;

  constructor(private readonly encryption: CacheEncryption) {}

  encode(json: string): Buffer {
    return this.encryption.encrypt(Buffer.from(json, 'utf8'));
  }

  decode(payload: Buffer): string {
    return this.encryption.decrypt(payload).toString('utf8');
  }
}

export function createPayloadCodec(
  enableEncryption: boolean,
  options: EncryptionKeyOptions = {}
): PayloadCodec {
  return enableEncryption ? new EncryptedCodec(new CacheEncryption(options)) : new PlainCodec();
}
