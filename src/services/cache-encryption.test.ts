import { describe, it, expect } from 'vitest';
import { CacheIOError } from '../utils/errors';
import {
  CacheEncryption,
  EncryptedCodec,
  PlainCodec,
  createPayloadCodec,
  deriveKey,
} from './cache-encryption';

describe('deriveKey', () => {
  it('should pad short explicit keys to 32 bytes', () => {
    const { key, source } = deriveKey({ key: Buffer.from([1, 2, 3]) });
    expect(source).toBe('explicit');
    expect(key.length).toBe(32);
    expect([...key.subarray(0, 4)]).toEqual([1, 2, 3, 0]);
  });

  it('should truncate long explicit keys', () => {
    const { key } = deriveKey({ key: Buffer.alloc(40, 7) });
    expect(key).toEqual(Buffer.alloc(32, 7));
  });

  it('should derive the same key from the same passphrase', () => {
    const a = deriveKey({ passphrase: 'test-secret' });
    const b = deriveKey({ passphrase: 'test-secret' });
    expect(a.source).toBe('passphrase');
    expect(a.key.equals(b.key)).toBe(true);
    expect(a.key.equals(deriveKey({ passphrase: 'other-secret' }).key)).toBe(false);
  });

  it('should fall back to a random key', () => {
    const a = deriveKey();
    expect(a.source).toBe('ephemeral');
    expect(a.key.equals(deriveKey().key)).toBe(false);
  });

  it('should prefer explicit key bytes over a passphrase', () => {
    expect(deriveKey({ key: Buffer.from([9]), passphrase: 'test-secret' }).source).toBe('explicit');
  });
});

describe('CacheEncryption', () => {
  const plaintext = Buffer.from('{"pvPower":3.2}', 'utf8');

  it('should round-trip with the same key', () => {
    const encryption = new CacheEncryption({ passphrase: 'test-secret' });
    const sealed = encryption.encrypt(plaintext);

    expect(sealed[0]).toBe(1);
    expect(sealed.length).toBe(1 + 12 + 16 + plaintext.length);
    expect(encryption.decrypt(sealed).toString('utf8')).toBe('{"pvPower":3.2}');
  });

  it('should decrypt across instances sharing a passphrase', () => {
    const sealed = new CacheEncryption({ passphrase: 'test-secret' }).encrypt(plaintext);
    const reader = new CacheEncryption({ passphrase: 'test-secret' });
    expect(reader.decrypt(sealed).equals(plaintext)).toBe(true);
  });

  it('should use a fresh IV per call', () => {
    const encryption = new CacheEncryption();
    expect(encryption.encrypt(plaintext).equals(encryption.encrypt(plaintext))).toBe(false);
  });

  it('should reject a wrong key', () => {
    const sealed = new CacheEncryption({ passphrase: 'test-secret' }).encrypt(plaintext);
    const other = new CacheEncryption({ passphrase: 'other-secret' });
    expect(() => other.decrypt(sealed)).toThrow(CacheIOError);
  });

  it('should reject tampered ciphertext', () => {
    const encryption = new CacheEncryption();
    const sealed = encryption.encrypt(plaintext);
    sealed[sealed.length - 1] ^= 0xff;
    expect(() => encryption.decrypt(sealed)).toThrow(/Failed to decrypt payload/);
  });

  it('should reject truncated input', () => {
    const encryption = new CacheEncryption();
    expect(() => encryption.decrypt(Buffer.alloc(10))).toThrow('Encrypted payload is truncated');
  });

  it('should reject unknown versions', () => {
    const encryption = new CacheEncryption();
    const sealed = encryption.encrypt(plaintext);
    sealed[0] = 2;
    expect(() => encryption.decrypt(sealed)).toThrow('Unknown encrypted payload version');
  });
});

describe('payload codecs', () => {
  it('should pick the codec once from the flag', () => {
    expect(createPayloadCodec(false)).toBeInstanceOf(PlainCodec);
    expect(createPayloadCodec(true).encrypted).toBe(true);
  });

  it('should store plain JSON as UTF-8', () => {
    const codec = new PlainCodec();
    expect(codec.encode('{"a":"é"}').toString('utf8')).toBe('{"a":"é"}');
    expect(codec.decode(Buffer.from('[1]'))).toBe('[1]');
  });

  it('should never write the JSON in the clear when encrypted', () => {
    const codec = new EncryptedCodec(new CacheEncryption());
    const encoded = codec.encode('{"secret":"value"}');
    expect(encoded.includes(Buffer.from('secret'))).toBe(false);
    expect(codec.decode(encoded)).toBe('{"secret":"value"}');
  });
});
