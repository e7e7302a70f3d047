/**
 * Link Store Cryptographic Operations
 *
 * Envelope encryption for link payloads. Uses AES-256-GCM for
 * authenticated encryption via Node.js crypto module.
 */

import * as crypto from 'crypto';
import { AuthenticationError, InvalidInputError } from './exceptions.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32; // 256 bits
const NONCE_LENGTH = 12; // 96 bits for GCM
const TAG_LENGTH = 16; // 128 bits
const ENVELOPE_VERSION = 0x01;
const HEADER_LENGTH = 1 + NONCE_LENGTH;

/**
 * Where the process-wide key comes from.
 */
export interface CipherKeySource {
  /** Operator-supplied key, base64url or base64 encoding of 32 bytes */
  fileKey?: string;
  /** Process secret the key is derived from when no explicit key is set */
  secretKey: string;
}

/**
 * Symmetric authenticated cipher holding a single key.
 *
 * Envelope layout: version (1) | nonce (12) | ciphertext | tag (16).
 * Every call to encrypt draws a fresh nonce, so identical plaintexts
 * never produce identical envelopes.
 */
export class Cipher {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new InvalidInputError('key', `Cipher key must be ${KEY_LENGTH} bytes`);
    }
    this.key = Buffer.from(key);
  }

  /**
   * Build a cipher from configuration.
   *
   * An explicit key wins; otherwise the key is the SHA-256 digest of the
   * secret, so restarts with the same secret can read older envelopes.
   */
  static fromConfig(source: CipherKeySource): Cipher {
    if (source.fileKey) {
      return new Cipher(decodeKey(source.fileKey));
    }
    return Cipher.fromSecret(source.secretKey);
  }

  static fromSecret(secret: string): Cipher {
    return new Cipher(crypto.createHash('sha256').update(secret, 'utf-8').digest());
  }

  /**
   * Generate a random key suitable for FILE_KEY.
   */
  static generateKey(): string {
    return crypto.randomBytes(KEY_LENGTH).toString('base64url');
  }

  encrypt(plaintext: Buffer): Buffer {
    const nonce = crypto.randomBytes(NONCE_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, nonce, {
      authTagLength: TAG_LENGTH,
    });

    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([Buffer.from([ENVELOPE_VERSION]), nonce, encrypted, cipher.getAuthTag()]);
  }

  /**
   * Decrypt an envelope produced by encrypt.
   *
   * @throws AuthenticationError if the envelope is malformed, tampered
   *         with, or was sealed under another key
   */
  decrypt(envelope: Buffer): Buffer {
    if (envelope.length < HEADER_LENGTH + TAG_LENGTH) {
      throw new AuthenticationError('decrypt', 'Envelope is too short');
    }
    if (envelope[0] !== ENVELOPE_VERSION) {
      throw new AuthenticationError('decrypt', `Unsupported envelope version: ${envelope[0]}`);
    }

    const nonce = envelope.subarray(1, HEADER_LENGTH);
    const ciphertext = envelope.subarray(HEADER_LENGTH, envelope.length - TAG_LENGTH);
    const authTag = envelope.subarray(envelope.length - TAG_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, nonce, {
        authTagLength: TAG_LENGTH,
      });
      decipher.setAuthTag(authTag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (e) {
      throw new AuthenticationError('decrypt', `Could not decrypt content: ${e}`);
    }
  }

  encryptText(text: string): Buffer {
    return this.encrypt(Buffer.from(text, 'utf-8'));
  }

  decryptText(envelope: Buffer): string {
    return this.decrypt(envelope).toString('utf-8');
  }
}

function decodeKey(encoded: string): Buffer {
  // base64url decoding also accepts standard base64 alphabet and padding
  const key = Buffer.from(encoded.trim(), 'base64url');
  if (key.length !== KEY_LENGTH) {
    throw new InvalidInputError(
      'fileKey',
      `FILE_KEY must encode ${KEY_LENGTH} bytes, got ${key.length}`
    );
  }
  return key;
}
