/**
 * Handle issuance.
 */

import * as crypto from 'crypto';
import { InvalidInputError } from './exceptions.js';
import type { RecordStore } from './record-store.js';

export const DEFAULT_HANDLE_BYTES = 6;

/**
 * Issues random URL-safe handles that are not yet in use.
 *
 * Handles are base64url encodings of `byteLength` CSPRNG bytes
 * (6 bytes -> 8 characters).
 */
export class KeyGenerator {
  constructor(
    private readonly records: RecordStore,
    public readonly byteLength: number = DEFAULT_HANDLE_BYTES
  ) {
    if (!Number.isInteger(byteLength) || byteLength < 1) {
      throw new InvalidInputError('byteLength', `Handle length must be a positive integer, got ${byteLength}`);
    }
  }

  /**
   * Generate a handle and retry until the record store has no record
   * under it.
   */
  async newHandle(): Promise<string> {
    for (;;) {
      const handle = this.randomHandle();
      if ((await this.records.findByHandle(handle)) === null) {
        return handle;
      }
    }
  }

  protected randomHandle(): string {
    return crypto.randomBytes(this.byteLength).toString('base64url');
  }
}
