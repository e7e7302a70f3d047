/**
 * Blob Stores
 *
 * Persistence for encrypted file payloads, one blob per handle.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { DuplicateHandleError, InvalidInputError, StorageError } from './exceptions.js';
import { Logger, createLogger } from './logger.js';

/**
 * Interface for pluggable blob backends.
 */
export interface BlobStore {
  /**
   * Store the blob for a handle. Never replaces an existing blob.
   *
   * @throws DuplicateHandleError if a blob is already stored under the handle
   */
  put(handle: string, bytes: Buffer): Promise<void>;

  /**
   * @returns The stored bytes or null if absent
   */
  get(handle: string): Promise<Buffer | null>;

  has(handle: string): Promise<boolean>;

  /**
   * Delete the blob for a handle. Deleting an absent blob is not an error.
   */
  delete(handle: string): Promise<void>;

  close(): Promise<void>;
}

// ============================================================
// Memory Backend
// ============================================================

export class MemoryBlobStore implements BlobStore {
  private readonly data: Map<string, Buffer> = new Map();

  async put(handle: string, bytes: Buffer): Promise<void> {
    if (this.data.has(handle)) {
      throw new DuplicateHandleError(handle);
    }
    this.data.set(handle, Buffer.from(bytes));
  }

  async get(handle: string): Promise<Buffer | null> {
    const bytes = this.data.get(handle);
    return bytes ? Buffer.from(bytes) : null;
  }

  async has(handle: string): Promise<boolean> {
    return this.data.has(handle);
  }

  async delete(handle: string): Promise<void> {
    this.data.delete(handle);
  }

  get size(): number {
    return this.data.size;
  }

  async close(): Promise<void> {
    this.data.clear();
  }
}

// ============================================================
// Filesystem Backend
// ============================================================

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Stores each blob as `<handle>.bin` inside a directory.
 *
 * Writes go to a uniquely named temp file first and are hard-linked
 * into place. The link fails if the target exists, so a blob is never
 * overwritten and readers never see a partially written one.
 */
export class FileBlobStore implements BlobStore {
  private ready: Promise<void> | null = null;

  constructor(
    public readonly directory: string,
    private readonly log: Logger = createLogger('blob-store')
  ) {}

  private pathFor(handle: string): string {
    // Handles are base64url; anything else could escape the directory
    if (!/^[A-Za-z0-9_-]+$/.test(handle)) {
      throw new InvalidInputError('handle', `Invalid handle: ${handle}`);
    }
    return path.join(this.directory, `${handle}.bin`);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  async put(handle: string, bytes: Buffer): Promise<void> {
    const target = this.pathFor(handle);
    const temp = path.join(this.directory, `.${uuidv4()}.tmp`);
    try {
      await this.ensureDirectory();
      await fs.writeFile(temp, bytes);
      await fs.link(temp, target);
    } catch (e) {
      const cleanupError = await this.removeTemp(temp);
      if (cleanupError !== null) {
        throw new StorageError(
          'file',
          `Failed to write blob ${handle}: ${e} (temp cleanup also failed: ${cleanupError})`
        );
      }
      if (isErrnoException(e) && e.code === 'EEXIST') {
        throw new DuplicateHandleError(handle);
      }
      throw new StorageError('file', `Failed to write blob ${handle}: ${e}`);
    }

    // Blob is committed from here on
    const cleanupError = await this.removeTemp(temp);
    if (cleanupError !== null) {
      this.log.warn('Temp file cleanup failed', { handle, temp, error: cleanupError });
    }
  }

  private async removeTemp(temp: string): Promise<unknown> {
    try {
      await fs.rm(temp, { force: true });
      return null;
    } catch (e) {
      return e;
    }
  }

  async get(handle: string): Promise<Buffer | null> {
    const target = this.pathFor(handle);
    try {
      return await fs.readFile(target);
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') {
        return null;
      }
      throw new StorageError('file', `Failed to read blob ${handle}: ${e}`);
    }
  }

  async has(handle: string): Promise<boolean> {
    const target = this.pathFor(handle);
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }

  async delete(handle: string): Promise<void> {
    const target = this.pathFor(handle);
    try {
      await fs.rm(target, { force: true });
    } catch (e) {
      throw new StorageError('file', `Failed to delete blob ${handle}: ${e}`);
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}

// ============================================================
// Backend Factory
// ============================================================

/**
 * Create a blob store from a URL.
 *
 * Supported schemes:
 * - memory:// - In-memory storage (for testing)
 * - file:///abs/dir - One file per blob under a directory
 * - file:relative/dir - Directory relative to the working directory
 */
export function createBlobStore(storeUrl: string): BlobStore {
  if (storeUrl === 'memory://' || storeUrl === 'memory') {
    return new MemoryBlobStore();
  }

  if (storeUrl.startsWith('file://')) {
    return new FileBlobStore(fileURLToPath(storeUrl));
  }
  if (storeUrl.startsWith('file:')) {
    return new FileBlobStore(path.resolve(storeUrl.slice('file:'.length)));
  }

  throw new InvalidInputError('BLOB_STORE_URL', `Unsupported blob store scheme: ${storeUrl}`);
}
