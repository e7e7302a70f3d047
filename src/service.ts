/**
 * Link Service
 *
 * The primary interface for creating and serving links: encryption on
 * the way in, expiry checks and view counting on the way out, and
 * eviction once a deadline or view budget is used up.
 */

import { BlobStore, MemoryBlobStore, createBlobStore } from './blob-store.js';
import { Cipher } from './crypto.js';
import {
  AuthenticationError,
  DuplicateHandleError,
  EvictedError,
  EvictionReason,
  InvalidInputError,
  LinkError,
  NotFoundError,
  StorageError,
} from './exceptions.js';
import { admitsView, expiryReason, remainingViews } from './expiry.js';
import { DEFAULT_HANDLE_BYTES, KeyGenerator } from './keys.js';
import { Logger, createLogger } from './logger.js';
import { ExpirySpec, FileRef, LinkPayload, LinkRecord, parseExpiry } from './record.js';
import { MemoryRecordStore, RecordStore, createRecordStore } from './record-store.js';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Handles tried by one create before giving up */
export const MAX_CREATE_ATTEMPTS = 16;

// ============================================================
// Service Options
// ============================================================

/**
 * Options for creating a LinkService.
 */
export interface LinkServiceOptions {
  /** Cipher holding the process-wide key */
  cipher: Cipher;
  /** Record store URL or instance */
  records?: string | RecordStore;
  /** Blob store URL or instance */
  blobs?: string | BlobStore;
  /** Random bytes per handle */
  handleBytes?: number;
  /** Custom key generator (overrides handleBytes) */
  keyGenerator?: KeyGenerator;
  logger?: Logger;
  /** Clock used for creation timestamps and expiry checks */
  now?: () => Date;
}

/**
 * A file supplied at creation time.
 */
export interface FileUpload {
  bytes: Buffer;
  fileName?: string | null;
  mimeType?: string | null;
}

/**
 * What to store. At least one of text and file must be present; an
 * empty string counts as no text.
 */
export interface CreateLinkPayload {
  text?: string | null;
  file?: FileUpload | null;
}

/**
 * Options for the create() method.
 */
export interface CreateLinkOptions {
  /** Absolute deadline, or a magnitude and unit relative to now */
  expiry?: Date | ExpirySpec | null;
  /** Positive view budget; absent for unlimited */
  maxViews?: number | null;
}

export type ServedText =
  | { status: 'decrypted'; plaintext: string }
  | { status: 'undecryptable'; error: AuthenticationError };

export interface ServedFileInfo {
  fileName: string;
  mimeType: string;
}

/**
 * Result of a text view.
 */
export interface ServeResult {
  handle: string;
  text: ServedText | null;
  /** Present when the link has a file and its blob is stored */
  file: ServedFileInfo | null;
  viewCount: number;
  /** Views left, 0 when this view evicted the link, null if unlimited */
  remainingViews: number | null;
}

/**
 * Result of a file download.
 */
export interface ServedFile {
  handle: string;
  bytes: Buffer;
  fileName: string;
  mimeType: string;
  viewCount: number;
  remainingViews: number | null;
}

/**
 * Service statistics.
 */
export interface ServiceStats {
  /** Links created by this instance */
  created: number;
  /** Views served (text views and downloads) */
  served: number;
  /** Links this instance evicted */
  evicted: number;
}

// ============================================================
// Link Service
// ============================================================

/**
 * Creates and serves expiring, encrypted links.
 *
 * Text and file share one view counter. Expiry is evaluated lazily on
 * access; there is no background sweep.
 *
 * @example
 * ```typescript
 * const service = new LinkService({
 *   cipher: Cipher.fromSecret('test-secret'),
 *   records: 'memory://',
 *   blobs: 'memory://',
 * });
 *
 * const record = await service.create({ text: 'hunter2' }, { maxViews: 1 });
 * const result = await service.serve(record.handle); // remainingViews: 0
 * await service.serve(record.handle); // throws NotFoundError
 * ```
 */
export class LinkService {
  private readonly cipher: Cipher;
  private readonly records: RecordStore;
  private readonly blobs: BlobStore;
  private readonly keys: KeyGenerator;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly counters: ServiceStats = { created: 0, served: 0, evicted: 0 };

  constructor(options: LinkServiceOptions) {
    this.cipher = options.cipher;

    if (typeof options.records === 'string') {
      this.records = createRecordStore(options.records);
    } else {
      this.records = options.records ?? new MemoryRecordStore();
    }

    if (typeof options.blobs === 'string') {
      this.blobs = createBlobStore(options.blobs);
    } else {
      this.blobs = options.blobs ?? new MemoryBlobStore();
    }

    this.keys =
      options.keyGenerator ?? new KeyGenerator(this.records, options.handleBytes ?? DEFAULT_HANDLE_BYTES);
    this.log = options.logger ?? createLogger('link-service');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Encrypt and store a payload under a fresh handle.
   *
   * The blob is written before the record is committed; if the commit
   * fails the blob is deleted again. A handle claimed by a concurrent
   * create is abandoned for a new one.
   *
   * @throws InvalidInputError if no payload is given, maxViews is not a positive integer or the expiry is out of range
   * @throws StorageError if a backend fails or no free handle is found
   */
  async create(payload: CreateLinkPayload, options: CreateLinkOptions = {}): Promise<LinkRecord> {
    const text = payload.text ? payload.text : null;
    const upload = payload.file ?? null;
    if (text === null && upload === null) {
      throw new InvalidInputError('payload', 'Provide either text content or a file.');
    }

    const maxViews = options.maxViews ?? null;
    if (maxViews !== null && (!Number.isInteger(maxViews) || maxViews < 1)) {
      throw new InvalidInputError('maxViews', 'Max views must be a positive integer.');
    }

    const now = this.now();
    const expiryAt = resolveExpiry(options.expiry ?? null, now);

    const textCiphertext = text === null ? null : this.cipher.encryptText(text);
    const file: FileRef | null =
      upload === null
        ? null
        : { fileName: upload.fileName || null, mimeType: upload.mimeType || null };
    const blob = upload === null ? null : this.cipher.encrypt(upload.bytes);

    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
      const handle = await this.keys.newHandle();
      const record = LinkRecord.create({
        handle,
        payload: buildPayload(handle, textCiphertext, file),
        expiryAt,
        maxViews,
        now,
      });
      if (!(await this.commit(record, blob))) {
        this.log.debug('Handle taken concurrently, retrying', { handle, attempt });
        continue;
      }

      this.counters.created++;
      this.log.info('Link created', {
        handle,
        kind: record.payload.kind,
        expiryAt: expiryAt?.toISOString(),
        maxViews,
      });
      return record;
    }

    this.log.error('Link creation failed', { attempts: MAX_CREATE_ATTEMPTS });
    throw new StorageError('link-service', `No free handle after ${MAX_CREATE_ATTEMPTS} attempts`);
  }

  /**
   * Write the blob (if any) and insert the record.
   *
   * @returns false if the handle was taken by another link
   */
  private async commit(record: LinkRecord, blob: Buffer | null): Promise<boolean> {
    const { handle } = record;
    let blobWritten = false;
    try {
      if (blob !== null) {
        await this.blobs.put(handle, blob);
        blobWritten = true;
      }
      await this.records.insert(record);
      return true;
    } catch (e) {
      // Only a blob this call wrote is ours to remove
      if (blobWritten) {
        await this.discardBlob(handle);
      }
      if (e instanceof DuplicateHandleError) {
        return false;
      }
      this.log.error('Link creation failed', { handle, error: e });
      if (e instanceof LinkError) {
        throw e;
      }
      throw new StorageError('link-service', `Failed to create link: ${e}`);
    }
  }

  /**
   * View a link's text (and learn whether it has a downloadable file).
   *
   * Consumes one view. The view that exhausts the budget is still
   * served, and the link is evicted before this call returns.
   *
   * @throws NotFoundError if no link exists under the handle
   * @throws EvictedError if the link had expired or another caller took the last view
   */
  async serve(handle: string): Promise<ServeResult> {
    const record = await this.records.findByHandle(handle);
    if (!record) {
      throw new NotFoundError(handle);
    }
    await this.evictIfExpired(record);

    const text = record.textCiphertext === null ? null : this.openText(record, record.textCiphertext);

    let file: ServedFileInfo | null = null;
    if (record.file && (await this.blobs.has(handle))) {
      file = describeFile(handle, record.file);
    }

    const remaining = await this.consumeView(record);
    return { handle, text, file, viewCount: record.viewCount, remainingViews: remaining };
  }

  /**
   * Download a link's file. Shares the view counter with serve().
   *
   * A missing blob or an undecryptable one does not consume a view.
   *
   * @throws NotFoundError if the link, its file or its blob is absent
   * @throws EvictedError if the link had expired or another caller took the last view
   * @throws AuthenticationError if the blob cannot be decrypted
   */
  async serveFile(handle: string): Promise<ServedFile> {
    const record = await this.records.findByHandle(handle);
    if (!record || !record.file) {
      throw new NotFoundError(handle, `File not found: ${handle}`);
    }
    await this.evictIfExpired(record);

    const encrypted = await this.blobs.get(handle);
    if (!encrypted) {
      throw new NotFoundError(handle, `File missing from storage: ${handle}`);
    }

    let bytes: Buffer;
    try {
      bytes = this.cipher.decrypt(encrypted);
    } catch (e) {
      this.log.warn('Could not decrypt file', { handle, error: e });
      throw e;
    }

    const remaining = await this.consumeView(record);
    return {
      handle,
      bytes,
      ...describeFile(handle, record.file),
      viewCount: record.viewCount,
      remainingViews: remaining,
    };
  }

  /**
   * Get service statistics.
   */
  stats(): ServiceStats {
    return { ...this.counters };
  }

  /**
   * Close both stores and release resources.
   */
  async close(): Promise<void> {
    await this.records.close();
    await this.blobs.close();
  }

  // ============================================================
  // Lifecycle internals
  // ============================================================

  private openText(record: LinkRecord, ciphertext: Buffer): ServedText {
    try {
      return { status: 'decrypted', plaintext: this.cipher.decryptText(ciphertext) };
    } catch (e) {
      if (e instanceof AuthenticationError) {
        this.log.warn('Could not decrypt text', { handle: record.handle });
        return { status: 'undecryptable', error: e };
      }
      throw e;
    }
  }

  private async evictIfExpired(record: LinkRecord): Promise<void> {
    const reason = expiryReason(record, this.now());
    if (reason !== null) {
      await this.evict(record, reason);
      throw new EvictedError(record.handle, reason);
    }
  }

  /**
   * Increment the shared counter and apply the post-increment checks.
   * Updates record.viewCount and returns the views left.
   */
  private async consumeView(record: LinkRecord): Promise<number | null> {
    let count: number;
    try {
      count = await this.records.incrementViews(record.handle);
    } catch (e) {
      if (e instanceof NotFoundError) {
        // Evicted by a concurrent caller between lookup and increment
        throw new EvictedError(record.handle, record.maxViews !== null ? 'views' : 'time');
      }
      throw e;
    }

    if (!admitsView(record, count)) {
      await this.evict(record, 'views');
      throw new EvictedError(record.handle, 'views');
    }

    record.viewCount = count;
    this.counters.served++;

    const reason = expiryReason(record, this.now(), count);
    if (reason !== null) {
      await this.evict(record, reason);
      return 0;
    }
    return remainingViews(record, count);
  }

  /**
   * Delete the record, then its blob. Failures are logged, never thrown.
   *
   * If the record cannot be deleted the blob is left alone, so a stored
   * record never points at a missing blob.
   */
  private async evict(record: LinkRecord, reason: EvictionReason): Promise<void> {
    let deleted: boolean;
    try {
      deleted = await this.records.deleteIfExists(record.handle);
    } catch (e) {
      this.log.warn('Record delete failed during eviction', { handle: record.handle, error: e });
      return;
    }

    if (record.hasFile) {
      await this.discardBlob(record.handle);
    }

    if (deleted) {
      this.counters.evicted++;
      this.log.info('Link evicted', { handle: record.handle, reason });
    }
  }

  private async discardBlob(handle: string): Promise<void> {
    try {
      await this.blobs.delete(handle);
    } catch (e) {
      this.log.warn('Blob delete failed', { handle, error: e });
    }
  }
}

function resolveExpiry(expiry: Date | ExpirySpec | null, now: Date): Date | null {
  if (expiry === null) {
    return null;
  }
  if (expiry instanceof Date) {
    if (Number.isNaN(expiry.getTime())) {
      throw new InvalidInputError('expiry', 'Expiry is not a valid date.');
    }
    return expiry;
  }
  return parseExpiry(expiry, now);
}

function buildPayload(handle: string, textCiphertext: Buffer | null, file: FileRef | null): LinkPayload {
  if (textCiphertext && file) {
    return { kind: 'textAndFile', textCiphertext, file };
  }
  if (textCiphertext) {
    return { kind: 'text', textCiphertext };
  }
  if (file) {
    return { kind: 'file', file };
  }
  throw new InvalidInputError('payload', `Link ${handle} has no payload`);
}

function describeFile(handle: string, file: FileRef): ServedFileInfo {
  return {
    fileName: file.fileName ?? `${handle}.bin`,
    mimeType: file.mimeType ?? DEFAULT_MIME_TYPE,
  };
}
