/**
 * Link Record Stores
 *
 * Persistence for link metadata keyed by handle, with an atomic view
 * counter and idempotent deletion.
 */

import { Redis } from 'ioredis';
import {
  DuplicateHandleError,
  InvalidInputError,
  LinkError,
  NotFoundError,
  StorageError,
} from './exceptions.js';
import { LinkRecord, LinkRecordData } from './record.js';

// ============================================================
// Record Store Interface
// ============================================================

/**
 * Interface for pluggable record backends.
 *
 * Implementations must make incrementViews atomic per handle and
 * deleteIfExists safe to race.
 */
export interface RecordStore {
  /**
   * Store a new record.
   * @throws DuplicateHandleError if the handle is already present
   */
  insert(record: LinkRecord): Promise<void>;

  /**
   * Look up a record.
   * @returns The record or null if absent
   */
  findByHandle(handle: string): Promise<LinkRecord | null>;

  /**
   * Atomically add one view.
   * @returns The view count after this increment
   * @throws NotFoundError if the record is absent
   */
  incrementViews(handle: string): Promise<number>;

  /**
   * Delete a record.
   * @returns true if this call deleted it, false if it was already gone
   */
  deleteIfExists(handle: string): Promise<boolean>;

  /**
   * Close the backend and release resources.
   */
  close(): Promise<void>;
}

// ============================================================
// Memory Backend
// ============================================================

/**
 * In-memory record store for testing and development.
 *
 * Each operation runs without yielding to the event loop between its
 * read and its write, which makes it atomic within one process.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly data: Map<string, LinkRecordData> = new Map();

  async insert(record: LinkRecord): Promise<void> {
    if (this.data.has(record.handle)) {
      throw new DuplicateHandleError(record.handle);
    }
    this.data.set(record.handle, record.toDict());
  }

  async findByHandle(handle: string): Promise<LinkRecord | null> {
    const entry = this.data.get(handle);
    return entry ? LinkRecord.fromDict(entry) : null;
  }

  async incrementViews(handle: string): Promise<number> {
    const entry = this.data.get(handle);
    if (!entry) {
      throw new NotFoundError(handle);
    }
    entry.view_count += 1;
    return entry.view_count;
  }

  async deleteIfExists(handle: string): Promise<boolean> {
    return this.data.delete(handle);
  }

  get size(): number {
    return this.data.size;
  }

  async close(): Promise<void> {
    this.data.clear();
  }
}

// ============================================================
// Redis Backend
// ============================================================

const RECORD_FIELD = 'record';
const VIEWS_FIELD = 'views';

/**
 * Redis record store for production use.
 *
 * One hash per handle: the serialized record (without its counter)
 * under `record` and the view counter under `views`, so HINCRBY gives
 * the atomic increment.
 */
export class RedisRecordStore implements RecordStore {
  private readonly client: Redis;
  private readonly prefix = 'link:';

  constructor(urlOrClient: string | Redis) {
    this.client = typeof urlOrClient === 'string' ? new Redis(urlOrClient) : urlOrClient;
  }

  private key(handle: string): string {
    return `${this.prefix}${handle}`;
  }

  async insert(record: LinkRecord): Promise<void> {
    const { view_count: _viewCount, ...rest } = record.toDict();
    let created: number;
    try {
      created = await this.client.hsetnx(this.key(record.handle), RECORD_FIELD, JSON.stringify(rest));
    } catch (e) {
      throw new StorageError('redis', `Failed to insert: ${e}`);
    }
    if (created === 0) {
      throw new DuplicateHandleError(record.handle);
    }
  }

  async findByHandle(handle: string): Promise<LinkRecord | null> {
    let fields: Record<string, string>;
    try {
      fields = await this.client.hgetall(this.key(handle));
    } catch (e) {
      throw new StorageError('redis', `Failed to get: ${e}`);
    }

    const raw = fields[RECORD_FIELD];
    if (raw === undefined) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      const views = fields[VIEWS_FIELD];
      return LinkRecord.parse({
        ...(typeof parsed === 'object' && parsed !== null ? parsed : {}),
        view_count: views === undefined ? 0 : parseInt(views, 10),
      });
    } catch (e) {
      if (e instanceof LinkError) {
        throw new StorageError('redis', e.message);
      }
      throw new StorageError('redis', `Failed to parse record ${handle}: ${e}`);
    }
  }

  async incrementViews(handle: string): Promise<number> {
    const key = this.key(handle);
    let replies: [Error | null, unknown][] | null;
    try {
      replies = await this.client.multi().hexists(key, RECORD_FIELD).hincrby(key, VIEWS_FIELD, 1).exec();
    } catch (e) {
      throw new StorageError('redis', `Failed to increment views: ${e}`);
    }
    if (!replies || replies.length !== 2) {
      throw new StorageError('redis', 'Increment transaction was aborted');
    }

    const [[existsError, exists], [incrError, count]] = replies;
    if (existsError || incrError) {
      throw new StorageError('redis', `Failed to increment views: ${existsError ?? incrError}`);
    }
    if (exists !== 1) {
      // HINCRBY created a stray counter for a record that was evicted
      await this.deleteIfExists(handle);
      throw new NotFoundError(handle);
    }
    if (typeof count !== 'number') {
      throw new StorageError('redis', `Unexpected HINCRBY reply: ${String(count)}`);
    }
    return count;
  }

  async deleteIfExists(handle: string): Promise<boolean> {
    try {
      const result = await this.client.del(this.key(handle));
      return result > 0;
    } catch (e) {
      throw new StorageError('redis', `Failed to delete: ${e}`);
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

// ============================================================
// Backend Factory
// ============================================================

/**
 * Create a record store from a URL.
 *
 * Supported schemes:
 * - memory:// - In-memory storage (for testing)
 * - redis://host:port/db - Redis storage
 * - rediss://host:port/db - Redis over TLS
 */
export function createRecordStore(storeUrl: string): RecordStore {
  if (storeUrl === 'memory://' || storeUrl === 'memory') {
    return new MemoryRecordStore();
  }

  const url = new URL(storeUrl);
  if (url.protocol === 'redis:' || url.protocol === 'rediss:') {
    return new RedisRecordStore(storeUrl);
  }

  throw new InvalidInputError('RECORD_STORE_URL', `Unsupported record store scheme: ${url.protocol}`);
}
