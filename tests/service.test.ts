import { describe, it, expect, beforeEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import { MemoryBlobStore } from '../src/blob-store.js';
import { Cipher } from '../src/crypto.js';
import {
  AuthenticationError,
  EvictedError,
  InvalidInputError,
  NotFoundError,
  StorageError,
} from '../src/exceptions.js';
import { KeyGenerator } from '../src/keys.js';
import { LogLevel, createLogger, silentLogger } from '../src/logger.js';
import { LinkRecord } from '../src/record.js';
import { MemoryRecordStore, RecordStore, RedisRecordStore } from '../src/record-store.js';
import { LinkService, MAX_CREATE_ATTEMPTS } from '../src/service.js';

const START = new Date('2026-05-01T10:00:00.000Z');

class FailingInsertStore extends MemoryRecordStore {
  override async insert(_record: LinkRecord): Promise<void> {
    throw new Error('disk full');
  }
}

// Hands out handles without checking the record store, the way a
// concurrent create sees a handle that is free but about to be claimed
class ScriptedKeyGenerator extends KeyGenerator {
  constructor(private readonly script: string[]) {
    super(new MemoryRecordStore());
  }

  override async newHandle(): Promise<string> {
    return this.script.shift() ?? 'unscripted';
  }
}

class FailingDeleteBlobStore extends MemoryBlobStore {
  override async delete(_handle: string): Promise<void> {
    throw new Error('permission denied');
  }
}

describe('LinkService', () => {
  let records: MemoryRecordStore;
  let blobs: MemoryBlobStore;
  let clock: Date;
  let logLines: { level: Exclude<LogLevel, 'silent'>; line: string }[];
  let service: LinkService;
  const cipher = Cipher.fromSecret('test-secret');

  function build(
    overrides: {
      records?: MemoryRecordStore;
      blobs?: MemoryBlobStore;
      cipher?: Cipher;
      keyGenerator?: KeyGenerator;
      handleBytes?: number;
    } = {}
  ): LinkService {
    return new LinkService({
      cipher: overrides.cipher ?? cipher,
      records: overrides.records ?? records,
      blobs: overrides.blobs ?? blobs,
      keyGenerator: overrides.keyGenerator,
      handleBytes: overrides.handleBytes,
      logger: createLogger('test', {
        level: 'debug',
        sink: (level, line) => logLines.push({ level, line }),
        now: () => clock,
      }),
      now: () => clock,
    });
  }

  beforeEach(() => {
    records = new MemoryRecordStore();
    blobs = new MemoryBlobStore();
    clock = new Date(START.getTime());
    logLines = [];
    service = build();
  });

  describe('create', () => {
    it('should store encrypted text', async () => {
      const record = await service.create({ text: 'hunter2' });

      expect(record.payload.kind).toBe('text');
      expect(record.textCiphertext?.includes(Buffer.from('hunter2'))).toBe(false);
      expect(cipher.decryptText(record.textCiphertext ?? Buffer.alloc(0))).toBe('hunter2');
      expect(record.createdAt).toEqual(START);
      expect(records.size).toBe(1);
      expect(blobs.size).toBe(0);
    });

    it('should store an encrypted blob for files', async () => {
      const record = await service.create({
        file: { bytes: Buffer.from('PNGDATA'), fileName: 'cat.png', mimeType: 'image/png' },
      });

      const stored = await blobs.get(record.handle);
      expect(stored).not.toBeNull();
      expect(stored?.includes(Buffer.from('PNGDATA'))).toBe(false);
      expect(cipher.decrypt(stored ?? Buffer.alloc(0)).toString()).toBe('PNGDATA');
      expect(record.file).toEqual({ fileName: 'cat.png', mimeType: 'image/png' });
    });

    it('should reject an empty payload', async () => {
      await expect(service.create({})).rejects.toThrow(InvalidInputError);
      await expect(service.create({ text: '' })).rejects.toThrow('Provide either text content or a file.');
      expect(records.size).toBe(0);
    });

    it('should reject invalid view budgets', async () => {
      await expect(service.create({ text: 'x' }, { maxViews: 0 })).rejects.toThrow(InvalidInputError);
      await expect(service.create({ text: 'x' }, { maxViews: 1.5 })).rejects.toThrow(/positive integer/);
    });

    it('should resolve an expiry spec against the clock', async () => {
      const record = await service.create({ text: 'x' }, { expiry: { value: '2', unit: 'hours' } });

      expect(record.expiryAt).toEqual(new Date('2026-05-01T12:00:00.000Z'));
    });

    it('should treat a non-positive expiry spec as no expiry', async () => {
      const record = await service.create({ text: 'x' }, { expiry: { value: '-5', unit: 'days' } });

      expect(record.expiryAt).toBeNull();
    });

    it('should issue pairwise distinct handles', async () => {
      const handles = new Set<string>();
      for (let i = 0; i < 200; i++) {
        handles.add((await service.create({ text: `secret ${i}` })).handle);
      }
      expect(handles.size).toBe(200);
    });

    it('should remove the blob when the record cannot be committed', async () => {
      const failing = build({ records: new FailingInsertStore() });

      const attempt = failing.create({ text: 'x', file: { bytes: Buffer.from('data') } });

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toThrow(/disk full/);
      expect(blobs.size).toBe(0);
    });

    it('should move to a new handle when another create holds the blob', async () => {
      await blobs.put('taken', Buffer.from('in-flight upload'));
      const scripted = build({ keyGenerator: new ScriptedKeyGenerator(['taken', 'fresh']) });

      const record = await scripted.create({ file: { bytes: Buffer.from('mine') } });

      expect(record.handle).toBe('fresh');
      expect((await blobs.get('taken'))?.toString()).toBe('in-flight upload');
      expect(cipher.decrypt((await blobs.get('fresh')) ?? Buffer.alloc(0)).toString()).toBe('mine');
    });

    it('should drop only its own blob when another link wins the record', async () => {
      const first = build({ keyGenerator: new ScriptedKeyGenerator(['taken']) });
      await first.create({ text: 'first link' });
      const second = build({ keyGenerator: new ScriptedKeyGenerator(['taken', 'fresh']) });

      const record = await second.create({ file: { bytes: Buffer.from('second file') } });

      expect(record.handle).toBe('fresh');
      expect(await blobs.has('taken')).toBe(false);
      const original = await service.serve('taken');
      expect(original.text).toEqual({ status: 'decrypted', plaintext: 'first link' });
      expect((await service.serveFile('fresh')).bytes.toString()).toBe('second file');
    });

    it('should give up after repeated handle collisions', async () => {
      await blobs.put('taken', Buffer.from('occupied'));
      const stuck = build({
        keyGenerator: new ScriptedKeyGenerator(Array.from({ length: MAX_CREATE_ATTEMPTS }, () => 'taken')),
      });

      const attempt = stuck.create({ file: { bytes: Buffer.from('x') } });

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toThrow(`No free handle after ${MAX_CREATE_ATTEMPTS} attempts`);
      expect((await blobs.get('taken'))?.toString()).toBe('occupied');
      expect(records.size).toBe(0);
    });

    it('should keep every file intact when concurrent creates share a tiny handle space', async () => {
      const tiny = build({ handleBytes: 1 });
      const bodies = Array.from({ length: 60 }, (_, i) => `file body ${i}`);

      const created = await Promise.all(
        bodies.map((body) => tiny.create({ file: { bytes: Buffer.from(body) } }))
      );

      expect(new Set(created.map((r) => r.handle)).size).toBe(60);
      expect(records.size).toBe(60);
      expect(blobs.size).toBe(60);
      const served = await Promise.all(created.map((r) => tiny.serveFile(r.handle)));
      expect(served.map((f) => f.bytes.toString())).toEqual(bodies);
    });

    it('should reject an expiry beyond the date range as invalid input', async () => {
      const attempt = service.create({ text: 'x' }, { expiry: { value: '99999999999', unit: 'days' } });

      await expect(attempt).rejects.toThrow(InvalidInputError);
      await expect(attempt).rejects.toThrow('Expiry is too far in the future.');
      expect(records.size).toBe(0);
    });

    it('should reject an invalid expiry date', async () => {
      await expect(service.create({ text: 'x' }, { expiry: new Date(Number.NaN) })).rejects.toThrow(
        'Expiry is not a valid date.'
      );
    });

    it('should log creation without plaintext', async () => {
      const record = await service.create({ text: 'do-not-log-me' }, { maxViews: 2 });

      expect(logLines).toEqual([
        {
          level: 'info',
          line: `[10:00:00] [INFO ] [test] Link created {"handle":"${record.handle}","kind":"text","maxViews":2}`,
        },
      ]);
    });
  });

  describe('serve', () => {
    it('should decrypt text and count the view', async () => {
      const { handle } = await service.create({ text: 'hello' }, { maxViews: 3 });

      const result = await service.serve(handle);

      expect(result.text).toEqual({ status: 'decrypted', plaintext: 'hello' });
      expect(result.file).toBeNull();
      expect(result.viewCount).toBe(1);
      expect(result.remainingViews).toBe(2);
      expect((await records.findByHandle(handle))?.viewCount).toBe(1);
    });

    it('should throw NotFoundError for unknown handles', async () => {
      await expect(service.serve('nope')).rejects.toThrow(NotFoundError);
    });

    it('should evict a record whose deadline has passed', async () => {
      const { handle } = await service.create(
        { text: 'late' },
        { expiry: new Date(START.getTime() - 1000) }
      );

      const attempt = service.serve(handle);

      await expect(attempt).rejects.toThrow(EvictedError);
      await expect(attempt).rejects.toMatchObject({ reason: 'time' });
      expect(await records.findByHandle(handle)).toBeNull();
      expect(service.stats().evicted).toBe(1);
    });

    it('should evict once the clock passes the deadline', async () => {
      const { handle } = await service.create({ text: 'soon' }, { expiry: { value: 5, unit: 'minutes' } });

      await service.serve(handle);
      clock = new Date(START.getTime() + 5 * 60 * 1000 + 1);

      await expect(service.serve(handle)).rejects.toThrow(EvictedError);
      expect(records.size).toBe(0);
    });

    it('should serve the exhausting view and then delete the record', async () => {
      const { handle } = await service.create({ text: 'once' }, { maxViews: 1 });

      const first = await service.serve(handle);

      expect(first.text).toEqual({ status: 'decrypted', plaintext: 'once' });
      expect(first.remainingViews).toBe(0);
      expect(await records.findByHandle(handle)).toBeNull();

      await expect(service.serve(handle)).rejects.toThrow(NotFoundError);
    });

    it('should serve exactly maxViews times', async () => {
      const { handle } = await service.create({ text: 'thrice' }, { maxViews: 3 });

      const remaining: (number | null)[] = [];
      for (let i = 0; i < 3; i++) {
        remaining.push((await service.serve(handle)).remainingViews);
      }

      expect(remaining).toEqual([2, 1, 0]);
      await expect(service.serve(handle)).rejects.toThrow(NotFoundError);
    });

    it('should let exactly one of two concurrent serves win the last view', async () => {
      const { handle } = await service.create({ text: 'race' }, { maxViews: 1 });

      const outcomes = await Promise.allSettled([service.serve(handle), service.serve(handle)]);

      const won = outcomes.filter((o) => o.status === 'fulfilled');
      const lost = outcomes.filter((o) => o.status === 'rejected');
      expect(won).toHaveLength(1);
      expect(lost).toHaveLength(1);
      const [loser] = lost;
      const reason: unknown = loser && loser.status === 'rejected' ? loser.reason : null;
      expect(reason instanceof NotFoundError || reason instanceof EvictedError).toBe(true);
      expect(records.size).toBe(0);
    });

    it('should never over-serve under heavy concurrency', async () => {
      const { handle } = await service.create({ text: 'crowd' }, { maxViews: 3 });

      const outcomes = await Promise.allSettled(Array.from({ length: 10 }, () => service.serve(handle)));

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(3);
      expect(service.stats().served).toBe(3);
    });

    it('should keep unlimited records alive with a rising counter', async () => {
      const { handle } = await service.create({ text: 'forever' });

      const counts: number[] = [];
      for (let i = 0; i < 25; i++) {
        const result = await service.serve(handle);
        expect(result.remainingViews).toBeNull();
        counts.push(result.viewCount);
      }

      expect(counts).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
      expect(await records.findByHandle(handle)).not.toBeNull();
    });

    it('should report undecryptable text without failing the view', async () => {
      const { handle } = await service.create({ text: 'sealed' }, { maxViews: 2 });
      const otherKey = build({ cipher: Cipher.fromSecret('rotated-secret') });

      const result = await otherKey.serve(handle);

      expect(result.text?.status).toBe('undecryptable');
      expect(result.text?.status === 'undecryptable' && result.text.error).toBeInstanceOf(AuthenticationError);
      expect(result.remainingViews).toBe(1);
    });

    it('should describe an attached file only while its blob exists', async () => {
      const { handle } = await service.create({ text: 'see file', file: { bytes: Buffer.from('f') } });

      const withBlob = await service.serve(handle);
      expect(withBlob.file).toEqual({ fileName: `${handle}.bin`, mimeType: 'application/octet-stream' });

      await blobs.delete(handle);
      const withoutBlob = await service.serve(handle);
      expect(withoutBlob.file).toBeNull();
    });

    it('should delete the blob when evicting', async () => {
      const { handle } = await service.create({ text: 't', file: { bytes: Buffer.from('b') } }, { maxViews: 1 });

      await service.serve(handle);

      expect(await blobs.has(handle)).toBe(false);
      expect(records.size).toBe(0);
    });

    it('should swallow blob delete failures during eviction', async () => {
      const stubborn = new FailingDeleteBlobStore();
      const svc = build({ blobs: stubborn });
      const { handle } = await svc.create({ file: { bytes: Buffer.from('b') } }, { maxViews: 1 });

      const result = await svc.serve(handle);

      expect(result.remainingViews).toBe(0);
      expect(await records.findByHandle(handle)).toBeNull();
      expect(await stubborn.has(handle)).toBe(true);
      expect(logLines.some((l) => l.level === 'warn' && l.line.includes('Blob delete failed'))).toBe(true);
    });
  });

  describe('serveFile', () => {
    it('should return decrypted bytes and metadata', async () => {
      const { handle } = await service.create(
        { file: { bytes: Buffer.from('%PDF-1.7'), fileName: 'report.pdf', mimeType: 'application/pdf' } },
        { maxViews: 2 }
      );

      const file = await service.serveFile(handle);

      expect(file.bytes.toString()).toBe('%PDF-1.7');
      expect(file.fileName).toBe('report.pdf');
      expect(file.mimeType).toBe('application/pdf');
      expect(file.remainingViews).toBe(1);
    });

    it('should default the name and type', async () => {
      const { handle } = await service.create({ file: { bytes: Buffer.from('x') } });

      const file = await service.serveFile(handle);

      expect(file.fileName).toBe(`${handle}.bin`);
      expect(file.mimeType).toBe('application/octet-stream');
    });

    it('should throw NotFoundError for text-only links', async () => {
      const { handle } = await service.create({ text: 'no file' });

      await expect(service.serveFile(handle)).rejects.toThrow(NotFoundError);
      expect((await records.findByHandle(handle))?.viewCount).toBe(0);
    });

    it('should throw NotFoundError when the blob is missing', async () => {
      const { handle } = await service.create({ file: { bytes: Buffer.from('x') } });
      await blobs.delete(handle);

      await expect(service.serveFile(handle)).rejects.toThrow(/File missing from storage/);
      expect((await records.findByHandle(handle))?.viewCount).toBe(0);
    });

    it('should not consume a view when the blob cannot be decrypted', async () => {
      const { handle } = await service.create({ file: { bytes: Buffer.from('x') } }, { maxViews: 1 });
      await blobs.put(handle, Buffer.from('garbage that is long enough to parse'));

      await expect(service.serveFile(handle)).rejects.toThrow(AuthenticationError);
      expect((await records.findByHandle(handle))?.viewCount).toBe(0);
    });

    it('should evict after the last download', async () => {
      const { handle } = await service.create({ file: { bytes: Buffer.from('x') } }, { maxViews: 1 });

      const file = await service.serveFile(handle);

      expect(file.remainingViews).toBe(0);
      expect(records.size).toBe(0);
      expect(blobs.size).toBe(0);
      await expect(service.serveFile(handle)).rejects.toThrow(NotFoundError);
    });

    it('should evict an expired file link before reading the blob', async () => {
      const { handle } = await service.create(
        { file: { bytes: Buffer.from('x') } },
        { expiry: new Date(START.getTime() - 1) }
      );

      await expect(service.serveFile(handle)).rejects.toThrow(EvictedError);
      expect(blobs.size).toBe(0);
    });
  });

  describe('dual payload', () => {
    it('should pair decrypted text and file correctly', async () => {
      const a = await service.create({ text: 'text A', file: { bytes: Buffer.from('file A'), fileName: 'a.txt' } });
      const b = await service.create({ text: 'text B', file: { bytes: Buffer.from('file B'), fileName: 'b.txt' } });

      const viewB = await service.serve(b.handle);
      const viewA = await service.serve(a.handle);
      const fileA = await service.serveFile(a.handle);
      const fileB = await service.serveFile(b.handle);

      expect(viewA.text).toEqual({ status: 'decrypted', plaintext: 'text A' });
      expect(viewA.file?.fileName).toBe('a.txt');
      expect(viewB.text).toEqual({ status: 'decrypted', plaintext: 'text B' });
      expect(fileA.bytes.toString()).toBe('file A');
      expect(fileB.bytes.toString()).toBe('file B');
    });

    it('should share one view budget between text and file', async () => {
      const { handle } = await service.create({ text: 't', file: { bytes: Buffer.from('f') } }, { maxViews: 2 });

      expect((await service.serve(handle)).remainingViews).toBe(1);
      expect((await service.serveFile(handle)).remainingViews).toBe(0);

      await expect(service.serve(handle)).rejects.toThrow(NotFoundError);
    });
  });

  describe('stats and close', () => {
    it('should count created, served and evicted links', async () => {
      const { handle } = await service.create({ text: 'x' }, { maxViews: 1 });
      await service.create({ text: 'y' });
      await service.serve(handle);

      expect(service.stats()).toEqual({ created: 2, served: 1, evicted: 1 });
    });

    it('should close both stores', async () => {
      await service.create({ text: 'x', file: { bytes: Buffer.from('y') } });

      await service.close();

      expect(records.size).toBe(0);
      expect(blobs.size).toBe(0);
    });
  });
});

describe('LinkService on Redis', () => {
  async function redisService() {
    const client = new RedisMock();
    await client.flushall();
    const records: RecordStore = new RedisRecordStore(client);
    const service = new LinkService({
      cipher: Cipher.fromSecret('test-secret'),
      records,
      blobs: new MemoryBlobStore(),
      logger: silentLogger,
    });
    return { service, records, client };
  }

  it('should let exactly one of two concurrent serves win the last view', async () => {
    const { service, records, client } = await redisService();
    const { handle } = await service.create({ text: 'race' }, { maxViews: 1 });

    const outcomes = await Promise.allSettled([service.serve(handle), service.serve(handle)]);

    const won = outcomes.filter((o) => o.status === 'fulfilled');
    const lost = outcomes.flatMap((o) => (o.status === 'rejected' ? [o.reason] : []));
    expect(won).toHaveLength(1);
    expect(lost).toHaveLength(1);
    expect(lost.every((e) => e instanceof NotFoundError || e instanceof EvictedError)).toBe(true);
    expect(await records.findByHandle(handle)).toBeNull();
    expect(await client.exists(`link:${handle}`)).toBe(0);
  });

  it('should never over-serve under heavy concurrency', async () => {
    const { service } = await redisService();
    const { handle } = await service.create({ text: 'crowd' }, { maxViews: 3 });

    const outcomes = await Promise.allSettled(Array.from({ length: 10 }, () => service.serve(handle)));

    expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(3);
    expect(service.stats().served).toBe(3);
  });
});
