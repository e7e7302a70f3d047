/**
 * Link Record Types
 *
 * Defines the LinkRecord class, its payload shapes and the serialized
 * form stored by record backends.
 */

import { z } from 'zod';
import { InvalidInputError } from './exceptions.js';

/**
 * Metadata for an uploaded file. The encrypted bytes live in the blob
 * store under the record's handle.
 */
export interface FileRef {
  fileName: string | null;
  mimeType: string | null;
}

/**
 * What a link carries. At least one of text and file is always present.
 */
export type LinkPayload =
  | { kind: 'text'; textCiphertext: Buffer }
  | { kind: 'file'; file: FileRef }
  | { kind: 'textAndFile'; textCiphertext: Buffer; file: FileRef };

/**
 * Serialized record format for storage.
 */
export interface LinkRecordData {
  handle: string;
  has_text: boolean;
  has_file: boolean;
  text_ciphertext: string | null; // base64
  file_name: string | null;
  mime_type: string | null;
  created_at: string;
  expiry_at: string | null;
  max_views: number | null;
  view_count: number;
}

export const linkRecordDataSchema = z.object({
  handle: z.string().min(1),
  has_text: z.boolean(),
  has_file: z.boolean(),
  text_ciphertext: z.string().nullable(),
  file_name: z.string().nullable(),
  mime_type: z.string().nullable(),
  created_at: z.string(),
  expiry_at: z.string().nullable(),
  max_views: z.number().int().nullable(),
  view_count: z.number().int().nonnegative(),
});

/**
 * Options for creating a link record.
 */
export interface LinkRecordCreateOptions {
  handle: string;
  payload: LinkPayload;
  expiryAt?: Date | null;
  maxViews?: number | null;
  now?: Date;
}

/**
 * Metadata and text ciphertext for one shared secret.
 */
export class LinkRecord {
  constructor(
    public readonly handle: string,
    public readonly payload: LinkPayload,
    public readonly createdAt: Date,
    public readonly expiryAt: Date | null = null,
    public readonly maxViews: number | null = null,
    public viewCount: number = 0
  ) {}

  static create(options: LinkRecordCreateOptions): LinkRecord {
    return new LinkRecord(
      options.handle,
      options.payload,
      options.now ?? new Date(),
      options.expiryAt ?? null,
      options.maxViews ?? null,
      0
    );
  }

  get hasText(): boolean {
    return this.payload.kind !== 'file';
  }

  get hasFile(): boolean {
    return this.payload.kind !== 'text';
  }

  get textCiphertext(): Buffer | null {
    return this.payload.kind === 'file' ? null : this.payload.textCiphertext;
  }

  get file(): FileRef | null {
    return this.payload.kind === 'text' ? null : this.payload.file;
  }

  toDict(): LinkRecordData {
    const text = this.textCiphertext;
    const file = this.file;
    return {
      handle: this.handle,
      has_text: text !== null,
      has_file: file !== null,
      text_ciphertext: text === null ? null : text.toString('base64'),
      file_name: file?.fileName ?? null,
      mime_type: file?.mimeType ?? null,
      created_at: this.createdAt.toISOString(),
      expiry_at: this.expiryAt?.toISOString() ?? null,
      max_views: this.maxViews,
      view_count: this.viewCount,
    };
  }

  /**
   * Reconstruct a LinkRecord from serialized data.
   *
   * @throws InvalidInputError if the flags and columns disagree or no
   *         payload is present
   */
  static fromDict(data: LinkRecordData): LinkRecord {
    return new LinkRecord(
      data.handle,
      payloadFromColumns(data),
      new Date(data.created_at),
      data.expiry_at === null ? null : new Date(data.expiry_at),
      data.max_views,
      data.view_count
    );
  }

  /**
   * Validate untrusted JSON (as read back from a backend) and rebuild.
   */
  static parse(raw: unknown): LinkRecord {
    const result = linkRecordDataSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidInputError('record', `Malformed link record: ${result.error.message}`);
    }
    return LinkRecord.fromDict(result.data);
  }
}

function payloadFromColumns(data: LinkRecordData): LinkPayload {
  if (data.has_text && data.text_ciphertext === null) {
    throw new InvalidInputError('record', `Record ${data.handle} claims text but has none`);
  }
  const textCiphertext =
    data.has_text && data.text_ciphertext !== null
      ? Buffer.from(data.text_ciphertext, 'base64')
      : null;
  const file: FileRef | null = data.has_file
    ? { fileName: data.file_name, mimeType: data.mime_type }
    : null;

  if (textCiphertext && file) {
    return { kind: 'textAndFile', textCiphertext, file };
  }
  if (textCiphertext) {
    return { kind: 'text', textCiphertext };
  }
  if (file) {
    return { kind: 'file', file };
  }
  throw new InvalidInputError('record', `Record ${data.handle} has no payload`);
}

// ============================================================
// Expiry specification
// ============================================================

export type ExpiryUnit = 'minutes' | 'hours' | 'days';

/**
 * Caller-supplied expiry: a magnitude and a unit, both as received.
 */
export interface ExpirySpec {
  value: string | number | null | undefined;
  unit?: string | null;
}

const UNIT_MS: Record<ExpiryUnit, number> = {
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
};

// Largest timestamp a Date can hold
const MAX_DATE_MS = 8.64e15;

function isExpiryUnit(unit: string): unit is ExpiryUnit {
  return unit === 'minutes' || unit === 'hours' || unit === 'days';
}

/**
 * Parse an integer magnitude the way form fields arrive. Returns null
 * for anything that is not a whole number.
 */
export function parseInteger(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

/**
 * Resolve an expiry spec into an absolute deadline.
 *
 * Empty, non-numeric and non-positive magnitudes mean "no expiry" and
 * return null rather than failing. An unknown unit counts as minutes.
 *
 * @throws InvalidInputError if the deadline is past the representable date range
 *
 * @example
 * parseExpiry({ value: '2', unit: 'hours' }, now)  // now + 2h
 * parseExpiry({ value: '0', unit: 'days' }, now)   // null
 */
export function parseExpiry(spec: ExpirySpec, now: Date = new Date()): Date | null {
  const magnitude = parseInteger(spec.value);
  if (magnitude === null || magnitude <= 0) {
    return null;
  }
  const unit = spec.unit && isExpiryUnit(spec.unit) ? spec.unit : 'minutes';
  const deadline = now.getTime() + magnitude * UNIT_MS[unit];
  if (!Number.isFinite(deadline) || Math.abs(deadline) > MAX_DATE_MS) {
    throw new InvalidInputError('expiry_value', 'Expiry is too far in the future.');
  }
  return new Date(deadline);
}
