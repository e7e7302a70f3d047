/**
 * fleeting-links
 *
 * Share text and files through unguessable links that are encrypted at
 * rest and destroyed once their deadline passes or their views run out.
 *
 * @packageDocumentation
 */

// ============================================================
// Link Service
// ============================================================

export { LinkService, DEFAULT_MIME_TYPE, MAX_CREATE_ATTEMPTS } from './service.js';
export type {
  LinkServiceOptions,
  CreateLinkPayload,
  CreateLinkOptions,
  FileUpload,
  ServeResult,
  ServedText,
  ServedFile,
  ServedFileInfo,
  ServiceStats,
} from './service.js';

// ============================================================
// Storage
// ============================================================

export { MemoryRecordStore, RedisRecordStore, createRecordStore } from './record-store.js';
export type { RecordStore } from './record-store.js';
export { MemoryBlobStore, FileBlobStore, createBlobStore } from './blob-store.js';
export type { BlobStore } from './blob-store.js';

// ============================================================
// Records and Expiry
// ============================================================

export { LinkRecord, parseExpiry, parseInteger } from './record.js';
export type {
  LinkPayload,
  LinkRecordData,
  LinkRecordCreateOptions,
  FileRef,
  ExpirySpec,
  ExpiryUnit,
} from './record.js';
export { isExpired, expiryReason, admitsView, remainingViews } from './expiry.js';

// ============================================================
// Keys and Cryptography
// ============================================================

export { KeyGenerator, DEFAULT_HANDLE_BYTES } from './keys.js';
export { Cipher } from './crypto.js';
export type { CipherKeySource } from './crypto.js';

// ============================================================
// Requests, HTTP and Configuration
// ============================================================

export { parseCreateRequest, parseMaxViews, secureFileName, expirySpecFrom } from './request.js';
export type { CreateRequest, CreateRequestBody } from './request.js';
export { createApp } from './http.js';
export type { AppOptions } from './http.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, silentLogger, formatLine } from './logger.js';
export type { Logger, LogLevel, LogFields, LoggerOptions, LogSink } from './logger.js';

// ============================================================
// Exceptions
// ============================================================

export {
  LinkError,
  InvalidInputError,
  NotFoundError,
  EvictedError,
  AuthenticationError,
  StorageError,
  DuplicateHandleError,
} from './exceptions.js';
export type { EvictionReason } from './exceptions.js';

// ============================================================
// Version
// ============================================================

export const VERSION = '0.1.0';
