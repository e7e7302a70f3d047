/**
 * Link Store Exceptions
 *
 * Custom error classes for the link store.
 * All errors extend from the base LinkError class.
 */

/**
 * Base error class for all link store errors.
 */
export class LinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinkError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when caller-supplied input cannot be accepted.
 */
export class InvalidInputError extends LinkError {
  constructor(
    public readonly field: string,
    message?: string
  ) {
    super(message ?? `Invalid input: ${field}`);
    this.name = 'InvalidInputError';
  }
}

/**
 * Raised when no link exists for a handle.
 */
export class NotFoundError extends LinkError {
  constructor(
    public readonly handle: string,
    message?: string
  ) {
    super(message ?? `Link not found: ${handle}`);
    this.name = 'NotFoundError';
  }
}

export type EvictionReason = 'time' | 'views';

/**
 * Raised when a link existed but has expired and was evicted.
 */
export class EvictedError extends LinkError {
  constructor(
    public readonly handle: string,
    public readonly reason: EvictionReason
  ) {
    super(
      reason === 'time'
        ? `Link expired: ${handle} (time)`
        : `Link expired: ${handle} (max views reached)`
    );
    this.name = 'EvictedError';
  }
}

/**
 * Raised when ciphertext fails authentication or cannot be decrypted.
 */
export class AuthenticationError extends LinkError {
  constructor(
    public readonly operation: string,
    message?: string
  ) {
    super(message ?? `Authentication failed: ${operation}`);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised when a storage backend operation fails.
 */
export class StorageError extends LinkError {
  constructor(
    public readonly backend: string,
    message?: string
  ) {
    super(message ?? `Storage error: ${backend}`);
    this.name = 'StorageError';
  }
}

/**
 * Raised when inserting a record whose handle is already taken.
 */
export class DuplicateHandleError extends LinkError {
  constructor(public readonly handle: string) {
    super(`Handle already exists: ${handle}`);
    this.name = 'DuplicateHandleError';
  }
}
