/**
 * Expiry policy for links.
 *
 * Pure functions so that the request path and any future sweeper share
 * one definition of "expired".
 */

import type { EvictionReason } from './exceptions.js';
import type { LinkRecord } from './record.js';

/**
 * Why a record is expired at the given time and view count, or null if
 * it is still live. The deadline is checked before the view budget.
 */
export function expiryReason(
  record: LinkRecord,
  now: Date,
  viewCount: number = record.viewCount
): EvictionReason | null {
  if (record.expiryAt !== null && now.getTime() > record.expiryAt.getTime()) {
    return 'time';
  }
  if (record.maxViews !== null && viewCount >= record.maxViews) {
    return 'views';
  }
  return null;
}

export function isExpired(
  record: LinkRecord,
  now: Date,
  viewCount: number = record.viewCount
): boolean {
  return expiryReason(record, now, viewCount) !== null;
}

/**
 * Whether a view that brought the counter to `postCount` may be served.
 * A count past the budget means another caller consumed the last view.
 */
export function admitsView(record: LinkRecord, postCount: number): boolean {
  return record.maxViews === null || postCount <= record.maxViews;
}

/** Views left after `viewCount` views, or null when unlimited. */
export function remainingViews(
  record: LinkRecord,
  viewCount: number = record.viewCount
): number | null {
  if (record.maxViews === null) {
    return null;
  }
  return Math.max(0, record.maxViews - viewCount);
}
