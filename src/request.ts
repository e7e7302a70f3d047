/**
 * Translation of client-supplied create requests into service calls.
 *
 * Field names and their quirks follow the link creation form: blank or
 * non-positive expiry magnitudes mean "no expiry", `expiry_minutes` is
 * the legacy spelling of a minutes expiry, and non-positive view budgets
 * mean unlimited.
 */

import { z } from 'zod';
import { InvalidInputError } from './exceptions.js';
import { ExpirySpec, parseInteger } from './record.js';
import type { CreateLinkOptions, CreateLinkPayload } from './service.js';

const numeric = z.union([z.string(), z.number()]).nullish();

export const createRequestSchema = z.object({
  content: z.string().nullish(),
  expiry_value: numeric,
  expiry_unit: z.string().nullish(),
  expiry_minutes: numeric,
  max_views: numeric,
  file: z
    .object({
      name: z.string().nullish(),
      mime_type: z.string().nullish(),
      data: z.string(),
    })
    .nullish(),
});

export type CreateRequestBody = z.infer<typeof createRequestSchema>;

export interface CreateRequest {
  payload: CreateLinkPayload;
  options: CreateLinkOptions;
}

function isBlank(value: string | number | null | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Pick the expiry spec, falling back to the legacy minutes field when
 * no expiry value was given.
 */
export function expirySpecFrom(body: CreateRequestBody): ExpirySpec {
  if (isBlank(body.expiry_value) && !isBlank(body.expiry_minutes)) {
    return { value: body.expiry_minutes, unit: 'minutes' };
  }
  return { value: body.expiry_value, unit: body.expiry_unit ?? 'minutes' };
}

/**
 * @returns The view budget, or null for unlimited
 * @throws InvalidInputError if the value is present but not an integer
 */
export function parseMaxViews(value: string | number | null | undefined): number | null {
  if (isBlank(value)) {
    return null;
  }
  const views = parseInteger(value);
  if (views === null) {
    throw new InvalidInputError('max_views', 'Max views must be an integer.');
  }
  return views > 0 ? views : null;
}

/**
 * Reduce a client-supplied file name to a safe ASCII name.
 *
 * @example
 * secureFileName('../../etc/passwd')   // 'etc_passwd'
 * secureFileName('My cool movie.mov')  // 'My_cool_movie.mov'
 */
export function secureFileName(name: string): string {
  const ascii = name.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
  const separated = ascii.replace(/[/\\]/g, ' ');
  const joined = separated.split(/\s+/).filter(Boolean).join('_');
  return joined.replace(/[^A-Za-z0-9_.-]/g, '').replace(/^[._]+|[._]+$/g, '');
}

/**
 * Validate a JSON create request and map it onto the service call.
 *
 * @throws InvalidInputError on a malformed body, no payload, or a
 *         non-integer view budget
 */
export function parseCreateRequest(raw: unknown): CreateRequest {
  const result = createRequestSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new InvalidInputError(field, `Invalid request: ${issue?.message ?? 'malformed body'}`);
  }
  const body = result.data;

  const text = body.content?.trim() || null;
  const file = body.file
    ? {
        bytes: Buffer.from(body.file.data, 'base64'),
        fileName: body.file.name ? secureFileName(body.file.name) || null : null,
        mimeType: body.file.mime_type || null,
      }
    : null;

  if (text === null && file === null) {
    throw new InvalidInputError('content', 'Provide either text content or a file.');
  }

  return {
    payload: { text, file },
    options: {
      expiry: expirySpecFrom(body),
      maxViews: parseMaxViews(body.max_views),
    },
  };
}
