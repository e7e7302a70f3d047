/**
 * Runtime configuration, read from environment variables.
 */

import { z } from 'zod';
import { InvalidInputError } from './exceptions.js';
import { DEFAULT_HANDLE_BYTES } from './keys.js';

const envSchema = z.object({
  SECRET_KEY: z.string().min(1).default('dev-secret-key'),
  FILE_KEY: z.string().optional(),
  RECORD_STORE_URL: z.string().default('memory://'),
  BLOB_STORE_URL: z.string().default('file:uploads'),
  HANDLE_BYTES: z.coerce.number().int().min(1).max(64).default(DEFAULT_HANDLE_BYTES),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  PUBLIC_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  crypto: {
    secretKey: string;
    fileKey?: string;
  };
  storage: {
    recordStoreUrl: string;
    blobStoreUrl: string;
  };
  handleBytes: number;
  server: {
    port: number;
    /** Base for links handed back to clients; defaults to the request host */
    publicUrl?: string;
  };
  logLevel: Env['LOG_LEVEL'];
}

/**
 * Validate the environment and build the application config.
 * Empty strings count as unset.
 *
 * @throws InvalidInputError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'env';
    throw new InvalidInputError(field, `Invalid configuration for ${field}: ${issue?.message ?? 'unknown'}`);
  }

  const parsed = result.data;
  return {
    crypto: { secretKey: parsed.SECRET_KEY, fileKey: parsed.FILE_KEY },
    storage: {
      recordStoreUrl: parsed.RECORD_STORE_URL,
      blobStoreUrl: parsed.BLOB_STORE_URL,
    },
    handleBytes: parsed.HANDLE_BYTES,
    server: { port: parsed.PORT, publicUrl: parsed.PUBLIC_URL },
    logLevel: parsed.LOG_LEVEL,
  };
}
