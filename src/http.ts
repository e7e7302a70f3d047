/**
 * JSON HTTP adapter over LinkService.
 *
 * Routes:
 *   POST /api/links        create a link
 *   GET  /api/links/:key   view text (counts as a view)
 *   GET  /download/:key    download the file (counts as a view)
 */

import express, { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import {
  AuthenticationError,
  EvictedError,
  InvalidInputError,
  NotFoundError,
} from './exceptions.js';
import { Logger, createLogger } from './logger.js';
import { parseCreateRequest } from './request.js';
import type { LinkService } from './service.js';

export interface AppOptions {
  logger?: Logger;
  /** Base URL for returned links; defaults to the request's own host */
  publicUrl?: string;
  /** Maximum JSON body size (express size string) */
  bodyLimit?: string;
}

const UNAVAILABLE = 'Link not found or expired.';

/** 4xx errors raised by express.json (oversized body, bad charset) */
interface ClientHttpError extends Error {
  status: number;
  type?: string;
}

function isClientHttpError(err: unknown): err is ClientHttpError {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

function baseUrl(req: Request, publicUrl?: string): string {
  const base = publicUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;
  return base.replace(/\/+$/, '');
}

function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

/**
 * Build the Express application.
 */
export function createApp(service: LinkService, options: AppOptions = {}): express.Express {
  const log = options.logger ?? createLogger('http');
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: options.bodyLimit ?? '10mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    res.setHeader('X-Request-Id', requestId);
    res.locals.requestId = requestId;
    log.debug('Request', { requestId, method: req.method, path: req.path });
    next();
  });

  app.post('/api/links', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { payload, options: createOptions } = parseCreateRequest(req.body);
      const record = await service.create(payload, createOptions);
      res.status(201).json({
        key: record.handle,
        url: `${baseUrl(req, options.publicUrl)}/${record.handle}`,
        expiry_time: record.expiryAt?.toISOString() ?? null,
        max_views: record.maxViews,
        is_file: record.hasFile,
      });
    } catch (e) {
      next(e);
    }
  });

  app.get('/api/links/:key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await service.serve(req.params.key);
      res.json({
        content: result.text?.status === 'decrypted' ? result.text.plaintext : null,
        decrypt_error: result.text?.status === 'undecryptable',
        file: result.file
          ? { filename: result.file.fileName, download_url: `/download/${result.handle}` }
          : null,
        remaining: result.remainingViews,
      });
    } catch (e) {
      next(e);
    }
  });

  app.get('/download/:key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = await service.serveFile(req.params.key);
      res.setHeader('Content-Type', file.mimeType);
      res.setHeader('Content-Disposition', contentDisposition(file.fileName));
      res.status(200).send(file.bytes);
    } catch (e) {
      next(e);
    }
  });

  // Express recognises error handlers by arity, so `next` must stay
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof InvalidInputError) {
      res.status(400).json({ error: err.message, field: err.field });
      return;
    }
    if (err instanceof NotFoundError || err instanceof EvictedError) {
      res.status(404).json({ error: UNAVAILABLE });
      return;
    }
    if (err instanceof AuthenticationError) {
      res.status(422).json({ error: 'Could not decrypt file.' });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (isClientHttpError(err)) {
      log.debug('Rejected request body', { requestId: res.locals.requestId, status: err.status, type: err.type });
      res.status(err.status).json({ error: err.status === 413 ? 'Request body too large' : err.message });
      return;
    }
    log.error('Unhandled error', { requestId: res.locals.requestId, path: req.path, error: err });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
