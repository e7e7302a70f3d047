/**
 * Process entry point: load configuration, wire the stores and cipher
 * into a LinkService and serve the HTTP adapter.
 *
 * Run with: npm start
 */

import { config as loadDotenv } from 'dotenv';
import type { Server } from 'http';
import { createBlobStore } from './blob-store.js';
import { loadConfig } from './config.js';
import { Cipher } from './crypto.js';
import { createApp } from './http.js';
import { createLogger } from './logger.js';
import { createRecordStore } from './record-store.js';
import { LinkService } from './service.js';

export async function main(): Promise<Server> {
  loadDotenv();
  const config = loadConfig();
  const log = createLogger('server', { level: config.logLevel });

  if (!config.crypto.fileKey) {
    log.warn('FILE_KEY not set; deriving the encryption key from SECRET_KEY');
  }

  const service = new LinkService({
    cipher: Cipher.fromConfig(config.crypto),
    records: createRecordStore(config.storage.recordStoreUrl),
    blobs: createBlobStore(config.storage.blobStoreUrl),
    handleBytes: config.handleBytes,
    logger: log.child('links'),
  });

  const app = createApp(service, {
    logger: log.child('http'),
    publicUrl: config.server.publicUrl,
  });

  const server = app.listen(config.server.port, () => {
    log.info('Listening', {
      port: config.server.port,
      records: config.storage.recordStoreUrl,
      blobs: config.storage.blobStoreUrl,
    });
  });

  const shutdown = (signal: string): void => {
    log.info('Shutting down', { signal });
    server.close(() => {
      service.close().then(
        () => process.exit(0),
        (e: unknown) => {
          log.error('Close failed', { error: e });
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
