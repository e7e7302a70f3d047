/**
 * Basic Usage Example
 *
 * Demonstrates the link lifecycle:
 * - Creating text and file links with view budgets and deadlines
 * - Serving the last view and automatic eviction
 * - Typed errors for unavailable links
 *
 * Run with: npm run example
 */

import {
  Cipher,
  EvictedError,
  LinkService,
  NotFoundError,
  createLogger,
} from '../src/index.js';

async function main() {
  console.log('='.repeat(60));
  console.log('Link Store Basic Usage Example');
  console.log('='.repeat(60));

  // Memory stores for the demo; use redis:// and file:<dir> in production
  const service = new LinkService({
    cipher: Cipher.fromConfig({ fileKey: Cipher.generateKey(), secretKey: 'unused' }),
    records: 'memory://',
    blobs: 'memory://',
    logger: createLogger('example', { level: 'warn' }),
  });

  // ============================================================
  // 1. A one-time secret
  // ============================================================
  console.log('\n1. One-time secret');
  console.log('-'.repeat(40));

  const once = await service.create({ text: 'the vault code is 0000' }, { maxViews: 1 });
  console.log(`Created link: ${once.handle}`);

  const view = await service.serve(once.handle);
  if (view.text?.status === 'decrypted') {
    console.log(`  Content: ${view.text.plaintext}`);
  }
  console.log(`  Remaining views: ${view.remainingViews}`);

  try {
    await service.serve(once.handle);
  } catch (e) {
    if (e instanceof NotFoundError || e instanceof EvictedError) {
      console.log(`  Second view: ${e.name}`);
    } else {
      throw e;
    }
  }

  // ============================================================
  // 2. Text plus file with a deadline
  // ============================================================
  console.log('\n2. Text and file, expiring in 2 hours');
  console.log('-'.repeat(40));

  const shared = await service.create(
    {
      text: 'Report attached',
      file: { bytes: Buffer.from('quarterly numbers'), fileName: 'report.txt', mimeType: 'text/plain' },
    },
    { expiry: { value: 2, unit: 'hours' }, maxViews: 3 }
  );
  console.log(`Created link: ${shared.handle}`);
  console.log(`  Expires at: ${shared.expiryAt?.toISOString()}`);

  const page = await service.serve(shared.handle);
  console.log(`  File: ${page.file?.fileName} (${page.file?.mimeType})`);

  const download = await service.serveFile(shared.handle);
  console.log(`  Downloaded ${download.bytes.length} bytes, ${download.remainingViews} views left`);

  console.log(`\nStats: ${JSON.stringify(service.stats())}`);
  await service.close();
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
