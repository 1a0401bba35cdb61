/**
 * Sync entry point: copies generated sentences into the PWA folder
 *
 * Usage: npm run sync
 * Overrides: PWA_SYNC_SOURCE, PWA_SYNC_DEST
 */

import { PwaSyncService } from './sync/index.js';
import { isSyncError } from '../shared/utils/errors.js';
import { SYNC_CONFIG } from '../shared/constants/index.js';

async function main(): Promise<void> {
  const service = new PwaSyncService(process.cwd(), {
    sourcePath: process.env.PWA_SYNC_SOURCE || SYNC_CONFIG.SOURCE_PATH,
    pwaDirectory: process.env.PWA_SYNC_DEST || SYNC_CONFIG.PWA_DIRECTORY
  });

  try {
    const summary = await service.sync();
    console.log(`Synced to PWA: ${summary.words} words, ${summary.sentences} sentences`);
    console.log(`  → ${summary.destination}`);
    console.log('Bump CACHE_CONFIG.VERSION so installed pages pick up the new sentences and audio.');
  } catch (error) {
    if (isSyncError(error) && error.code === 'SOURCE_NOT_FOUND') {
      console.error(`Error: ${service.sourcePath} not found`);
      console.error('Generate sentences first, then run the sync again');
    } else {
      console.error('Sync failed:', error);
    }
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Unexpected sync error:', error);
  process.exitCode = 1;
});
