#!/usr/bin/env node

/**
 * Generate tweet drafts for every Twitter calendar item that has none.
 * Usage:
 *   npm run generate-calendar-drafts
 *   npm run generate-calendar-drafts -- --dry-run   (print drafts, save nothing)
 */

import { logger } from '../config/logger';
import { runScript } from './runScript';

const dryRun = process.argv.slice(2).includes('--dry-run');

runScript('generate-calendar-drafts', async ({ drafts }) => {
  const result = await drafts.processCalendarItems({ dryRun });

  for (const item of result.items) {
    if (item.draft) {
      logger.info(`📝 ${item.topic}\n${item.draft}`);
    }
  }
  logger.info(`📊 Processed ${result.processed} of ${result.found} items${dryRun ? ' (dry run)' : ''}`);
}).catch((error: unknown) => {
  logger.error('❌ generate-calendar-drafts could not start:', error);
  process.exitCode = 1;
});
