#!/usr/bin/env node

/**
 * Scrape LinkedIn posts from LINKEDIN_PROFILE_URL into the content pipeline
 * as Inspiration items.
 */

import { logger } from '../config/logger';
import { runScript } from './runScript';

runScript('import-linkedin-inspiration', async ({ inspiration }) => {
  const { found, saved } = await inspiration.importFromProfile();
  if (found === 0) {
    logger.info('No posts found to save');
    return;
  }
  logger.info(`📊 Saved ${saved} of ${found} posts to Content Pipeline`);
}).catch((error: unknown) => {
  logger.error('❌ import-linkedin-inspiration could not start:', error);
  process.exitCode = 1;
});
