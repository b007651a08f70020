#!/usr/bin/env node

// Scrape both platforms and store posts plus follower snapshots

import { logger } from '../config/logger';
import { runScript } from './runScript';

runScript('refresh-metrics', async ({ refresh }) => {
  const outcomes = await refresh.refreshAll();
  for (const outcome of outcomes) {
    if (outcome.error) {
      logger.warn(`⚠️ ${outcome.platform}: ${outcome.error}`);
    } else {
      logger.info(`📊 ${outcome.platform}: saved ${outcome.saved} posts`);
    }
  }
}).catch((error: unknown) => {
  logger.error('❌ refresh-metrics could not start:', error);
  process.exitCode = 1;
});
