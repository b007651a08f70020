import { logger } from '../config/logger';
import { PlatformLabel } from '../types';
import { errorMessage } from '../utils/errors';
import { LinkedInScraperService } from './scrapers/LinkedInScraperService';
import { TwitterScraperService } from './scrapers/TwitterScraperService';

export interface RefreshOutcome {
  platform: PlatformLabel;
  saved: number;
  error?: string;
}

/**
 * Runs both scrapers one after the other. A failing platform is reported in
 * its outcome and does not stop the other.
 */
export class RefreshService {
  constructor(
    private readonly linkedin: LinkedInScraperService,
    private readonly twitter: TwitterScraperService
  ) {}

  async refreshAll(): Promise<RefreshOutcome[]> {
    const outcomes: RefreshOutcome[] = [];

    outcomes.push(await this.run('LinkedIn', () => this.linkedin.saveToDatabase()));
    outcomes.push(await this.run('Twitter', () => this.twitter.saveToDatabase()));

    return outcomes;
  }

  private async run(platform: PlatformLabel, save: () => Promise<number>): Promise<RefreshOutcome> {
    try {
      const saved = await save();
      logger.info(`🔄 ${platform} refresh saved ${saved} posts`);
      return { platform, saved };
    } catch (error) {
      logger.error(`❌ ${platform} scraping error: ${errorMessage(error)}`);
      return { platform, saved: 0, error: errorMessage(error) };
    }
  }
}
