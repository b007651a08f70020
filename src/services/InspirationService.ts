import { logger } from '../config/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { readField, toText } from '../utils/records';
import { ContentStore } from './content';
import { LinkedInScraperService } from './scrapers/LinkedInScraperService';
import { extractPostTitle } from './scrapers/normalize';

export interface InspirationImportResult {
  found: number;
  saved: number;
}

/**
 * Pulls posts from a LinkedIn profile into the content pipeline as
 * Inspiration items.
 */
export class InspirationService {
  constructor(
    private readonly linkedin: LinkedInScraperService,
    private readonly contentStore: ContentStore,
    private readonly defaultProfileUrl: string
  ) {}

  async importFromProfile(profileUrl?: string, maxPosts: number = 20): Promise<InspirationImportResult> {
    const url = profileUrl || this.defaultProfileUrl;
    if (!url) {
      throw new ConfigurationError('LINKEDIN_PROFILE_URL not configured');
    }

    logger.info(`🔍 Scraping LinkedIn posts from: ${url}`);
    const posts = await this.linkedin.fetchInspirationPosts(url, maxPosts);
    logger.info(`📊 Found ${posts.length} posts`);

    let saved = 0;
    for (const post of posts) {
      try {
        const title = extractPostTitle(toText(readField(post, ['text', 'content'])));
        const originalUrl = toText(readField(post, ['url', 'postUrl']));

        await this.contentStore.addPipelineItem(title, originalUrl, 'Inspiration');
        saved++;
        logger.info(`💾 Saved: ${title.slice(0, 50)}...`);
      } catch (error) {
        logger.warn(`⚠️ Error saving inspiration post: ${errorMessage(error)}`);
      }
    }

    return { found: posts.length, saved };
  }
}
