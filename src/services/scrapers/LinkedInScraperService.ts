import { logger } from '../../config/logger';
import { Clock, LinkedInPostInput, Platform, ProfileStats } from '../../types';
import { ConfigurationError, errorMessage } from '../../utils/errors';
import { UnknownRecord } from '../../utils/records';
import { MetricsStoreService } from '../MetricsStoreService';
import { ActorRunner } from './ApifyClient';
import { flattenProfilePosts, linkedInProfileStats, normalizeLinkedInPost } from './normalize';

export interface LinkedInScraperOptions {
  profileUrl: string;
  postsActor: string;
  profileActor: string;
}

export class LinkedInScraperService {
  constructor(
    private readonly apify: ActorRunner,
    private readonly store: MetricsStoreService,
    private readonly options: LinkedInScraperOptions,
    private readonly now: Clock = () => new Date()
  ) {}

  /**
   * Scrape the configured profile's posts with metrics. Returns an empty list
   * when the actor run fails.
   */
  async scrapePosts(maxPosts: number = 50): Promise<LinkedInPostInput[]> {
    if (!this.options.profileUrl) {
      throw new ConfigurationError('LINKEDIN_PROFILE_URL not configured');
    }

    try {
      const items = await this.apify.runActor(this.options.postsActor, {
        profileUrls: [this.options.profileUrl],
        maxPosts,
        includeMetrics: true,
      });
      return items.map((item) => normalizeLinkedInPost(item, this.now));
    } catch (error) {
      logger.error(`❌ Error scraping LinkedIn: ${errorMessage(error)}`);
      return [];
    }
  }

  async scrapeProfileStats(): Promise<ProfileStats> {
    try {
      const items = await this.apify.runActor(this.options.profileActor, {
        profileUrls: [this.options.profileUrl],
        scrapeCompanyData: false,
      });
      if (items.length > 0) {
        return linkedInProfileStats(items[0]);
      }
    } catch (error) {
      logger.error(`❌ Error scraping LinkedIn profile stats: ${errorMessage(error)}`);
    }

    return { followers: 0, following: 0 };
  }

  /**
   * Upsert posts (scraping first when none are given) and record one
   * follower snapshot. A post that fails to save is logged and skipped.
   */
  async saveToDatabase(posts?: LinkedInPostInput[]): Promise<number> {
    const records = posts ?? (await this.scrapePosts());

    let saved = 0;
    for (const post of records) {
      try {
        await this.store.upsertLinkedInPost(post);
        saved++;
      } catch (error) {
        logger.warn(`⚠️ Error saving LinkedIn post ${post.postId}: ${errorMessage(error)}`);
      }
    }

    try {
      const stats = await this.scrapeProfileStats();
      await this.store.addFollowerSnapshot(Platform.LINKEDIN, stats.followers, stats.following);
    } catch (error) {
      logger.error(`❌ Error saving LinkedIn follower stats: ${errorMessage(error)}`);
    }

    logger.info(`✅ Saved ${saved}/${records.length} LinkedIn posts`);
    return saved;
  }

  /**
   * Raw posts from any profile, for the inspiration pipeline. Actor failures
   * propagate.
   */
  async fetchInspirationPosts(profileUrl: string, maxPosts: number = 20): Promise<UnknownRecord[]> {
    const items = await this.apify.runActor(this.options.profileActor, {
      profileUrls: [profileUrl],
      maxPostCount: maxPosts,
      scrapeCompanyData: false,
      scrapeContactInfo: false,
    });
    return flattenProfilePosts(items);
  }
}
