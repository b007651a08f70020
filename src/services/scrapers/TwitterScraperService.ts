import { logger } from '../../config/logger';
import { Clock, Platform, ProfileStats, TwitterPostInput } from '../../types';
import { ConfigurationError, errorMessage } from '../../utils/errors';
import { MetricsStoreService } from '../MetricsStoreService';
import { ActorRunner } from './ApifyClient';
import { normalizeTweet, twitterProfileStats } from './normalize';

export interface TwitterScraperOptions {
  username: string;
  actor: string;
}

export class TwitterScraperService {
  private readonly username: string;

  constructor(
    private readonly apify: ActorRunner,
    private readonly store: MetricsStoreService,
    private readonly options: TwitterScraperOptions,
    private readonly now: Clock = () => new Date()
  ) {
    this.username = options.username.replace(/@/g, '');
  }

  async scrapeTweets(maxTweets: number = 50): Promise<TwitterPostInput[]> {
    if (!this.username) {
      throw new ConfigurationError('TWITTER_USERNAME not configured');
    }

    try {
      const items = await this.apify.runActor(this.options.actor, {
        handles: [this.username],
        maxTweets,
        includeReplies: false,
        includeRetweets: false,
      });
      return items.map((item) => normalizeTweet(item, this.username, this.now));
    } catch (error) {
      logger.error(`❌ Error scraping Twitter: ${errorMessage(error)}`);
      return [];
    }
  }

  // One tweet is enough to read the author's counts
  async scrapeProfileStats(): Promise<ProfileStats> {
    try {
      const items = await this.apify.runActor(this.options.actor, {
        handles: [this.username],
        maxTweets: 1,
      });
      if (items.length > 0) {
        return twitterProfileStats(items[0]);
      }
    } catch (error) {
      logger.error(`❌ Error scraping Twitter profile stats: ${errorMessage(error)}`);
    }

    return { followers: 0, following: 0 };
  }

  async saveToDatabase(tweets?: TwitterPostInput[]): Promise<number> {
    const records = tweets ?? (await this.scrapeTweets());

    let saved = 0;
    for (const tweet of records) {
      try {
        await this.store.upsertTwitterPost(tweet);
        saved++;
      } catch (error) {
        logger.warn(`⚠️ Error saving tweet ${tweet.tweetId || '(no id)'}: ${errorMessage(error)}`);
      }
    }

    try {
      const stats = await this.scrapeProfileStats();
      await this.store.addFollowerSnapshot(Platform.TWITTER, stats.followers, stats.following);
    } catch (error) {
      logger.error(`❌ Error saving Twitter follower stats: ${errorMessage(error)}`);
    }

    logger.info(`✅ Saved ${saved}/${records.length} tweets`);
    return saved;
  }
}
