import { DataSource, FindOptionsOrder, Repository } from 'typeorm';
import { logger } from '../config/logger';
import { LinkedInPost } from '../models/LinkedInPost';
import { TwitterPost } from '../models/TwitterPost';
import { FollowerSnapshot } from '../models/FollowerSnapshot';
import { DailyImpression } from '../models/DailyImpression';
import {
  Clock,
  CombinedTopPost,
  FollowerHistoryRow,
  ImpressionsHistoryRow,
  LINKEDIN_METRICS,
  LinkedInPostInput,
  StatsSummary,
  TWITTER_METRICS,
  TwitterPostInput,
} from '../types';
import { InvalidRecordError } from '../utils/errors';
import { mergeTopPosts } from '../utils/reporting';

/**
 * Persistence gateway for scraped posts, follower snapshots and daily
 * impression aggregates. Aggregates (leaderboards, totals) are computed at
 * read time; nothing derived is stored.
 */
export class MetricsStoreService {
  private linkedinPosts: Repository<LinkedInPost>;
  private twitterPosts: Repository<TwitterPost>;
  private followerSnapshots: Repository<FollowerSnapshot>;
  private dailyImpressions: Repository<DailyImpression>;

  constructor(
    dataSource: DataSource,
    private readonly now: Clock = () => new Date()
  ) {
    this.linkedinPosts = dataSource.getRepository(LinkedInPost);
    this.twitterPosts = dataSource.getRepository(TwitterPost);
    this.followerSnapshots = dataSource.getRepository(FollowerSnapshot);
    this.dailyImpressions = dataSource.getRepository(DailyImpression);
  }

  // LinkedIn operations

  /**
   * Insert a post, or overwrite every non-null field of the existing row with
   * the same post id and refresh its scrape time.
   */
  async upsertLinkedInPost(input: LinkedInPostInput): Promise<LinkedInPost> {
    const postId = requireExternalId(input.postId, 'postId');

    const existing = await this.linkedinPosts.findOne({ where: { postId } });
    const post =
      existing ??
      this.linkedinPosts.create({
        postId,
        url: null,
        content: null,
        datePosted: null,
        views: 0,
        likes: 0,
        comments: 0,
        reposts: 0,
      });

    if (input.url != null) post.url = input.url;
    if (input.content != null) post.content = input.content;
    if (input.datePosted != null) post.datePosted = input.datePosted;
    if (input.views != null) post.views = input.views;
    if (input.likes != null) post.likes = input.likes;
    if (input.comments != null) post.comments = input.comments;
    if (input.reposts != null) post.reposts = input.reposts;
    post.scrapedAt = this.now();

    const saved = await this.linkedinPosts.save(post);
    logger.debug(`💾 ${existing ? 'Updated' : 'Inserted'} LinkedIn post ${postId}`);
    return saved;
  }

  async getLinkedInPosts(limit: number = 100): Promise<LinkedInPost[]> {
    return this.linkedinPosts.find({
      order: { datePosted: { direction: 'DESC', nulls: 'LAST' }, id: 'ASC' },
      take: limit,
    });
  }

  /**
   * Leaderboard by a counter column. Unknown metric names rank by views.
   */
  async getTopLinkedInPosts(metric: string = 'views', limit: number = 10): Promise<LinkedInPost[]> {
    const column = LINKEDIN_METRICS.find((candidate) => candidate === metric) ?? 'views';

    const order: FindOptionsOrder<LinkedInPost> = {};
    order[column] = 'DESC';
    order.id = 'ASC';

    return this.linkedinPosts.find({ order, take: limit });
  }

  // Twitter operations

  async upsertTwitterPost(input: TwitterPostInput): Promise<TwitterPost> {
    const tweetId = requireExternalId(input.tweetId, 'tweetId');

    const existing = await this.twitterPosts.findOne({ where: { tweetId } });
    const post =
      existing ??
      this.twitterPosts.create({
        tweetId,
        url: null,
        content: null,
        datePosted: null,
        views: 0,
        likes: 0,
        retweets: 0,
        replies: 0,
        quotes: 0,
      });

    if (input.url != null) post.url = input.url;
    if (input.content != null) post.content = input.content;
    if (input.datePosted != null) post.datePosted = input.datePosted;
    if (input.views != null) post.views = input.views;
    if (input.likes != null) post.likes = input.likes;
    if (input.retweets != null) post.retweets = input.retweets;
    if (input.replies != null) post.replies = input.replies;
    if (input.quotes != null) post.quotes = input.quotes;
    post.scrapedAt = this.now();

    const saved = await this.twitterPosts.save(post);
    logger.debug(`💾 ${existing ? 'Updated' : 'Inserted'} tweet ${tweetId}`);
    return saved;
  }

  async getTwitterPosts(limit: number = 100): Promise<TwitterPost[]> {
    return this.twitterPosts.find({
      order: { datePosted: { direction: 'DESC', nulls: 'LAST' }, id: 'ASC' },
      take: limit,
    });
  }

  async getTopTwitterPosts(metric: string = 'views', limit: number = 10): Promise<TwitterPost[]> {
    const column = TWITTER_METRICS.find((candidate) => candidate === metric) ?? 'views';

    const order: FindOptionsOrder<TwitterPost> = {};
    order[column] = 'DESC';
    order.id = 'ASC';

    return this.twitterPosts.find({ order, take: limit });
  }

  // Follower operations

  async addFollowerSnapshot(
    platform: string,
    followerCount: number,
    followingCount: number = 0
  ): Promise<FollowerSnapshot> {
    const snapshot = this.followerSnapshots.create({
      platform,
      followerCount,
      followingCount,
      recordedAt: this.now(),
    });
    const saved = await this.followerSnapshots.save(snapshot);
    logger.info(`📈 Recorded ${platform} follower snapshot: ${followerCount} followers`);
    return saved;
  }

  async getFollowerHistory(platform?: string): Promise<FollowerHistoryRow[]> {
    const snapshots = await this.followerSnapshots.find({
      where: platform ? { platform } : {},
      order: { recordedAt: 'DESC', id: 'DESC' },
    });

    return snapshots.map((snapshot) => ({
      platform: snapshot.platform,
      followerCount: snapshot.followerCount,
      followingCount: snapshot.followingCount,
      recordedAt: snapshot.recordedAt,
    }));
  }

  // Impressions operations

  async addDailyImpressions(
    platform: string,
    date: Date,
    totalImpressions: number,
    totalEngagements: number = 0
  ): Promise<DailyImpression> {
    const impression = this.dailyImpressions.create({
      platform,
      date,
      totalImpressions,
      totalEngagements,
      recordedAt: this.now(),
    });
    return this.dailyImpressions.save(impression);
  }

  async getImpressionsHistory(platform?: string): Promise<ImpressionsHistoryRow[]> {
    const impressions = await this.dailyImpressions.find({
      where: platform ? { platform } : {},
      order: { date: 'DESC', id: 'DESC' },
    });

    return impressions.map((impression) => ({
      platform: impression.platform,
      date: impression.date,
      totalImpressions: impression.totalImpressions,
      totalEngagements: impression.totalEngagements,
      recordedAt: impression.recordedAt,
    }));
  }

  // Analytics helpers

  async getCombinedTopPosts(limit: number = 10): Promise<CombinedTopPost[]> {
    const linkedinPosts = await this.getTopLinkedInPosts('views', limit);
    const twitterPosts = await this.getTopTwitterPosts('views', limit);
    return mergeTopPosts(linkedinPosts, twitterPosts, limit);
  }

  async getStatsSummary(): Promise<StatsSummary> {
    const linkedinCount = await this.linkedinPosts.count();
    const twitterCount = await this.twitterPosts.count();

    const linkedinViews = await this.linkedinPosts.find({ select: { id: true, views: true } });
    const twitterViews = await this.twitterPosts.find({ select: { id: true, views: true } });

    const totalLinkedinViews = linkedinViews.reduce((sum, post) => sum + (post.views || 0), 0);
    const totalTwitterViews = twitterViews.reduce((sum, post) => sum + (post.views || 0), 0);

    return {
      linkedinPosts: linkedinCount,
      twitterPosts: twitterCount,
      totalLinkedinViews,
      totalTwitterViews,
      totalPosts: linkedinCount + twitterCount,
      totalViews: totalLinkedinViews + totalTwitterViews,
    };
  }
}

function requireExternalId(value: string | null | undefined, field: string): string {
  const id = typeof value === 'string' ? value.trim() : '';
  if (!id) {
    throw new InvalidRecordError(`Post record is missing required ${field}`);
  }
  return id;
}
