import {
  CombinedTopPost,
  FollowerHistoryRow,
  ImpressionsHistoryRow,
  LeaderboardSort,
  Platform,
  PlatformFilter,
  PlatformLabel,
} from '../types';

/**
 * Pure reshaping helpers behind the dashboard endpoints. Nothing here touches
 * the database; inputs are whatever MetricsStoreService returned.
 */

interface PostBase {
  content: string | null;
  url: string | null;
  views: number;
  likes: number;
  datePosted: Date | null;
}

export interface LinkedInPostFields extends PostBase {
  comments: number;
  reposts: number;
}

export interface TwitterPostFields extends PostBase {
  retweets: number;
  replies: number;
  quotes: number;
}

export interface LeaderboardEntry extends CombinedTopPost {
  rank: number;
}

export interface FollowerPoint {
  date: string;
  platform: string;
  followers: number;
}

export interface ImpressionPoint {
  date: string;
  platform: string;
  views: number;
}

export interface ImpressionsSeries {
  source: 'impressions' | 'posts' | 'none';
  points: ImpressionPoint[];
}

export interface RecentPostSummary {
  title: string;
  url: string | null;
  views: number;
  likes: number;
  datePosted: Date | null;
}

const PLATFORM_LABELS: Record<Platform, PlatformLabel> = {
  [Platform.LINKEDIN]: 'LinkedIn',
  [Platform.TWITTER]: 'Twitter',
};

const PLATFORM_TAGS: Record<PlatformLabel, Platform> = {
  LinkedIn: Platform.LINKEDIN,
  Twitter: Platform.TWITTER,
};

export const CONTENT_PREVIEW_LENGTH = 100;
export const RECENT_PREVIEW_LENGTH = 50;

export function linkedInEngagement(post: Pick<LinkedInPostFields, 'likes' | 'comments' | 'reposts'>): number {
  return (post.likes || 0) + (post.comments || 0) + (post.reposts || 0);
}

export function twitterEngagement(
  post: Pick<TwitterPostFields, 'likes' | 'retweets' | 'replies' | 'quotes'>
): number {
  return (post.likes || 0) + (post.retweets || 0) + (post.replies || 0) + (post.quotes || 0);
}

export function truncateContent(text: string | null, maxLength: number = CONTENT_PREVIEW_LENGTH): string | null {
  if (text && text.length > maxLength) {
    return `${text.slice(0, maxLength)}...`;
  }
  return text;
}

/**
 * Merge both platforms' leaderboards, re-rank by views and cut to `limit`.
 * Each input is expected to be already truncated to `limit`, so a platform
 * whose posts fall outside the merged top `limit` can be under-represented.
 */
export function mergeTopPosts(
  linkedinPosts: LinkedInPostFields[],
  twitterPosts: TwitterPostFields[],
  limit: number
): CombinedTopPost[] {
  const rows: CombinedTopPost[] = [
    ...linkedinPosts.map((post) => toCombinedRow('LinkedIn', post, linkedInEngagement(post))),
    ...twitterPosts.map((post) => toCombinedRow('Twitter', post, twitterEngagement(post))),
  ];

  // Array.prototype.sort is stable: equal views keep LinkedIn-then-Twitter order
  return rows.sort((a, b) => b.views - a.views).slice(0, Math.max(0, limit));
}

function toCombinedRow(platform: PlatformLabel, post: PostBase, engagement: number): CombinedTopPost {
  return {
    platform,
    content: truncateContent(post.content),
    url: post.url,
    views: post.views || 0,
    likes: post.likes || 0,
    date: post.datePosted,
    engagement,
  };
}

export function buildLeaderboard(
  rows: CombinedTopPost[],
  platformFilter: PlatformFilter,
  sortBy: LeaderboardSort,
  top: number = 10
): LeaderboardEntry[] {
  return rows
    .filter((row) => platformFilter === 'All' || row.platform === platformFilter)
    .sort((a, b) => b[sortBy] - a[sortBy])
    .slice(0, top)
    .map((row, index) => ({ rank: index + 1, ...row }));
}

export function toPlatformTag(filter: PlatformFilter): Platform | undefined {
  return filter === 'All' ? undefined : PLATFORM_TAGS[filter];
}

export function platformLabel(tag: string): string {
  const match = Object.values(Platform).find((platform) => platform === tag);
  return match ? PLATFORM_LABELS[match] : tag;
}

// History comes back newest first; charts want oldest first
export function buildFollowerSeries(history: FollowerHistoryRow[]): FollowerPoint[] {
  return [...history]
    .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime())
    .map((row) => ({
      date: row.recordedAt.toISOString(),
      platform: platformLabel(row.platform),
      followers: row.followerCount,
    }));
}

/**
 * Daily views per platform. Uses the stored impression aggregates when there
 * are any, otherwise sums post views per (UTC day, platform).
 */
export function buildImpressionsSeries(
  impressions: ImpressionsHistoryRow[],
  linkedinPosts: PostBase[],
  twitterPosts: PostBase[],
  platformFilter: PlatformFilter
): ImpressionsSeries {
  if (impressions.length > 0) {
    const points = sumByDay(
      impressions.map((row) => ({
        date: toDay(row.date),
        platform: platformLabel(row.platform),
        views: row.totalImpressions,
      }))
    );
    return { source: 'impressions', points: filterPoints(points, platformFilter) };
  }

  const fromPosts: ImpressionPoint[] = [];
  const collect = (platform: PlatformLabel, posts: PostBase[]): void => {
    for (const post of posts) {
      if (post.datePosted) {
        fromPosts.push({ date: toDay(post.datePosted), platform, views: post.views || 0 });
      }
    }
  };
  collect('LinkedIn', linkedinPosts);
  collect('Twitter', twitterPosts);

  if (fromPosts.length === 0) {
    return { source: 'none', points: [] };
  }

  return { source: 'posts', points: filterPoints(sumByDay(fromPosts), platformFilter) };
}

export function summarizeRecentPosts(
  posts: PostBase[],
  limit: number = 5,
  placeholder: string = 'Post'
): RecentPostSummary[] {
  return posts.slice(0, limit).map((post) => ({
    title: `${post.content ? post.content.slice(0, RECENT_PREVIEW_LENGTH) : placeholder}...`,
    url: post.url,
    views: post.views || 0,
    likes: post.likes || 0,
    datePosted: post.datePosted,
  }));
}

function toDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function sumByDay(points: ImpressionPoint[]): ImpressionPoint[] {
  const totals = new Map<string, ImpressionPoint>();
  for (const point of points) {
    const key = `${point.date}|${point.platform}`;
    const existing = totals.get(key);
    if (existing) {
      existing.views += point.views;
    } else {
      totals.set(key, { ...point });
    }
  }
  return [...totals.values()].sort(
    (a, b) => a.date.localeCompare(b.date) || a.platform.localeCompare(b.platform)
  );
}

function filterPoints(points: ImpressionPoint[], platformFilter: PlatformFilter): ImpressionPoint[] {
  return platformFilter === 'All' ? points : points.filter((point) => point.platform === platformFilter);
}
