// Platform tags as stored in follower_snapshots / daily_impressions
export enum Platform {
  LINKEDIN = 'linkedin',
  TWITTER = 'twitter',
}

// Labels used by the dashboard for rows and filters
export type PlatformLabel = 'LinkedIn' | 'Twitter';
export type PlatformFilter = 'All' | PlatformLabel;

export const PIPELINE_STATUSES = ['Inspiration', 'Drafted', 'Approved', 'Published'] as const;
export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

export const CALENDAR_STATUSES = ['Pending', 'Drafted'] as const;
export type CalendarStatus = (typeof CALENDAR_STATUSES)[number];

export const LINKEDIN_METRICS = ['views', 'likes', 'comments', 'reposts'] as const;

export const TWITTER_METRICS = ['views', 'likes', 'retweets', 'replies', 'quotes'] as const;

export type LeaderboardSort = 'views' | 'engagement' | 'likes';

export const MAX_DRAFT_LENGTH = 2000;

// Normalized scraper output; exactly what the upserts accept
export interface LinkedInPostInput {
  postId: string;
  url?: string | null;
  content?: string | null;
  datePosted?: Date | null;
  views?: number | null;
  likes?: number | null;
  comments?: number | null;
  reposts?: number | null;
}

export interface TwitterPostInput {
  tweetId: string;
  url?: string | null;
  content?: string | null;
  datePosted?: Date | null;
  views?: number | null;
  likes?: number | null;
  retweets?: number | null;
  replies?: number | null;
  quotes?: number | null;
}

export interface FollowerHistoryRow {
  platform: string;
  followerCount: number;
  followingCount: number;
  recordedAt: Date;
}

export interface ImpressionsHistoryRow {
  platform: string;
  date: Date;
  totalImpressions: number;
  totalEngagements: number;
  recordedAt: Date;
}

export interface CombinedTopPost {
  platform: PlatformLabel;
  content: string | null;
  url: string | null;
  views: number;
  likes: number;
  date: Date | null;
  engagement: number;
}

export interface StatsSummary {
  linkedinPosts: number;
  twitterPosts: number;
  totalLinkedinViews: number;
  totalTwitterViews: number;
  totalPosts: number;
  totalViews: number;
}

export interface ProfileStats {
  followers: number;
  following: number;
}

// Common API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
  timestamp: string;
}

// Injected time source so stored timestamps are deterministic under test
export type Clock = () => Date;
