import { CombinedTopPost } from '../../src/types';
import {
  buildFollowerSeries,
  buildImpressionsSeries,
  buildLeaderboard,
  linkedInEngagement,
  mergeTopPosts,
  platformLabel,
  summarizeRecentPosts,
  toPlatformTag,
  truncateContent,
  twitterEngagement,
} from '../../src/utils/reporting';

const linkedInPost = (views: number, content: string | null = null, datePosted: Date | null = null) => ({
  content,
  url: null,
  views,
  likes: 1,
  comments: 1,
  reposts: 1,
  datePosted,
});

const tweet = (views: number, datePosted: Date | null = null) => ({
  content: null,
  url: null,
  views,
  likes: 2,
  retweets: 0,
  replies: 0,
  quotes: 0,
  datePosted,
});

const row = (platform: 'LinkedIn' | 'Twitter', views: number, likes: number, engagement: number): CombinedTopPost => ({
  platform,
  content: null,
  url: null,
  views,
  likes,
  date: null,
  engagement,
});

describe('reporting', () => {
  describe('engagement', () => {
    it('should sum the non-view counters of each platform', () => {
      expect(linkedInEngagement({ likes: 5, comments: 2, reposts: 1 })).toBe(8);
      expect(twitterEngagement({ likes: 20, retweets: 10, replies: 3, quotes: 1 })).toBe(34);
    });
  });

  describe('truncateContent', () => {
    it('should cut long text to 100 characters plus an ellipsis', () => {
      expect(truncateContent('a'.repeat(101))).toBe(`${'a'.repeat(100)}...`);
      expect(truncateContent('a'.repeat(100))).toBe('a'.repeat(100));
      expect(truncateContent(null)).toBeNull();
    });
  });

  describe('mergeTopPosts', () => {
    it('should keep LinkedIn first when views tie', () => {
      const rows = mergeTopPosts([linkedInPost(50)], [tweet(50), tweet(70)], 10);

      expect(rows.map((entry) => [entry.platform, entry.views])).toEqual([
        ['Twitter', 70],
        ['LinkedIn', 50],
        ['Twitter', 50],
      ]);
      expect(rows[1].engagement).toBe(3);
      expect(rows[0].engagement).toBe(2);
    });

    it('should truncate the merged list to the limit', () => {
      expect(mergeTopPosts([linkedInPost(1), linkedInPost(2)], [tweet(3)], 2)).toHaveLength(2);
      expect(mergeTopPosts([linkedInPost(1)], [], 0)).toEqual([]);
    });
  });

  describe('buildLeaderboard', () => {
    const rows = [row('LinkedIn', 100, 5, 8), row('Twitter', 90, 20, 34), row('LinkedIn', 40, 30, 31)];

    it('should sort by the requested column and rank from one', () => {
      const board = buildLeaderboard(rows, 'All', 'engagement');
      expect(board.map((entry) => [entry.rank, entry.engagement])).toEqual([
        [1, 34],
        [2, 31],
        [3, 8],
      ]);
    });

    it('should filter by platform before ranking', () => {
      const board = buildLeaderboard(rows, 'LinkedIn', 'likes', 1);
      expect(board).toEqual([{ rank: 1, ...row('LinkedIn', 40, 30, 31) }]);
    });

    it('should return nothing when the platform has no rows', () => {
      expect(buildLeaderboard([row('LinkedIn', 1, 1, 1)], 'Twitter', 'views')).toEqual([]);
    });
  });

  describe('platform names', () => {
    it('should translate between filters, tags and labels', () => {
      expect(toPlatformTag('All')).toBeUndefined();
      expect(toPlatformTag('Twitter')).toBe('twitter');
      expect(platformLabel('linkedin')).toBe('LinkedIn');
      expect(platformLabel('mastodon')).toBe('mastodon');
    });
  });

  describe('buildFollowerSeries', () => {
    it('should order points oldest first with display labels', () => {
      const series = buildFollowerSeries([
        { platform: 'twitter', followerCount: 90, followingCount: 0, recordedAt: new Date('2024-03-02T00:00:00Z') },
        { platform: 'linkedin', followerCount: 500, followingCount: 0, recordedAt: new Date('2024-03-01T00:00:00Z') },
      ]);

      expect(series).toEqual([
        { date: '2024-03-01T00:00:00.000Z', platform: 'LinkedIn', followers: 500 },
        { date: '2024-03-02T00:00:00.000Z', platform: 'Twitter', followers: 90 },
      ]);
    });
  });

  describe('buildImpressionsSeries', () => {
    it('should use stored impressions when there are any', () => {
      const recordedAt = new Date('2024-03-05T00:00:00Z');
      const series = buildImpressionsSeries(
        [
          { platform: 'linkedin', date: new Date('2024-03-02T00:00:00Z'), totalImpressions: 100, totalEngagements: 0, recordedAt },
          { platform: 'linkedin', date: new Date('2024-03-02T00:00:00Z'), totalImpressions: 50, totalEngagements: 0, recordedAt },
          { platform: 'twitter', date: new Date('2024-03-01T00:00:00Z'), totalImpressions: 30, totalEngagements: 0, recordedAt },
        ],
        [linkedInPost(999, null, new Date('2024-03-01T00:00:00Z'))],
        [],
        'All'
      );

      expect(series).toEqual({
        source: 'impressions',
        points: [
          { date: '2024-03-01', platform: 'Twitter', views: 30 },
          { date: '2024-03-02', platform: 'LinkedIn', views: 150 },
        ],
      });
    });

    it('should fall back to summed post views per day', () => {
      const series = buildImpressionsSeries(
        [],
        [
          linkedInPost(10, null, new Date('2024-03-01T08:00:00Z')),
          linkedInPost(15, null, new Date('2024-03-01T20:00:00Z')),
          linkedInPost(99),
        ],
        [tweet(7, new Date('2024-03-01T12:00:00Z'))],
        'LinkedIn'
      );

      expect(series).toEqual({
        source: 'posts',
        points: [{ date: '2024-03-01', platform: 'LinkedIn', views: 25 }],
      });
    });

    it('should report no data when no post has a date', () => {
      expect(buildImpressionsSeries([], [linkedInPost(10)], [tweet(3)], 'All')).toEqual({ source: 'none', points: [] });
    });
  });

  describe('summarizeRecentPosts', () => {
    it('should title posts by their first 50 characters', () => {
      const long = 'b'.repeat(60);
      const summaries = summarizeRecentPosts([linkedInPost(4, long), linkedInPost(2)], 5, 'Tweet');

      expect(summaries.map((summary) => summary.title)).toEqual([`${'b'.repeat(50)}...`, 'Tweet...']);
    });
  });
});
