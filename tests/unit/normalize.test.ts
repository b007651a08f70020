import {
  extractPostTitle,
  fallbackPostId,
  flattenProfilePosts,
  linkedInProfileStats,
  normalizeLinkedInPost,
  normalizeTweet,
  parsePostDate,
  twitterProfileStats,
} from '../../src/services/scrapers/normalize';

const NOW = new Date('2024-03-10T12:00:00.000Z');
const now = () => NOW;

describe('normalize', () => {
  describe('parsePostDate', () => {
    it('should parse ISO timestamps', () => {
      expect(parsePostDate('2024-03-01T10:00:00Z', now)).toEqual(new Date('2024-03-01T10:00:00.000Z'));
      expect(parsePostDate('2024-03-01T10:00:00.250+01:00', now)).toEqual(new Date('2024-03-01T09:00:00.250Z'));
    });

    it('should parse the legacy Twitter format with its offset', () => {
      expect(parsePostDate('Wed Oct 10 20:19:24 +0000 2018', now)).toEqual(new Date('2018-10-10T20:19:24.000Z'));
      expect(parsePostDate('Wed Oct 10 22:19:24 +0200 2018', now)).toEqual(new Date('2018-10-10T20:19:24.000Z'));
    });

    it('should treat epoch numbers as milliseconds', () => {
      expect(parsePostDate(1700000000000, now)).toEqual(new Date(1700000000000));
    });

    it('should return null for missing values and now for unreadable ones', () => {
      expect(parsePostDate(undefined, now)).toBeNull();
      expect(parsePostDate('', now)).toBeNull();
      expect(parsePostDate('3 days ago', now)).toBe(NOW);
      expect(parsePostDate({ when: 'later' }, now)).toBe(NOW);
    });
  });

  describe('normalizeLinkedInPost', () => {
    it('should read aliased fields and numeric strings', () => {
      const post = normalizeLinkedInPost(
        {
          id: 'urn:li:activity:1',
          url: 'https://www.linkedin.com/feed/update/urn:li:activity:1',
          text: 'Hiring update',
          postedAt: '2024-03-01T10:00:00Z',
          impressions: '1,204',
          reactions: 12,
          commentCount: 3,
          shares: 2,
        },
        now
      );

      expect(post).toEqual({
        postId: 'urn:li:activity:1',
        url: 'https://www.linkedin.com/feed/update/urn:li:activity:1',
        content: 'Hiring update',
        datePosted: new Date('2024-03-01T10:00:00.000Z'),
        views: 1204,
        likes: 12,
        comments: 3,
        reposts: 2,
      });
    });

    it('should derive a stable id from the text when none is given', () => {
      const first = normalizeLinkedInPost({ text: 'A post without an id' }, now);
      const second = normalizeLinkedInPost({ text: 'A post without an id' }, now);

      expect(first.postId).toMatch(/^[0-9a-f]{16}$/);
      expect(first.postId).toBe(second.postId);
      expect(first.postId).toBe(fallbackPostId('A post without an id'));
      expect(first.views).toBe(0);
      expect(first.datePosted).toBeNull();
    });
  });

  describe('normalizeTweet', () => {
    it('should build the status url from the username when missing', () => {
      const tweet = normalizeTweet(
        {
          id: 12345,
          fullText: 'Shipping today',
          createdAt: 'Wed Oct 10 20:19:24 +0000 2018',
          viewCount: 900,
          likeCount: '40',
          retweetCount: 5,
          replyCount: 2,
          quoteCount: 1,
        },
        'someone',
        now
      );

      expect(tweet).toEqual({
        tweetId: '12345',
        url: 'https://twitter.com/someone/status/12345',
        content: 'Shipping today',
        datePosted: new Date('2018-10-10T20:19:24.000Z'),
        views: 900,
        likes: 40,
        retweets: 5,
        replies: 2,
        quotes: 1,
      });
    });

    it('should leave the id empty when the item has none', () => {
      expect(normalizeTweet({ text: 'orphan' }, 'someone', now).tweetId).toBe('');
    });
  });

  describe('profile stats', () => {
    it('should read LinkedIn followers and connections', () => {
      expect(linkedInProfileStats({ followersCount: '2,500', connections: 400 })).toEqual({
        followers: 2500,
        following: 400,
      });
    });

    it('should read Twitter counts from the tweet author', () => {
      expect(twitterProfileStats({ id: '1', author: { followers: 120, following: 30 } })).toEqual({
        followers: 120,
        following: 30,
      });
      expect(twitterProfileStats({ followersCount: 7 })).toEqual({ followers: 7, following: 0 });
    });
  });

  describe('flattenProfilePosts', () => {
    it('should unwrap nested posts and keep bare post items', () => {
      const posts = flattenProfilePosts([
        { name: 'Profile', posts: [{ text: 'nested' }, 'not a post'] },
        { text: 'bare' },
        { name: 'No posts here' },
      ]);

      expect(posts).toEqual([{ text: 'nested' }, { text: 'bare' }]);
    });
  });

  describe('extractPostTitle', () => {
    it('should use the first line of the post', () => {
      expect(extractPostTitle('  Big news  \nMore details below')).toBe('Big news');
      expect(extractPostTitle('x'.repeat(120))).toBe(`${'x'.repeat(100)}...`);
    });

    it('should fall back when the first line is empty', () => {
      expect(extractPostTitle(null)).toBe('Untitled Post');
      expect(extractPostTitle('\nSecond line')).toBe('\nSecond line...');
    });
  });
});
