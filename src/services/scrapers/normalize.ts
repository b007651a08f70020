import { createHash } from 'crypto';
import { Clock, LinkedInPostInput, ProfileStats, TwitterPostInput } from '../../types';
import { UnknownRecord, isRecord, readField, toCount, toText } from '../../utils/records';

/**
 * Apify actors disagree on field names between versions, so every field is
 * read through a list of known aliases.
 */

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
// "Wed Oct 10 20:19:24 +0000 2018"
const LEGACY_TWITTER_DATE = /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

function parseLegacyTwitterDate(value: string): Date | null {
  const match = LEGACY_TWITTER_DATE.exec(value);
  if (!match) {
    return null;
  }
  const [, monthName, day, hours, minutes, seconds, sign, offsetHours, offsetMinutes, year] = match;
  const month = MONTHS.indexOf(monthName);
  if (month < 0) {
    return null;
  }

  const offset = (Number(offsetHours) * 60 + Number(offsetMinutes)) * (sign === '-' ? -1 : 1);
  const utc = Date.UTC(Number(year), month, Number(day), Number(hours), Number(minutes), Number(seconds));
  return new Date(utc - offset * 60000);
}

/**
 * Parse a post timestamp. Missing values give null; values in an unknown
 * format fall back to the current time.
 */
export function parsePostDate(value: unknown, now: Clock): Date | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : now();
  }
  if (typeof value !== 'string') {
    return now();
  }

  const trimmed = value.trim();
  if (ISO_DATE.test(trimmed)) {
    const parsed = new Date(trimmed);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  return parseLegacyTwitterDate(trimmed) ?? now();
}

// Stable id for posts the actor returned without one
export function fallbackPostId(text: string): string {
  return createHash('sha1').update(text.slice(0, 50)).digest('hex').slice(0, 16);
}

export function normalizeLinkedInPost(raw: UnknownRecord, now: Clock): LinkedInPostInput {
  const content = toText(readField(raw, ['text', 'content']));

  return {
    postId: toText(readField(raw, ['postId', 'id'])) || fallbackPostId(toText(raw.text) ?? ''),
    url: toText(readField(raw, ['postUrl', 'url'])),
    content,
    datePosted: parsePostDate(readField(raw, ['postedAt', 'date']), now),
    views: toCount(readField(raw, ['views', 'impressions'])),
    likes: toCount(readField(raw, ['likes', 'reactions'])),
    comments: toCount(readField(raw, ['comments', 'commentCount'])),
    reposts: toCount(readField(raw, ['reposts', 'shares'])),
  };
}

export function normalizeTweet(raw: UnknownRecord, username: string, now: Clock): TwitterPostInput {
  const tweetId = toText(readField(raw, ['id', 'tweetId'])) ?? '';

  return {
    tweetId,
    url: toText(readField(raw, ['url'])) ?? `https://twitter.com/${username}/status/${tweetId}`,
    content: toText(readField(raw, ['text', 'fullText'])),
    datePosted: parsePostDate(readField(raw, ['createdAt', 'date']), now),
    views: toCount(readField(raw, ['viewCount', 'views'])),
    likes: toCount(readField(raw, ['likeCount', 'favoriteCount'])),
    retweets: toCount(readField(raw, ['retweetCount', 'retweets'])),
    replies: toCount(readField(raw, ['replyCount', 'replies'])),
    quotes: toCount(readField(raw, ['quoteCount', 'quotes'])),
  };
}

export function linkedInProfileStats(raw: UnknownRecord): ProfileStats {
  return {
    followers: toCount(readField(raw, ['followersCount', 'followers'])),
    following: toCount(readField(raw, ['connectionsCount', 'connections'])),
  };
}

// Tweet items nest the profile under `author`
export function twitterProfileStats(raw: UnknownRecord): ProfileStats {
  const author = isRecord(raw.author) ? raw.author : raw;
  return {
    followers: toCount(readField(author, ['followersCount', 'followers'])),
    following: toCount(readField(author, ['followingCount', 'following'])),
  };
}

/**
 * Profile-scraper items either carry a `posts` array or are posts themselves.
 */
export function flattenProfilePosts(items: UnknownRecord[]): UnknownRecord[] {
  const posts: UnknownRecord[] = [];
  for (const item of items) {
    if (Array.isArray(item.posts)) {
      posts.push(...item.posts.filter(isRecord));
    } else if ('text' in item) {
      posts.push(item);
    }
  }
  return posts;
}

export function extractPostTitle(content: string | null, maxLength: number = 100): string {
  if (!content) {
    return 'Untitled Post';
  }

  const firstLine = content.split('\n')[0].trim();
  if (firstLine.length > maxLength) {
    return `${firstLine.slice(0, maxLength)}...`;
  }
  return firstLine || `${content.slice(0, maxLength)}...`;
}
