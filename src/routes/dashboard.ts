import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { logger } from '../config/logger';
import { LinkedInPost } from '../models/LinkedInPost';
import { TwitterPost } from '../models/TwitterPost';
import { MetricsStoreService } from '../services/MetricsStoreService';
import { RefreshService } from '../services/RefreshService';
import { LeaderboardSort, Platform, PlatformFilter, PlatformLabel } from '../types';
import {
  buildFollowerSeries,
  buildImpressionsSeries,
  buildLeaderboard,
  summarizeRecentPosts,
  toPlatformTag,
} from '../utils/reporting';
import { sendError, sendSuccess, validate } from '../utils/http';

export interface DashboardRouteDeps {
  metrics: MetricsStoreService;
  refresh: RefreshService;
}

const PLATFORM_FILTERS: PlatformFilter[] = ['All', 'LinkedIn', 'Twitter'];
const PLATFORM_LABELS: PlatformLabel[] = ['LinkedIn', 'Twitter'];

// Post window used when impressions fall back to summed post views
const FALLBACK_POST_LIMIT = 500;

const EMPTY_POSTS_MESSAGE = 'No posts available. Run a refresh to scrape your profiles.';

const filterQuery = Joi.object<{ platform: PlatformFilter }>({
  platform: Joi.string()
    .valid(...PLATFORM_FILTERS)
    .default('All'),
});

const topPostsQuery = Joi.object<{
  platform: PlatformFilter;
  sortBy: LeaderboardSort;
  limit: number;
  top: number;
}>({
  platform: Joi.string()
    .valid(...PLATFORM_FILTERS)
    .default('All'),
  sortBy: Joi.string().valid('views', 'engagement', 'likes').default('views'),
  limit: Joi.number().integer().min(1).max(100).default(20),
  top: Joi.number().integer().min(1).max(100).default(10),
});

const postsQuery = Joi.object<{ platform: PlatformLabel; limit: number }>({
  platform: Joi.string()
    .valid(...PLATFORM_LABELS)
    .required(),
  limit: Joi.number().integer().min(1).max(500).default(100),
});

const rankedPostsQuery = Joi.object<{ platform: PlatformLabel; metric: string; limit: number }>({
  platform: Joi.string()
    .valid(...PLATFORM_LABELS)
    .required(),
  metric: Joi.string().default('views'),
  limit: Joi.number().integer().min(1).max(100).default(10),
});

const recentQuery = Joi.object<{ limit: number }>({
  limit: Joi.number().integer().min(1).max(50).default(5),
});

const followerSnapshotBody = Joi.object<{ platform: Platform; followerCount: number; followingCount: number }>({
  platform: Joi.string()
    .valid(...Object.values(Platform))
    .required(),
  followerCount: Joi.number().integer().min(0).required(),
  followingCount: Joi.number().integer().min(0).default(0),
});

const impressionsBody = Joi.object<{
  platform: Platform;
  date: Date;
  totalImpressions: number;
  totalEngagements: number;
}>({
  platform: Joi.string()
    .valid(...Object.values(Platform))
    .required(),
  date: Joi.date().iso().required(),
  totalImpressions: Joi.number().integer().min(0).required(),
  totalEngagements: Joi.number().integer().min(0).default(0),
});

export function createDashboardRoutes({ metrics, refresh }: DashboardRouteDeps): Router {
  const router = Router();

  /**
   * GET /api/dashboard/stats
   * Post counts and view totals per platform
   */
  router.get('/stats', async (req: Request, res: Response) => {
    try {
      const stats = await metrics.getStatsSummary();
      return sendSuccess(res, stats, stats.totalPosts === 0 ? EMPTY_POSTS_MESSAGE : undefined);
    } catch (error) {
      return sendError(res, error, 'Failed to load stats');
    }
  });

  /**
   * GET /api/dashboard/followers?platform=All|LinkedIn|Twitter
   */
  router.get('/followers', async (req: Request, res: Response) => {
    try {
      const { platform } = validate(filterQuery, req.query);
      const history = await metrics.getFollowerHistory(toPlatformTag(platform));

      return sendSuccess(
        res,
        { history, series: buildFollowerSeries(history) },
        history.length === 0 ? 'No follower data available. Run a refresh to scrape your profiles.' : undefined
      );
    } catch (error) {
      return sendError(res, error, 'Failed to load follower history');
    }
  });

  /**
   * POST /api/dashboard/followers
   * Record a follower snapshot by hand
   */
  router.post('/followers', async (req: Request, res: Response) => {
    try {
      const body = validate(followerSnapshotBody, req.body);
      const snapshot = await metrics.addFollowerSnapshot(body.platform, body.followerCount, body.followingCount);
      return sendSuccess(res, snapshot, 'Follower snapshot recorded', 201);
    } catch (error) {
      return sendError(res, error, 'Failed to record follower snapshot');
    }
  });

  /**
   * GET /api/dashboard/impressions?platform=All|LinkedIn|Twitter
   * Daily impressions, or summed post views when none were recorded
   */
  router.get('/impressions', async (req: Request, res: Response) => {
    try {
      const { platform } = validate(filterQuery, req.query);
      const impressions = await metrics.getImpressionsHistory(toPlatformTag(platform));

      let linkedinPosts: LinkedInPost[] = [];
      let twitterPosts: TwitterPost[] = [];
      if (impressions.length === 0) {
        linkedinPosts = await metrics.getLinkedInPosts(FALLBACK_POST_LIMIT);
        twitterPosts = await metrics.getTwitterPosts(FALLBACK_POST_LIMIT);
      }

      const series = buildImpressionsSeries(impressions, linkedinPosts, twitterPosts, platform);
      const message =
        series.source === 'posts'
          ? 'No daily impression data. Showing aggregated post views instead.'
          : series.source === 'none'
            ? 'No post data available.'
            : undefined;

      return sendSuccess(res, series, message);
    } catch (error) {
      return sendError(res, error, 'Failed to load impressions');
    }
  });

  /**
   * POST /api/dashboard/impressions
   * Record a daily impressions aggregate
   */
  router.post('/impressions', async (req: Request, res: Response) => {
    try {
      const body = validate(impressionsBody, req.body);
      const impression = await metrics.addDailyImpressions(
        body.platform,
        body.date,
        body.totalImpressions,
        body.totalEngagements
      );
      return sendSuccess(res, impression, 'Daily impressions recorded', 201);
    } catch (error) {
      return sendError(res, error, 'Failed to record impressions');
    }
  });

  /**
   * GET /api/dashboard/top-posts?platform=&sortBy=views|engagement|likes&limit=20&top=10
   * Combined leaderboard across both platforms
   */
  router.get('/top-posts', async (req: Request, res: Response) => {
    try {
      const query = validate(topPostsQuery, req.query);
      const rows = await metrics.getCombinedTopPosts(query.limit);
      const leaderboard = buildLeaderboard(rows, query.platform, query.sortBy, query.top);

      let message: string | undefined;
      if (rows.length === 0) {
        message = EMPTY_POSTS_MESSAGE;
      } else if (leaderboard.length === 0) {
        message = `No ${query.platform} posts available.`;
      }

      return sendSuccess(res, leaderboard, message);
    } catch (error) {
      return sendError(res, error, 'Failed to load top posts');
    }
  });

  /**
   * GET /api/dashboard/posts?platform=LinkedIn|Twitter&limit=100
   * Most recent posts of one platform
   */
  router.get('/posts', async (req: Request, res: Response) => {
    try {
      const { platform, limit } = validate(postsQuery, req.query);
      const posts =
        platform === 'LinkedIn' ? await metrics.getLinkedInPosts(limit) : await metrics.getTwitterPosts(limit);
      return sendSuccess(res, posts, posts.length === 0 ? EMPTY_POSTS_MESSAGE : undefined);
    } catch (error) {
      return sendError(res, error, 'Failed to load posts');
    }
  });

  /**
   * GET /api/dashboard/posts/top?platform=LinkedIn|Twitter&metric=likes&limit=10
   * Single-platform leaderboard by any counter column
   */
  router.get('/posts/top', async (req: Request, res: Response) => {
    try {
      const { platform, metric, limit } = validate(rankedPostsQuery, req.query);
      const posts =
        platform === 'LinkedIn'
          ? await metrics.getTopLinkedInPosts(metric, limit)
          : await metrics.getTopTwitterPosts(metric, limit);
      return sendSuccess(res, posts, posts.length === 0 ? EMPTY_POSTS_MESSAGE : undefined);
    } catch (error) {
      return sendError(res, error, 'Failed to load top posts');
    }
  });

  /**
   * GET /api/dashboard/recent-posts?limit=5
   */
  router.get('/recent-posts', async (req: Request, res: Response) => {
    try {
      const { limit } = validate(recentQuery, req.query);
      const linkedin = summarizeRecentPosts(await metrics.getLinkedInPosts(limit), limit, 'Post');
      const twitter = summarizeRecentPosts(await metrics.getTwitterPosts(limit), limit, 'Tweet');
      return sendSuccess(res, { linkedin, twitter });
    } catch (error) {
      return sendError(res, error, 'Failed to load recent posts');
    }
  });

  /**
   * POST /api/dashboard/refresh
   * Scrape both platforms and store the results
   */
  router.post('/refresh', async (req: Request, res: Response) => {
    try {
      logger.info('🔄 Dashboard refresh requested');
      const outcomes = await refresh.refreshAll();
      const message = outcomes
        .map((outcome) =>
          outcome.error
            ? `${outcome.platform} scraping error: ${outcome.error}`
            : `Saved ${outcome.saved} ${outcome.platform === 'LinkedIn' ? 'LinkedIn posts' : 'tweets'}`
        )
        .join('; ');
      return sendSuccess(res, outcomes, message);
    } catch (error) {
      return sendError(res, error, 'Failed to refresh data');
    }
  });

  return router;
}
