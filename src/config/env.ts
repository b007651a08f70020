import dotenv from 'dotenv';
import Joi from 'joi';
import { ConfigurationError } from '../utils/errors';

// Load environment variables
dotenv.config();

export type ContentBackend = 'database' | 'notion';
export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface RawEnv {
  DATABASE_URL: string;
  DB_POOL_SIZE: number;
  DB_MAX_OVERFLOW: number;
  DB_POOL_TIMEOUT_MS: number;
  DB_POOL_RECYCLE_SECONDS: number;
  DB_SYNCHRONIZE: boolean;
  DB_LOGGING: boolean;
  DB_SSL: boolean;

  API_HOST: string;
  API_PORT: number;
  NODE_ENV: NodeEnv;
  ALLOWED_ORIGINS: string;

  APIFY_API_TOKEN: string;
  LINKEDIN_PROFILE_URL: string;
  TWITTER_USERNAME: string;
  APIFY_LINKEDIN_POSTS_ACTOR: string;
  APIFY_LINKEDIN_PROFILE_ACTOR: string;
  APIFY_TWITTER_ACTOR: string;

  ANTHROPIC_API_KEY: string;
  ANTHROPIC_MODEL: string;
  DRAFT_STYLE: string;

  CONTENT_BACKEND: ContentBackend;
  NOTION_TOKEN: string;
  PIPELINE_DB_ID: string;
  TWITTER_CALENDAR_DB_ID: string;

  LOG_LEVEL: LogLevel;
  LOG_FILE: string;
}

// Define environment schema
const envSchema = Joi.object<RawEnv>({
  // Database
  DATABASE_URL: Joi.string().required(),
  DB_POOL_SIZE: Joi.number().integer().min(1).default(5),
  DB_MAX_OVERFLOW: Joi.number().integer().min(0).default(10),
  DB_POOL_TIMEOUT_MS: Joi.number().integer().min(0).default(30000),
  DB_POOL_RECYCLE_SECONDS: Joi.number().integer().min(0).default(1800),
  DB_SYNCHRONIZE: Joi.boolean().default(true),
  DB_LOGGING: Joi.boolean().default(false),
  DB_SSL: Joi.boolean().default(false),

  // API
  API_HOST: Joi.string().default('0.0.0.0'),
  API_PORT: Joi.number().port().default(8000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  ALLOWED_ORIGINS: Joi.string().default('http://localhost:3000'),

  // Scraping (Apify)
  APIFY_API_TOKEN: Joi.string().allow('').default(''),
  LINKEDIN_PROFILE_URL: Joi.string().allow('').default(''),
  TWITTER_USERNAME: Joi.string().allow('').default(''),
  APIFY_LINKEDIN_POSTS_ACTOR: Joi.string().default('curious_coder/linkedin-post-scraper'),
  APIFY_LINKEDIN_PROFILE_ACTOR: Joi.string().default('anchor/linkedin-profile-scraper'),
  APIFY_TWITTER_ACTOR: Joi.string().default('apidojo/tweet-scraper'),

  // AI
  ANTHROPIC_API_KEY: Joi.string().allow('').default(''),
  ANTHROPIC_MODEL: Joi.string().default('claude-3-5-sonnet-20241022'),
  DRAFT_STYLE: Joi.string().default('professional'),

  // Content workflow backend
  CONTENT_BACKEND: Joi.string().valid('database', 'notion').default('database'),
  NOTION_TOKEN: Joi.string().allow('').default(''),
  PIPELINE_DB_ID: Joi.string().allow('').default(''),
  TWITTER_CALENDAR_DB_ID: Joi.string().allow('').default(''),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),
  LOG_FILE: Joi.string().allow('').default(''),
}).unknown();

export interface AppConfig {
  database: {
    url: string;
    poolSize: number;
    maxOverflow: number;
    poolTimeoutMs: number;
    recycleSeconds: number;
    synchronize: boolean;
    logging: boolean;
    ssl: boolean;
  };
  api: {
    host: string;
    port: number;
    nodeEnv: NodeEnv;
    allowedOrigins: string[];
  };
  scraping: {
    apifyToken: string;
    linkedinProfileUrl: string;
    twitterUsername: string;
    actors: {
      linkedinPosts: string;
      linkedinProfile: string;
      twitter: string;
    };
  };
  ai: {
    anthropicApiKey: string;
    model: string;
    draftStyle: string;
  };
  content: {
    backend: ContentBackend;
    notion: {
      token: string;
      pipelineDatabaseId: string;
      calendarDatabaseId: string;
    };
  };
  logging: {
    level: LogLevel;
    file: string;
  };
}

/**
 * Build the application configuration once at process start. Throws a
 * ConfigurationError when a required value is missing.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value: envVars } = envSchema.validate(source, { abortEarly: false });

  if (error || !envVars) {
    throw new ConfigurationError(`Config validation error: ${error?.message ?? 'no values'}`);
  }

  if (envVars.CONTENT_BACKEND === 'notion') {
    const missing = (['NOTION_TOKEN', 'PIPELINE_DB_ID', 'TWITTER_CALENDAR_DB_ID'] as const).filter(
      (key) => !envVars[key]
    );
    if (missing.length > 0) {
      throw new ConfigurationError(`CONTENT_BACKEND=notion requires ${missing.join(', ')}`);
    }
  }

  return {
    database: {
      url: envVars.DATABASE_URL,
      poolSize: envVars.DB_POOL_SIZE,
      maxOverflow: envVars.DB_MAX_OVERFLOW,
      poolTimeoutMs: envVars.DB_POOL_TIMEOUT_MS,
      recycleSeconds: envVars.DB_POOL_RECYCLE_SECONDS,
      synchronize: envVars.DB_SYNCHRONIZE,
      logging: envVars.DB_LOGGING,
      ssl: envVars.DB_SSL,
    },
    api: {
      host: envVars.API_HOST,
      port: envVars.API_PORT,
      nodeEnv: envVars.NODE_ENV,
      allowedOrigins: envVars.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    scraping: {
      apifyToken: envVars.APIFY_API_TOKEN,
      linkedinProfileUrl: envVars.LINKEDIN_PROFILE_URL,
      twitterUsername: envVars.TWITTER_USERNAME,
      actors: {
        linkedinPosts: envVars.APIFY_LINKEDIN_POSTS_ACTOR,
        linkedinProfile: envVars.APIFY_LINKEDIN_PROFILE_ACTOR,
        twitter: envVars.APIFY_TWITTER_ACTOR,
      },
    },
    ai: {
      anthropicApiKey: envVars.ANTHROPIC_API_KEY,
      model: envVars.ANTHROPIC_MODEL,
      draftStyle: envVars.DRAFT_STYLE,
    },
    content: {
      backend: envVars.CONTENT_BACKEND,
      notion: {
        token: envVars.NOTION_TOKEN,
        pipelineDatabaseId: envVars.PIPELINE_DB_ID,
        calendarDatabaseId: envVars.TWITTER_CALENDAR_DB_ID,
      },
    },
    logging: {
      level: envVars.LOG_LEVEL,
      file: envVars.LOG_FILE,
    },
  };
}
