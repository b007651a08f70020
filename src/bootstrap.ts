import { DataSource } from 'typeorm';
import type { AppConfig } from './config/env';
import { Clock } from './types';
import { MetricsStoreService } from './services/MetricsStoreService';
import { ContentStore, createContentStore } from './services/content';
import { ActorRunner, ApifyClient } from './services/scrapers/ApifyClient';
import { LinkedInScraperService } from './services/scrapers/LinkedInScraperService';
import { TwitterScraperService } from './services/scrapers/TwitterScraperService';
import { DraftGenerator } from './services/ai/DraftGenerator';
import { AnthropicDraftGenerator } from './services/ai/AnthropicDraftGenerator';
import { DraftWorkflowService } from './services/DraftWorkflowService';
import { InspirationService } from './services/InspirationService';
import { RefreshService } from './services/RefreshService';

export interface Services {
  metrics: MetricsStoreService;
  contentStore: ContentStore;
  linkedin: LinkedInScraperService;
  twitter: TwitterScraperService;
  refresh: RefreshService;
  drafts: DraftWorkflowService;
  inspiration: InspirationService;
}

// Seams for tests and scripts; anything left out is built from config
export interface ServiceOverrides {
  apify?: ActorRunner;
  generator?: DraftGenerator;
  contentStore?: ContentStore;
  now?: Clock;
}

export function createServices(
  config: AppConfig,
  dataSource: DataSource,
  overrides: ServiceOverrides = {}
): Services {
  const now = overrides.now ?? (() => new Date());
  const { scraping, ai } = config;

  const metrics = new MetricsStoreService(dataSource, now);
  const contentStore = overrides.contentStore ?? createContentStore(config, dataSource, now);
  const apify = overrides.apify ?? new ApifyClient(scraping.apifyToken);
  const generator =
    overrides.generator ??
    new AnthropicDraftGenerator({ apiKey: ai.anthropicApiKey, model: ai.model, style: ai.draftStyle });

  const linkedin = new LinkedInScraperService(
    apify,
    metrics,
    {
      profileUrl: scraping.linkedinProfileUrl,
      postsActor: scraping.actors.linkedinPosts,
      profileActor: scraping.actors.linkedinProfile,
    },
    now
  );
  const twitter = new TwitterScraperService(
    apify,
    metrics,
    { username: scraping.twitterUsername, actor: scraping.actors.twitter },
    now
  );

  return {
    metrics,
    contentStore,
    linkedin,
    twitter,
    refresh: new RefreshService(linkedin, twitter),
    drafts: new DraftWorkflowService(contentStore, generator),
    inspiration: new InspirationService(linkedin, contentStore, scraping.linkedinProfileUrl),
  };
}
