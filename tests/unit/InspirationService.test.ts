import { DataSource } from 'typeorm';
import { DatabaseContentStore } from '../../src/services/content/DatabaseContentStore';
import { InspirationService } from '../../src/services/InspirationService';
import { MetricsStoreService } from '../../src/services/MetricsStoreService';
import { RefreshService } from '../../src/services/RefreshService';
import { LinkedInScraperService } from '../../src/services/scrapers/LinkedInScraperService';
import { TwitterScraperService } from '../../src/services/scrapers/TwitterScraperService';
import { ConfigurationError } from '../../src/utils/errors';
import { FakeActorRunner } from '../helpers/fakes';
import { createTestDataSource, steppingClock } from '../helpers/testDataSource';

const PROFILE_URL = 'https://www.linkedin.com/in/someone';

describe('InspirationService and RefreshService', () => {
  let dataSource: DataSource;
  let apify: FakeActorRunner;
  let metrics: MetricsStoreService;
  let contentStore: DatabaseContentStore;
  let linkedin: LinkedInScraperService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    apify = new FakeActorRunner();
    metrics = new MetricsStoreService(dataSource, steppingClock());
    contentStore = new DatabaseContentStore(dataSource, steppingClock());
    linkedin = new LinkedInScraperService(apify, metrics, {
      profileUrl: PROFILE_URL,
      postsActor: 'test/posts',
      profileActor: 'test/profile',
    });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('InspirationService', () => {
    it('should add each scraped post as an Inspiration item', async () => {
      apify.respond('test/profile', [
        {
          posts: [
            { text: 'Five lessons from our launch\nLesson one...', url: 'https://example.com/p/1' },
            { text: 'Short note', postUrl: 'https://example.com/p/2' },
          ],
        },
      ]);
      const inspiration = new InspirationService(linkedin, contentStore, PROFILE_URL);

      const result = await inspiration.importFromProfile();

      expect(result).toEqual({ found: 2, saved: 2 });
      const items = await contentStore.listPipelineItems('Inspiration');
      expect(
        items.map((document) => [contentStore.extractTitle(document), document.properties['Original URL']?.url])
      ).toEqual([
        ['Short note', 'https://example.com/p/2'],
        ['Five lessons from our launch', 'https://example.com/p/1'],
      ]);
    });

    it('should scrape the profile it is given instead of the default', async () => {
      const inspiration = new InspirationService(linkedin, contentStore, PROFILE_URL);

      await expect(inspiration.importFromProfile('https://www.linkedin.com/in/other', 3)).resolves.toEqual({
        found: 0,
        saved: 0,
      });
      expect(apify.calls[0].input).toMatchObject({ profileUrls: ['https://www.linkedin.com/in/other'], maxPostCount: 3 });
    });

    it('should require a profile url', async () => {
      const inspiration = new InspirationService(linkedin, contentStore, '');
      await expect(inspiration.importFromProfile()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('RefreshService', () => {
    it('should report each platform separately', async () => {
      apify.respond('test/posts', [{ postId: 'p1', text: 'Hello', views: 10 }]);
      const twitter = new TwitterScraperService(apify, metrics, { username: '', actor: 'test/tweets' });
      const refresh = new RefreshService(linkedin, twitter);

      const outcomes = await refresh.refreshAll();

      expect(outcomes).toEqual([
        { platform: 'LinkedIn', saved: 1 },
        { platform: 'Twitter', saved: 0, error: 'TWITTER_USERNAME not configured' },
      ]);
    });
  });
});
