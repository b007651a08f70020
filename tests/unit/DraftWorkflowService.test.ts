import { DataSource } from 'typeorm';
import { DatabaseContentStore } from '../../src/services/content/DatabaseContentStore';
import { DraftWorkflowService } from '../../src/services/DraftWorkflowService';
import { ExternalServiceError, InvalidRecordError } from '../../src/utils/errors';
import { FakeDraftGenerator } from '../helpers/fakes';
import { createTestDataSource, steppingClock } from '../helpers/testDataSource';

describe('DraftWorkflowService', () => {
  let dataSource: DataSource;
  let contentStore: DatabaseContentStore;
  let generator: FakeDraftGenerator;
  let service: DraftWorkflowService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    contentStore = new DatabaseContentStore(dataSource, steppingClock());
    generator = new FakeDraftGenerator();
    service = new DraftWorkflowService(contentStore, generator);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('processCalendarItems', () => {
    it('should draft only the items without a draft', async () => {
      const pending = await contentStore.addCalendarItem('AI in hiring', '2024-04-01');
      const done = await contentStore.addCalendarItem('Already drafted', '2024-04-02');
      await contentStore.updateCalendarDraft(done.id, 'Existing draft');

      const result = await service.processCalendarItems();

      expect(result).toEqual({
        dryRun: false,
        found: 1,
        processed: 1,
        items: [{ id: pending.id, topic: 'AI in hiring', outcome: 'drafted', draft: 'Draft about AI in hiring #test' }],
      });
      const stored = await contentStore.getCalendarItem(pending.id);
      expect(stored?.properties.Status).toEqual({ select: { name: 'Drafted' } });
      await expect(contentStore.listCalendarItems(false)).resolves.toEqual([]);
    });

    it('should save nothing on a dry run', async () => {
      const item = await contentStore.addCalendarItem('Dry topic');

      const result = await service.processCalendarItems({ dryRun: true });

      expect(result.items).toEqual([
        { id: item.id, topic: 'Dry topic', outcome: 'previewed', draft: 'Draft about Dry topic #test' },
      ]);
      const stored = await contentStore.getCalendarItem(item.id);
      expect(stored?.properties.Status).toEqual({ select: { name: 'Pending' } });
    });

    it('should keep going after a failed item', async () => {
      await contentStore.addCalendarItem('Broken topic', '2024-04-01');
      await contentStore.addCalendarItem('Fine topic', '2024-04-02');
      generator.failOn('Broken topic');

      const result = await service.processCalendarItems();

      expect(result.processed).toBe(1);
      expect(result.items.map((item) => [item.topic, item.outcome])).toEqual([
        ['Broken topic', 'failed'],
        ['Fine topic', 'drafted'],
      ]);
      expect(result.items[0].error).toBe('generation failed for Broken topic');
    });

    it('should fail items whose generated draft is blank', async () => {
      const item = await contentStore.addCalendarItem('Blank topic');
      jest.spyOn(generator, 'generate').mockResolvedValue('  ');

      const result = await service.processCalendarItems();

      expect(result).toEqual({
        dryRun: false,
        found: 1,
        processed: 0,
        items: [{ id: item.id, topic: 'Blank topic', outcome: 'failed', error: 'Fake: empty draft for "Blank topic"' }],
      });
      await expect(contentStore.listCalendarItems(false)).resolves.toHaveLength(1);
    });

    it('should skip untitled items', async () => {
      const untitled = { id: 'page-9', properties: { Topic: { title: [] } }, created_time: null, last_edited_time: null };
      jest.spyOn(contentStore, 'listCalendarItems').mockResolvedValue([untitled]);

      const result = await service.processCalendarItems();

      expect(result).toEqual({
        dryRun: false,
        found: 1,
        processed: 0,
        items: [{ id: 'page-9', topic: '', outcome: 'skipped' }],
      });
      expect(generator.topics).toEqual([]);
    });
  });

  describe('generateForCalendarItem', () => {
    it('should regenerate one item', async () => {
      const item = await contentStore.addCalendarItem('Quarterly goals');

      const updated = await service.generateForCalendarItem(item.id);

      expect(updated).toEqual({ id: item.id, draft: 'Draft about Quarterly goals #test', status: 'Drafted' });
      expect(generator.topics).toEqual(['Quarterly goals']);
    });

    it('should refuse a blank generated draft', async () => {
      const item = await contentStore.addCalendarItem('Quarterly goals');
      jest.spyOn(generator, 'generate').mockResolvedValue('');

      await expect(service.generateForCalendarItem(item.id)).rejects.toBeInstanceOf(ExternalServiceError);
      const stored = await contentStore.getCalendarItem(item.id);
      expect(stored?.properties.Status).toEqual({ select: { name: 'Pending' } });
    });

    it('should resolve null for an unknown item', async () => {
      await expect(service.generateForCalendarItem('3f2b8c1e-9d4a-4e6b-8a7c-1d2e3f4a5b6c')).resolves.toBeNull();
    });

    it('should refuse items whose title is empty', async () => {
      const untitled = { id: 'page-1', properties: { Topic: { title: [] } }, created_time: null, last_edited_time: null };
      jest.spyOn(contentStore, 'getCalendarItem').mockResolvedValue(untitled);

      await expect(service.generateForCalendarItem('page-1')).rejects.toBeInstanceOf(InvalidRecordError);
      expect(generator.topics).toEqual([]);
    });
  });

  describe('previewDrafts', () => {
    it('should return one draft or several variations', async () => {
      await expect(service.previewDrafts('Remote work')).resolves.toEqual(['Draft about Remote work #test']);
      await expect(service.previewDrafts('Remote work', 2)).resolves.toEqual([
        'Variation 1 about Remote work',
        'Variation 2 about Remote work',
      ]);
    });
  });
});
