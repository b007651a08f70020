import { DataSource, Repository } from 'typeorm';
import { logger } from '../../config/logger';
import { ContentPipelineItem } from '../../models/ContentPipelineItem';
import { CalendarItem } from '../../models/CalendarItem';
import { Clock } from '../../types';
import { AddedItem, ContentStore, DraftUpdate, StatusUpdate } from './ContentStore';
import {
  WorkflowDocument,
  calendarToDocument,
  extractTitle,
  hasDraftText,
  parsePipelineStatus,
  parseScheduledDate,
  pipelineToDocument,
  requireDraft,
  requireTopic,
} from './workflowDocument';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Content workflow backed by the content_pipeline and twitter_calendar tables.
 */
export class DatabaseContentStore implements ContentStore {
  readonly backend = 'database' as const;

  private pipeline: Repository<ContentPipelineItem>;
  private calendar: Repository<CalendarItem>;

  constructor(
    dataSource: DataSource,
    private readonly now: Clock = () => new Date()
  ) {
    this.pipeline = dataSource.getRepository(ContentPipelineItem);
    this.calendar = dataSource.getRepository(CalendarItem);
  }

  // Content pipeline operations

  async addPipelineItem(
    title: string,
    sourceUrl: string | null,
    status: string = 'Inspiration'
  ): Promise<AddedItem> {
    const timestamp = this.now();
    const item = this.pipeline.create({
      topic: requireTopic(title),
      originalUrl: sourceUrl || null,
      status: parsePipelineStatus(status),
      draft: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    const saved = await this.pipeline.save(item);
    logger.info(`📝 Added pipeline item ${saved.id}: ${saved.topic.slice(0, 50)}`);
    return { id: saved.id, topic: saved.topic, status: saved.status };
  }

  async listPipelineItems(status?: string): Promise<WorkflowDocument[]> {
    const items = await this.pipeline.find({
      where: status ? { status: parsePipelineStatus(status) } : {},
      order: { createdAt: 'DESC' },
    });
    return items.map(pipelineToDocument);
  }

  async updatePipelineStatus(id: string, status: string): Promise<StatusUpdate | null> {
    const nextStatus = parsePipelineStatus(status);
    const item = await this.findPipelineItem(id);
    if (!item) {
      return null;
    }

    item.status = nextStatus;
    item.updatedAt = this.now();
    await this.pipeline.save(item);
    return { id: item.id, status: item.status };
  }

  async updatePipelineDraft(id: string, text: string): Promise<DraftUpdate | null> {
    const draft = requireDraft(text);
    const item = await this.findPipelineItem(id);
    if (!item) {
      return null;
    }

    item.draft = draft;
    item.status = 'Drafted';
    item.updatedAt = this.now();
    await this.pipeline.save(item);
    return { id: item.id, draft: item.draft, status: item.status };
  }

  // Twitter calendar operations

  async addCalendarItem(topic: string, scheduledDate?: string | null): Promise<AddedItem> {
    const timestamp = this.now();
    const item = this.calendar.create({
      topic: requireTopic(topic),
      scheduledDate: parseScheduledDate(scheduledDate),
      status: 'Pending',
      draft: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    const saved = await this.calendar.save(item);
    logger.info(`🗓️ Added calendar item ${saved.id}: ${saved.topic.slice(0, 50)}`);
    return { id: saved.id, topic: saved.topic, status: saved.status };
  }

  /**
   * Calendar items by scheduled date, unscheduled last. `hasDraft` keeps only
   * items whose draft is (or is not) non-blank after trimming.
   */
  async listCalendarItems(hasDraft?: boolean): Promise<WorkflowDocument[]> {
    const items = await this.calendar.find({
      order: { scheduledDate: { direction: 'ASC', nulls: 'LAST' }, createdAt: 'ASC' },
    });

    const filtered =
      hasDraft === undefined ? items : items.filter((item) => hasDraftText(item.draft) === hasDraft);
    return filtered.map(calendarToDocument);
  }

  async getCalendarItem(id: string): Promise<WorkflowDocument | null> {
    const item = await this.findCalendarItem(id);
    return item ? calendarToDocument(item) : null;
  }

  async updateCalendarDraft(id: string, text: string): Promise<DraftUpdate | null> {
    const draft = requireDraft(text);
    const item = await this.findCalendarItem(id);
    if (!item) {
      return null;
    }

    item.draft = draft;
    item.status = 'Drafted';
    item.updatedAt = this.now();
    await this.calendar.save(item);
    return { id: item.id, draft: item.draft, status: item.status };
  }

  extractTitle(document: unknown): string {
    return extractTitle(document);
  }

  // Ids that are not UUIDs cannot exist; postgres would reject the comparison
  private async findPipelineItem(id: string): Promise<ContentPipelineItem | null> {
    return UUID_PATTERN.test(id) ? this.pipeline.findOne({ where: { id } }) : null;
  }

  private async findCalendarItem(id: string): Promise<CalendarItem | null> {
    return UUID_PATTERN.test(id) ? this.calendar.findOne({ where: { id } }) : null;
  }
}
