import { logger } from '../config/logger';
import { ExternalServiceError, InvalidRecordError, errorMessage } from '../utils/errors';
import { ContentStore, DraftUpdate, hasDraftText } from './content';
import { DraftGenerator } from './ai/DraftGenerator';

export type DraftOutcome = 'drafted' | 'previewed' | 'skipped' | 'failed';

export interface DraftRunItem {
  id: string;
  topic: string;
  outcome: DraftOutcome;
  draft?: string;
  error?: string;
}

export interface DraftRunResult {
  dryRun: boolean;
  found: number;
  processed: number;
  items: DraftRunItem[];
}

/**
 * Fills Twitter calendar items with generated drafts.
 */
export class DraftWorkflowService {
  constructor(
    private readonly contentStore: ContentStore,
    private readonly generator: DraftGenerator
  ) {}

  /**
   * Draft every calendar item that has none. Untitled items are skipped and a
   * failure on one item does not stop the run. With `dryRun` nothing is saved.
   */
  async processCalendarItems(options: { dryRun?: boolean } = {}): Promise<DraftRunResult> {
    const dryRun = options.dryRun ?? false;
    const items = await this.contentStore.listCalendarItems(false);
    logger.info(`📋 Found ${items.length} calendar items without drafts`);

    const results: DraftRunItem[] = [];
    let processed = 0;

    for (const item of items) {
      let topic = '';
      try {
        topic = this.contentStore.extractTitle(item);
        if (!topic) {
          logger.warn(`⚠️ Skipping calendar item ${item.id} with no title`);
          results.push({ id: item.id, topic, outcome: 'skipped' });
          continue;
        }

        logger.info(`✍️ Generating tweet for: ${topic}`);
        const draft = await this.generateDraft(topic);

        if (!dryRun) {
          await this.contentStore.updateCalendarDraft(item.id, draft);
        }

        processed++;
        results.push({ id: item.id, topic, outcome: dryRun ? 'previewed' : 'drafted', draft });
      } catch (error) {
        logger.error(`❌ Error processing calendar item ${item.id}: ${errorMessage(error)}`);
        results.push({ id: item.id, topic, outcome: 'failed', error: errorMessage(error) });
      }
    }

    logger.info(`✅ Processed ${processed}/${items.length} calendar items${dryRun ? ' (dry run)' : ''}`);
    return { dryRun, found: items.length, processed, items: results };
  }

  /**
   * (Re)generate the draft of one calendar item. Resolves null when the id is
   * unknown.
   */
  async generateForCalendarItem(id: string): Promise<DraftUpdate | null> {
    const item = await this.contentStore.getCalendarItem(id);
    if (!item) {
      return null;
    }

    const topic = this.contentStore.extractTitle(item);
    if (!topic) {
      throw new InvalidRecordError(`Calendar item ${id} has no topic`);
    }

    const draft = await this.generateDraft(topic);
    return this.contentStore.updateCalendarDraft(id, draft);
  }

  private async generateDraft(topic: string): Promise<string> {
    const draft = await this.generator.generate(topic);
    if (!hasDraftText(draft)) {
      throw new ExternalServiceError(this.generator.name, `empty draft for "${topic}"`);
    }
    return draft;
  }

  // Drafts for an ad-hoc topic; nothing is stored
  async previewDrafts(topic: string, variations: number = 1): Promise<string[]> {
    if (variations <= 1) {
      return [await this.generator.generate(topic)];
    }
    return this.generator.generateVariations(topic, variations);
  }
}
