import axios, { AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import { DocumentShapeError, ExternalServiceError, errorMessage } from '../../utils/errors';
import { AddedItem, ContentStore, DraftUpdate, StatusUpdate } from './ContentStore';
import {
  WorkflowDocument,
  documentHasDraft,
  extractTitle,
  parsePipelineStatus,
  parseScheduledDate,
  parseWorkflowDocument,
  requireDraft,
  requireTopic,
} from './workflowDocument';

export const NOTION_API_URL = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';

// Page ids are UUIDs, with or without dashes
const PAGE_ID_PATTERN = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export interface NotionDatabases {
  pipelineDatabaseId: string;
  calendarDatabaseId: string;
}

interface QueryPage {
  results: unknown[];
  hasMore: boolean;
  nextCursor: string | null;
}

export function createNotionClient(token: string): AxiosInstance {
  return axios.create({
    baseURL: NOTION_API_URL,
    timeout: 30000,
    headers: {
      Authorization: `Bearer ${token}`,
      'Notion-Version': NOTION_VERSION,
      'Content-Type': 'application/json',
    },
  });
}

/**
 * Content workflow stored in two Notion databases. Pages come back already in
 * WorkflowDocument shape and only need validating.
 */
export class NotionContentStore implements ContentStore {
  readonly backend = 'notion' as const;

  constructor(
    private readonly client: AxiosInstance,
    private readonly databases: NotionDatabases
  ) {}

  // Content pipeline operations

  async addPipelineItem(
    title: string,
    sourceUrl: string | null,
    status: string = 'Inspiration'
  ): Promise<AddedItem> {
    const topic = requireTopic(title);
    const page = await this.request('create pipeline page', () =>
      this.client.post<unknown>('/pages', {
        parent: { database_id: this.databases.pipelineDatabaseId },
        properties: {
          Topic: { title: [{ text: { content: topic } }] },
          Status: { select: { name: parsePipelineStatus(status) } },
          'Original URL': { url: sourceUrl || null },
        },
      })
    );

    const document = parsePage(page);
    logger.info(`📝 Added pipeline page ${document.id}: ${topic.slice(0, 50)}`);
    return { id: document.id, topic, status: document.properties.Status?.select?.name ?? status };
  }

  async listPipelineItems(status?: string): Promise<WorkflowDocument[]> {
    const filter = status
      ? { property: 'Status', select: { equals: parsePipelineStatus(status) } }
      : undefined;

    return this.queryDatabase(this.databases.pipelineDatabaseId, {
      filter,
      sorts: [{ timestamp: 'created_time', direction: 'descending' }],
    });
  }

  async updatePipelineStatus(id: string, status: string): Promise<StatusUpdate | null> {
    const nextStatus = parsePipelineStatus(status);
    const page = await this.updatePage(id, { Status: { select: { name: nextStatus } } });
    return page ? { id: page.id, status: nextStatus } : null;
  }

  async updatePipelineDraft(id: string, text: string): Promise<DraftUpdate | null> {
    const draft = requireDraft(text);
    const page = await this.updatePage(id, {
      Draft: { rich_text: [{ text: { content: draft } }] },
      Status: { select: { name: 'Drafted' } },
    });
    return page ? { id: page.id, draft, status: 'Drafted' } : null;
  }

  // Twitter calendar operations

  async addCalendarItem(topic: string, scheduledDate?: string | null): Promise<AddedItem> {
    const title = requireTopic(topic);
    const start = parseScheduledDate(scheduledDate);
    const page = await this.request('create calendar page', () =>
      this.client.post<unknown>('/pages', {
        parent: { database_id: this.databases.calendarDatabaseId },
        properties: {
          Topic: { title: [{ text: { content: title } }] },
          Status: { select: { name: 'Pending' } },
          ...(start ? { 'Scheduled Date': { date: { start } } } : {}),
        },
      })
    );

    const document = parsePage(page);
    logger.info(`🗓️ Added calendar page ${document.id}: ${title.slice(0, 50)}`);
    return { id: document.id, topic: title, status: 'Pending' };
  }

  async listCalendarItems(hasDraft?: boolean): Promise<WorkflowDocument[]> {
    const documents = await this.queryDatabase(this.databases.calendarDatabaseId, {
      sorts: [{ property: 'Scheduled Date', direction: 'ascending' }],
    });

    if (hasDraft === undefined) {
      return documents;
    }
    return documents.filter((document) => documentHasDraft(document) === hasDraft);
  }

  async getCalendarItem(id: string): Promise<WorkflowDocument | null> {
    if (!PAGE_ID_PATTERN.test(id)) {
      return null;
    }
    const page = await this.request(
      'retrieve page',
      () => this.client.get<unknown>(`/pages/${encodeURIComponent(id)}`),
      true
    );
    return page === null ? null : parsePage(page);
  }

  async updateCalendarDraft(id: string, text: string): Promise<DraftUpdate | null> {
    const draft = requireDraft(text);
    const page = await this.updatePage(id, {
      Draft: { rich_text: [{ text: { content: draft } }] },
      Status: { select: { name: 'Drafted' } },
    });
    return page ? { id: page.id, draft, status: 'Drafted' } : null;
  }

  extractTitle(document: unknown): string {
    return extractTitle(document);
  }

  // Notion helpers

  private async updatePage(id: string, properties: Record<string, unknown>): Promise<WorkflowDocument | null> {
    if (!PAGE_ID_PATTERN.test(id)) {
      return null;
    }
    const page = await this.request(
      'update page',
      () => this.client.patch<unknown>(`/pages/${encodeURIComponent(id)}`, { properties }),
      true
    );
    return page === null ? null : parsePage(page);
  }

  private async queryDatabase(
    databaseId: string,
    body: { filter?: Record<string, unknown>; sorts: Record<string, string>[] }
  ): Promise<WorkflowDocument[]> {
    const documents: WorkflowDocument[] = [];
    let cursor: string | null = null;

    do {
      const startCursor = cursor;
      const data = await this.request('query database', () =>
        this.client.post<unknown>(`/databases/${databaseId}/query`, {
          ...body,
          page_size: 100,
          ...(startCursor ? { start_cursor: startCursor } : {}),
        })
      );

      const page = parseQueryPage(data);
      documents.push(...page.results.map(parsePage));
      cursor = page.hasMore ? page.nextCursor : null;
    } while (cursor);

    return documents;
  }

  // Resolves null for a 404 when notFoundAsNull is set; Notion never answers with a null body
  private async request(
    action: string,
    call: () => Promise<{ data: unknown }>,
    notFoundAsNull = false
  ): Promise<unknown> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (notFoundAsNull && status === 404) {
          return null;
        }
        logger.error(`❌ Notion ${action} failed (${status ?? 'no response'}): ${error.message}`);
        throw new ExternalServiceError('Notion', `${action} failed: ${error.message}`, status);
      }
      logger.error(`❌ Notion ${action} failed: ${errorMessage(error)}`);
      throw error;
    }
  }
}

function parseQueryPage(data: unknown): QueryPage {
  if (typeof data !== 'object' || data === null || !('results' in data) || !Array.isArray(data.results)) {
    throw new ExternalServiceError('Notion', 'query response has no results array');
  }
  const hasMore = 'has_more' in data && data.has_more === true;
  const nextCursor = 'next_cursor' in data && typeof data.next_cursor === 'string' ? data.next_cursor : null;
  return { results: data.results, hasMore, nextCursor };
}

// A malformed page is Notion's fault, not the caller's
function parsePage(raw: unknown): WorkflowDocument {
  try {
    return parseWorkflowDocument(raw);
  } catch (error) {
    if (error instanceof DocumentShapeError) {
      throw new ExternalServiceError('Notion', `unexpected page shape: ${error.message}`);
    }
    throw error;
  }
}
