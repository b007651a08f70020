import { ContentPipelineItem } from '../../models/ContentPipelineItem';
import { CalendarItem } from '../../models/CalendarItem';
import { MAX_DRAFT_LENGTH, PIPELINE_STATUSES, PipelineStatus } from '../../types';
import { DocumentShapeError, InvalidRecordError, InvalidStatusError } from '../../utils/errors';
import { UnknownRecord, isRecord } from '../../utils/records';

/**
 * Workflow items are exposed in Notion's page shape whichever backend stores
 * them: every business field sits in a type-tagged property object.
 */

export interface TextLeaf {
  text: { content: string };
}

export interface TitleProperty {
  title: TextLeaf[];
}

export interface SelectProperty {
  select: { name: string } | null;
}

export interface UrlProperty {
  url: string | null;
}

export interface RichTextProperty {
  rich_text: TextLeaf[];
}

export interface DateProperty {
  date: { start: string } | null;
}

export interface WorkflowProperties {
  Topic?: TitleProperty;
  Title?: TitleProperty;
  Status?: SelectProperty;
  'Original URL'?: UrlProperty;
  Draft?: RichTextProperty;
  'Scheduled Date'?: DateProperty;
}

export interface WorkflowDocument {
  id: string;
  properties: WorkflowProperties;
  created_time: string | null;
  last_edited_time: string | null;
}

const textLeaf = (content: string): TextLeaf => ({ text: { content } });

const richText = (draft: string | null): RichTextProperty => ({
  rich_text: draft ? [textLeaf(draft)] : [],
});

export function pipelineToDocument(item: ContentPipelineItem): WorkflowDocument {
  return {
    id: item.id,
    properties: {
      Topic: { title: [textLeaf(item.topic || '')] },
      Status: { select: { name: item.status || 'Inspiration' } },
      'Original URL': { url: item.originalUrl },
      Draft: richText(item.draft),
    },
    created_time: item.createdAt ? item.createdAt.toISOString() : null,
    last_edited_time: item.updatedAt ? item.updatedAt.toISOString() : null,
  };
}

export function calendarToDocument(item: CalendarItem): WorkflowDocument {
  return {
    id: item.id,
    properties: {
      Topic: { title: [textLeaf(item.topic || '')] },
      Status: { select: { name: item.status || 'Pending' } },
      Draft: richText(item.draft),
      'Scheduled Date': { date: item.scheduledDate ? { start: item.scheduledDate } : null },
    },
    created_time: item.createdAt ? item.createdAt.toISOString() : null,
    last_edited_time: item.updatedAt ? item.updatedAt.toISOString() : null,
  };
}

function leafContent(entry: unknown): string | null {
  if (!isRecord(entry)) {
    return null;
  }
  if (isRecord(entry.text) && typeof entry.text.content === 'string') {
    return entry.text.content;
  }
  // Notion responses also carry the flattened text
  if (typeof entry.plain_text === 'string') {
    return entry.plain_text;
  }
  return null;
}

function parseLeaves(value: unknown, field: string): TextLeaf[] {
  if (!Array.isArray(value)) {
    throw new DocumentShapeError(`${field} is not a text array`);
  }
  return value.map((entry, index) => {
    const content = leafContent(entry);
    if (content === null) {
      throw new DocumentShapeError(`${field}[${index}] has no text content`);
    }
    return textLeaf(content);
  });
}

function titleArray(properties: UnknownRecord): unknown[] | null {
  for (const key of ['Topic', 'Title']) {
    const property = properties[key];
    if (isRecord(property) && Array.isArray(property.title)) {
      return property.title;
    }
  }
  return null;
}

/**
 * Read the topic out of a workflow document. Accepts a document whose
 * properties carry `Topic` or `Title` as a title array, or a native row with
 * a string `topic`.
 */
export function extractTitle(document: unknown): string {
  if (!isRecord(document)) {
    throw new DocumentShapeError('Workflow document must be an object');
  }

  if (isRecord(document.properties)) {
    const title = titleArray(document.properties);
    if (title) {
      if (title.length === 0) {
        return '';
      }
      const content = leafContent(title[0]);
      if (content === null) {
        throw new DocumentShapeError('Title property has no text content');
      }
      return content;
    }
  }

  if (typeof document.topic === 'string') {
    return document.topic;
  }

  throw new DocumentShapeError('Workflow document has neither a Topic/Title title property nor a topic field');
}

/**
 * Normalize a page returned by the Notion API into a WorkflowDocument.
 * Known properties are validated; anything else is dropped.
 */
export function parseWorkflowDocument(raw: unknown): WorkflowDocument {
  if (!isRecord(raw) || typeof raw.id !== 'string') {
    throw new DocumentShapeError('Page is missing a string id');
  }
  if (!isRecord(raw.properties)) {
    throw new DocumentShapeError(`Page ${raw.id} has no properties`);
  }

  const source = raw.properties;
  const properties: WorkflowProperties = {};

  for (const key of ['Topic', 'Title'] as const) {
    const property = source[key];
    if (isRecord(property) && property.title !== undefined) {
      properties[key] = { title: parseLeaves(property.title, key) };
    }
  }

  const status = source.Status;
  if (isRecord(status)) {
    const select = status.select;
    properties.Status = {
      select: isRecord(select) && typeof select.name === 'string' ? { name: select.name } : null,
    };
  }

  const originalUrl = source['Original URL'];
  if (isRecord(originalUrl)) {
    properties['Original URL'] = { url: typeof originalUrl.url === 'string' ? originalUrl.url : null };
  }

  const draft = source.Draft;
  if (isRecord(draft) && draft.rich_text !== undefined) {
    properties.Draft = { rich_text: parseLeaves(draft.rich_text, 'Draft') };
  }

  const scheduled = source['Scheduled Date'];
  if (isRecord(scheduled)) {
    const date = scheduled.date;
    properties['Scheduled Date'] = {
      date: isRecord(date) && typeof date.start === 'string' ? { start: date.start } : null,
    };
  }

  return {
    id: raw.id,
    properties,
    created_time: typeof raw.created_time === 'string' ? raw.created_time : null,
    last_edited_time: typeof raw.last_edited_time === 'string' ? raw.last_edited_time : null,
  };
}

export function hasDraftText(draft: string | null | undefined): boolean {
  return typeof draft === 'string' && draft.trim().length > 0;
}

// Notion splits styled text into several segments
export function documentHasDraft(document: WorkflowDocument): boolean {
  const leaves = document.properties.Draft?.rich_text ?? [];
  return hasDraftText(leaves.map((leaf) => leaf.text.content).join(''));
}

export function truncateDraft(text: string): string {
  if (text.length <= MAX_DRAFT_LENGTH) {
    return text;
  }
  // Never split a surrogate pair
  const code = text.charCodeAt(MAX_DRAFT_LENGTH - 1);
  const end = code >= 0xd800 && code <= 0xdbff ? MAX_DRAFT_LENGTH - 1 : MAX_DRAFT_LENGTH;
  return text.slice(0, end);
}

// Blank drafts never reach storage; items only become Drafted with text

export function requireDraft(text: string): string {
  if (!hasDraftText(text)) {
    throw new InvalidRecordError('Draft must not be empty');
  }
  return truncateDraft(text);
}

export function parsePipelineStatus(value: string): PipelineStatus {
  const status = PIPELINE_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new InvalidStatusError(value, PIPELINE_STATUSES);
  }
  return status;
}

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function parseScheduledDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  if (!ISO_DAY.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
    throw new InvalidRecordError(`Scheduled date must be YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

export function requireTopic(topic: string): string {
  if (!topic || !topic.trim()) {
    throw new InvalidRecordError('Topic must not be empty');
  }
  return topic;
}
