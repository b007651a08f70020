import type { ContentBackend } from '../../config/env';
import type { WorkflowDocument } from './workflowDocument';

export interface AddedItem {
  id: string;
  topic: string;
  status: string;
}

export interface StatusUpdate {
  id: string;
  status: string;
}

export interface DraftUpdate {
  id: string;
  draft: string;
  status: string;
}

/**
 * Pipeline and calendar CRUD. Every backend returns items as WorkflowDocuments
 * so callers never see which one is active. Updates resolve to null when the
 * id is unknown.
 */
export interface ContentStore {
  readonly backend: ContentBackend;

  addPipelineItem(title: string, sourceUrl: string | null, status?: string): Promise<AddedItem>;
  addCalendarItem(topic: string, scheduledDate?: string | null): Promise<AddedItem>;

  listPipelineItems(status?: string): Promise<WorkflowDocument[]>;
  listCalendarItems(hasDraft?: boolean): Promise<WorkflowDocument[]>;
  getCalendarItem(id: string): Promise<WorkflowDocument | null>;

  updatePipelineStatus(id: string, status: string): Promise<StatusUpdate | null>;
  updatePipelineDraft(id: string, text: string): Promise<DraftUpdate | null>;
  updateCalendarDraft(id: string, text: string): Promise<DraftUpdate | null>;

  extractTitle(document: unknown): string;
}
