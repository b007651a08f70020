import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { logger } from '../config/logger';
import { ContentStore } from '../services/content';
import { DraftWorkflowService } from '../services/DraftWorkflowService';
import { InspirationService } from '../services/InspirationService';
import { PIPELINE_STATUSES } from '../types';
import { sendError, sendNotFound, sendSuccess, validate } from '../utils/http';

export interface ContentRouteDeps {
  contentStore: ContentStore;
  drafts: DraftWorkflowService;
  inspiration: InspirationService;
}

const pipelineQuery = Joi.object<{ status?: string }>({
  status: Joi.string().valid(...PIPELINE_STATUSES),
});

const pipelineBody = Joi.object<{ title: string; sourceUrl: string | null; status: string }>({
  title: Joi.string().trim().min(1).required(),
  sourceUrl: Joi.string().uri().allow(null, '').default(null),
  status: Joi.string()
    .valid(...PIPELINE_STATUSES)
    .default('Inspiration'),
});

const statusBody = Joi.object<{ status: string }>({
  status: Joi.string().required(),
});

const draftBody = Joi.object<{ draft: string }>({
  draft: Joi.string().trim().min(1).required(),
});

const importBody = Joi.object<{ profileUrl?: string; maxPosts: number }>({
  profileUrl: Joi.string().uri(),
  maxPosts: Joi.number().integer().min(1).max(100).default(20),
});

const calendarQuery = Joi.object<{ hasDraft?: boolean }>({
  hasDraft: Joi.boolean(),
});

const calendarBody = Joi.object<{ topic: string; scheduledDate: string | null }>({
  topic: Joi.string().trim().min(1).required(),
  scheduledDate: Joi.string()
    .pattern(/^\d{4}-\d{2}-\d{2}$/)
    .allow(null)
    .default(null),
});

const generateBody = Joi.object<{ dryRun: boolean }>({
  dryRun: Joi.boolean().default(false),
});

const previewBody = Joi.object<{ topic: string; variations: number }>({
  topic: Joi.string().trim().min(1).required(),
  variations: Joi.number().integer().min(1).max(10).default(1),
});

export function createContentRoutes({ contentStore, drafts, inspiration }: ContentRouteDeps): Router {
  const router = Router();

  /**
   * GET /api/content/pipeline?status=Inspiration
   */
  router.get('/pipeline', async (req: Request, res: Response) => {
    try {
      const { status } = validate(pipelineQuery, req.query);
      const items = await contentStore.listPipelineItems(status);
      return sendSuccess(res, items, items.length === 0 ? 'No pipeline items yet' : undefined);
    } catch (error) {
      return sendError(res, error, 'Failed to load pipeline items');
    }
  });

  /**
   * POST /api/content/pipeline
   */
  router.post('/pipeline', async (req: Request, res: Response) => {
    try {
      const body = validate(pipelineBody, req.body);
      const item = await contentStore.addPipelineItem(body.title, body.sourceUrl || null, body.status);
      return sendSuccess(res, item, 'Pipeline item added', 201);
    } catch (error) {
      return sendError(res, error, 'Failed to add pipeline item');
    }
  });

  /**
   * POST /api/content/pipeline/import-linkedin
   * Add a LinkedIn profile's posts as Inspiration items
   */
  router.post('/pipeline/import-linkedin', async (req: Request, res: Response) => {
    try {
      const body = validate(importBody, req.body ?? {});
      const result = await inspiration.importFromProfile(body.profileUrl, body.maxPosts);
      return sendSuccess(res, result, `Saved ${result.saved} posts to Content Pipeline`);
    } catch (error) {
      return sendError(res, error, 'Failed to import LinkedIn posts');
    }
  });

  /**
   * PATCH /api/content/pipeline/:id/status
   */
  router.patch('/pipeline/:id/status', async (req: Request, res: Response) => {
    try {
      const { status } = validate(statusBody, req.body);
      const updated = await contentStore.updatePipelineStatus(req.params.id, status);
      if (!updated) {
        return sendNotFound(res, 'Pipeline item not found');
      }
      return sendSuccess(res, updated);
    } catch (error) {
      return sendError(res, error, 'Failed to update pipeline status');
    }
  });

  /**
   * PATCH /api/content/pipeline/:id/draft
   */
  router.patch('/pipeline/:id/draft', async (req: Request, res: Response) => {
    try {
      const { draft } = validate(draftBody, req.body);
      const updated = await contentStore.updatePipelineDraft(req.params.id, draft);
      if (!updated) {
        return sendNotFound(res, 'Pipeline item not found');
      }
      return sendSuccess(res, updated);
    } catch (error) {
      return sendError(res, error, 'Failed to update pipeline draft');
    }
  });

  /**
   * GET /api/content/calendar?hasDraft=true|false
   */
  router.get('/calendar', async (req: Request, res: Response) => {
    try {
      const { hasDraft } = validate(calendarQuery, req.query);
      const items = await contentStore.listCalendarItems(hasDraft);
      return sendSuccess(res, items, items.length === 0 ? 'No calendar items found' : undefined);
    } catch (error) {
      return sendError(res, error, 'Failed to load calendar items');
    }
  });

  /**
   * POST /api/content/calendar
   */
  router.post('/calendar', async (req: Request, res: Response) => {
    try {
      const body = validate(calendarBody, req.body);
      const item = await contentStore.addCalendarItem(body.topic, body.scheduledDate);
      return sendSuccess(res, item, 'Calendar item added', 201);
    } catch (error) {
      return sendError(res, error, 'Failed to add calendar item');
    }
  });

  /**
   * POST /api/content/calendar/generate
   * Draft every calendar item that has none
   */
  router.post('/calendar/generate', async (req: Request, res: Response) => {
    try {
      const { dryRun } = validate(generateBody, req.body ?? {});
      logger.info(`✍️ Generating calendar drafts${dryRun ? ' (dry run)' : ''}`);
      const result = await drafts.processCalendarItems({ dryRun });
      return sendSuccess(res, result, `Processed ${result.processed} of ${result.found} items`);
    } catch (error) {
      return sendError(res, error, 'Failed to generate drafts');
    }
  });

  /**
   * GET /api/content/calendar/:id
   */
  router.get('/calendar/:id', async (req: Request, res: Response) => {
    try {
      const item = await contentStore.getCalendarItem(req.params.id);
      if (!item) {
        return sendNotFound(res, 'Calendar item not found');
      }
      return sendSuccess(res, item);
    } catch (error) {
      return sendError(res, error, 'Failed to load calendar item');
    }
  });

  /**
   * PATCH /api/content/calendar/:id/draft
   */
  router.patch('/calendar/:id/draft', async (req: Request, res: Response) => {
    try {
      const { draft } = validate(draftBody, req.body);
      const updated = await contentStore.updateCalendarDraft(req.params.id, draft);
      if (!updated) {
        return sendNotFound(res, 'Calendar item not found');
      }
      return sendSuccess(res, updated);
    } catch (error) {
      return sendError(res, error, 'Failed to update calendar draft');
    }
  });

  /**
   * POST /api/content/calendar/:id/generate
   * (Re)generate one item's draft
   */
  router.post('/calendar/:id/generate', async (req: Request, res: Response) => {
    try {
      const updated = await drafts.generateForCalendarItem(req.params.id);
      if (!updated) {
        return sendNotFound(res, 'Calendar item not found');
      }
      return sendSuccess(res, updated, 'Draft generated');
    } catch (error) {
      return sendError(res, error, 'Failed to generate draft');
    }
  });

  /**
   * POST /api/content/drafts/preview
   * Drafts for an ad-hoc topic, not stored
   */
  router.post('/drafts/preview', async (req: Request, res: Response) => {
    try {
      const { topic, variations } = validate(previewBody, req.body);
      const previews = await drafts.previewDrafts(topic, variations);
      return sendSuccess(res, previews);
    } catch (error) {
      return sendError(res, error, 'Failed to generate draft preview');
    }
  });

  return router;
}
