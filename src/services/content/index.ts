import { DataSource } from 'typeorm';
import type { AppConfig } from '../../config/env';
import { logger } from '../../config/logger';
import { Clock } from '../../types';
import { ContentStore } from './ContentStore';
import { DatabaseContentStore } from './DatabaseContentStore';
import { NotionContentStore, createNotionClient } from './NotionContentStore';

export * from './ContentStore';
export * from './workflowDocument';
export { DatabaseContentStore } from './DatabaseContentStore';
export { NotionContentStore, createNotionClient } from './NotionContentStore';

export function createContentStore(config: AppConfig, dataSource: DataSource, now?: Clock): ContentStore {
  if (config.content.backend === 'notion') {
    const { token, pipelineDatabaseId, calendarDatabaseId } = config.content.notion;
    logger.info('📒 Content workflow backend: Notion');
    return new NotionContentStore(createNotionClient(token), { pipelineDatabaseId, calendarDatabaseId });
  }

  logger.info('📒 Content workflow backend: database');
  return new DatabaseContentStore(dataSource, now);
}
