import 'reflect-metadata';
import { loadConfig } from '../config/env';
import { configureLogger, logger } from '../config/logger';
import { closeDatabase, createDataSource, initializeDatabase } from '../config/database';
import { Services, createServices } from '../bootstrap';

/**
 * Boot config, database and services for a one-off script, run `task`, then
 * close the pool. Exits non-zero when the task throws.
 */
export async function runScript(name: string, task: (services: Services) => Promise<void>): Promise<void> {
  const config = loadConfig();
  configureLogger(config);

  const dataSource = createDataSource(config);
  await initializeDatabase(dataSource);

  try {
    logger.info(`▶️ ${name} started`);
    await task(createServices(config, dataSource));
    logger.info(`✅ ${name} finished`);
  } catch (error) {
    logger.error(`❌ ${name} failed:`, error);
    process.exitCode = 1;
  } finally {
    await closeDatabase(dataSource);
  }
}
