import { DataSource } from 'typeorm';
import type { AppConfig } from './env';
import { logger } from './logger';
import { ENTITIES } from '../models';

// Create TypeORM DataSource
export const createDataSource = (config: AppConfig): DataSource => {
  const { database } = config;

  return new DataSource({
    type: 'postgres',
    url: database.url,
    synchronize: database.synchronize, // Auto-create/update tables
    logging: database.logging,
    entities: ENTITIES,
    migrations: [],
    subscribers: [],
    uuidExtension: 'pgcrypto',
    ssl: database.ssl ? { rejectUnauthorized: false } : false,
    extra: {
      // pg has no separate overflow pool; base size plus overflow is the hard cap
      max: database.poolSize + database.maxOverflow,
      connectionTimeoutMillis: database.poolTimeoutMs,
      maxLifetimeSeconds: database.recycleSeconds,
    },
  });
};

// Initialize database connection
export const initializeDatabase = async (dataSource: DataSource): Promise<void> => {
  try {
    logger.info('🗄️ Initializing database connection...');

    if (dataSource.isInitialized) {
      logger.info('📋 Database already initialized');
      return;
    }

    await dataSource.initialize();
    logger.info('✅ Database connection established successfully');

    await dataSource.query('SELECT 1');
    logger.info('🔍 Database connection test passed');

    const entityNames = dataSource.entityMetadatas.map((meta) => meta.tableName);
    logger.info(`📊 Loaded ${entityNames.length} entities: ${entityNames.join(', ')}`);
  } catch (error) {
    logger.error('❌ Database connection failed:', error);

    if (error instanceof Error) {
      if (error.message.includes('ECONNREFUSED')) {
        logger.error('💡 Tip: Make sure PostgreSQL is reachable at DATABASE_URL');
      } else if (error.message.includes('authentication failed')) {
        logger.error('💡 Tip: Check the credentials in DATABASE_URL');
      }
    }

    throw error;
  }
};

// Close database connection
export const closeDatabase = async (dataSource: DataSource): Promise<void> => {
  if (!dataSource.isInitialized) {
    return;
  }

  try {
    await dataSource.destroy();
    logger.info('📴 Database connection closed');
  } catch (error) {
    logger.error('❌ Error closing database connection:', error);
  }
};

// Health check for database
export const checkDatabaseHealth = async (dataSource: DataSource): Promise<boolean> => {
  try {
    if (!dataSource.isInitialized) {
      logger.warn('Database not initialized for health check');
      return false;
    }
    await dataSource.query('SELECT 1');
    return true;
  } catch (error) {
    logger.error('Database health check failed:', error);
    return false;
  }
};
