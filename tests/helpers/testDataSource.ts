import { DataSource } from 'typeorm';
import { AppConfig, loadConfig } from '../../src/config/env';
import { ENTITIES } from '../../src/models';
import { Clock } from '../../src/types';

// In-memory stand-in for postgres; same entities, schema built on initialize
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    synchronize: true,
    dropSchema: true,
    logging: false,
  });
  await dataSource.initialize();
  return dataSource;
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    DATABASE_URL: 'postgres://localhost:5432/social_metrics_test',
    NODE_ENV: 'test',
    ...overrides,
  });
}

/**
 * Clock that starts at `start` and moves forward `stepMs` on every call, so
 * each stored timestamp is distinct and predictable.
 */
export function steppingClock(start: string = '2024-03-01T09:00:00.000Z', stepMs: number = 1000): Clock {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}
