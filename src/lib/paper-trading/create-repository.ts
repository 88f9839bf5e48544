/**
 * Repository Factory
 *
 * PostgreSQL when a postgres:// URL is given, otherwise SQLite at the
 * configured path. Dialect modules are imported lazily so only the chosen
 * driver loads.
 */

import type { EngineConfig } from '@/lib/config';
import { createLogger, type Logger } from '@/lib/utils/logger';
import type { EngineStateRepository } from './repository';

const PG_URL = /^postgres(ql)?:\/\//;

export async function createRepository(
  persistence: EngineConfig['persistence'],
  options: { databaseUrl?: string; logger?: Logger } = {},
): Promise<EngineStateRepository> {
  const log = options.logger ?? createLogger('DB');
  const dbUrl = options.databaseUrl ?? process.env.DATABASE_URL;

  if (dbUrl && PG_URL.test(dbUrl)) {
    const { PgRepository } = await import('./repository-pg');
    const repo = new PgRepository(dbUrl);
    await repo.ensureTables();
    log.info('Connected to PostgreSQL');
    return repo;
  }

  const { SqliteRepository } = await import('./repository-sqlite');
  log.info(`Using local SQLite (${persistence.sqlitePath})`);
  return new SqliteRepository(persistence.sqlitePath);
}
