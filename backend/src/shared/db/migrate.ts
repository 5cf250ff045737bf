/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and CI.
 * - TS migrations live in src/shared/db/migrations; this file runs under tsx, so
 *   FileMigrationProvider can import them directly.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      migrationFolder: path.join(process.cwd(), 'src/shared/db/migrations'),
    }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migration.failed', {
      message: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
    return;
  }

  logger.info('db.migration.up_to_date');
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migration.fatal', { message: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
