/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> infra -> deps -> server -> routes
 * - Makes E2E tests simple (pass in-memory infra, app.inject, close).
 * - Clean place to run the dev-only seed.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, createInfra, type AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, infra?: AppInfra) {
  const deps = buildDeps(config, infra ?? (await createInfra(config)));
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else if (!deps.db) {
      logger.warn('seed.skipped_without_database', { flow });
    } else {
      logger.info('seed.start', { flow });

      await runDevSeed({
        db: deps.db,
        passwordHasher: deps.passwordHasher,
        options: {
          adminEmail: config.seed.adminEmail,
          adminPassword: config.seed.adminPassword,
        },
      });

      logger.info('seed.done', { flow });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
