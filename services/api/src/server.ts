import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import { errorHandler } from './errorHandler';
import { registerItemRoutes } from './routes/items';
import { registerRootRoutes } from './routes/root';
import { DEFAULT_PAGINATION } from './query/pagination';
import type { ItemStorageBackend } from './contracts/itemStorage';
import type { PaginationLimits } from './query/pagination';

export interface AppDependencies {
  /** Backend served under /items. */
  memoryBackend: ItemStorageBackend;
  /** Backend served under /db-items. */
  dbBackend: ItemStorageBackend;
  healthChecks?: Record<string, () => Promise<boolean>>;
  logger?: FastifyBaseLogger;
  version?: string;
  pagination?: PaginationLimits;
}

export async function buildApp(deps: AppDependencies) {
  const logger: FastifyBaseLogger | false = deps.logger ?? false;
  const app = Fastify({ logger, ignoreTrailingSlash: true });
  const pagination = deps.pagination ?? DEFAULT_PAGINATION;

  app.setErrorHandler(errorHandler);

  await registerRootRoutes(app, {
    version: deps.version ?? '0.0.0',
    startedAt: Date.now(),
    healthChecks: deps.healthChecks ?? {},
  });
  await registerItemRoutes(app, { prefix: '/items', backend: deps.memoryBackend, pagination });
  await registerItemRoutes(app, { prefix: '/db-items', backend: deps.dbBackend, pagination });

  return app;
}
