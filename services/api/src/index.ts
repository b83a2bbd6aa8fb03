import { describeConfig, loadConfig } from './config';
import { initialize } from './bootstrap';
import { createLogger } from './logging/logger';
import { buildApp } from './server';

/**
 * Main entrypoint for the items API.
 * Resolves configuration, runs the bootstrap step, then registers routes and
 * listens on the configured port.
 */
async function main() {
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    version: config.version,
    prettyPrint: config.env === 'development',
  });

  logger.debug(
    { report: describeConfig(config), envFile: config.settings.envFile, cwd: process.cwd() },
    'Configuration values (with sources)',
  );

  // --- Bootstrap (fatal on failure) ---
  const init = await initialize(config, logger);
  if (!init.ok) {
    logger.fatal({ err: init.error }, 'Startup failed; not serving traffic');
    process.exit(1);
  }
  const { services } = init;

  const app = await buildApp({
    memoryBackend: services.memoryBackend,
    dbBackend: services.dbBackend,
    healthChecks: { mongodb: () => services.mongo.ping() },
    logger,
    version: config.version,
    pagination: config.pagination,
  });
  app.addHook('onClose', async () => {
    await services.mongo.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.fatal({ err }, 'Server startup failed');
    await services.mongo.close();
    process.exit(1);
  }
}

// run
main().catch((err: unknown) => {
  // configuration errors land here, before a logger exists
  console.error('Fatal error starting items API:', err);
  process.exit(1);
});
