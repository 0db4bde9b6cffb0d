import type { Server } from 'node:http';

import { closeDb, config, logger, runMigrations } from '@observatory/shared';

import { createApp } from './app';
import { createAppContext } from './appContext';

async function bootstrap(): Promise<Server> {
  if (config.PERSISTENCE_DRIVER === 'postgres') {
    await runMigrations();
  }

  const context = createAppContext();
  await context.adminUsers.bootstrapSuperAdmin({
    email: config.DEFAULT_ADMIN_EMAIL,
    password: config.DEFAULT_ADMIN_PASSWORD
  });

  if (context.weatherRefresh && config.WEATHER_REFRESH_ENABLED) {
    context.weatherRefresh.start();
  }

  const app = createApp(context);
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, persistence: config.PERSISTENCE_DRIVER }, 'Observatory booking service listening');
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    context.weatherRefresh?.stop();
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start service');
  process.exit(1);
});
