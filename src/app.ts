import path from 'node:path';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Level } from 'pino';
import type { Express, Request, Response } from 'express';
import express from 'express';
import pinoHttp from 'pino-http';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';

import { logger, metricsRouter, metricsMiddleware, traceMiddleware, getCurrentTraceId } from '@observatory/shared';

import { createAppContext, type AppContext } from './appContext';
import { createAdminController } from './controllers/adminController';
import { createAuthController } from './controllers/authController';
import { createMeController } from './controllers/meController';
import { createSlotController } from './controllers/slotController';
import { createAttemptRateLimit } from './infrastructure/http/attemptRateLimit';
import { createAuthMiddleware } from './infrastructure/http/authMiddleware';
import { errorMapper } from './infrastructure/http/errorMapper';

const openApiPath = path.resolve(process.cwd(), 'docs/openapi.yaml');
let openApiDocument: swaggerUi.JsonObject | undefined;

try {
  openApiDocument = YAML.load(openApiPath);
} catch (error) {
  logger.warn({ error, openApiPath }, 'Failed to load OpenAPI document');
}

export function createApp(context: AppContext = createAppContext()): Express {
  const app = express();
  const { appConfig } = context;
  const authMiddleware = createAuthMiddleware(context.authService);

  app.use(traceMiddleware);
  app.disable('x-powered-by');
  app.use(express.json());

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (_req: IncomingMessage, res: ServerResponse, err: Error | undefined): Level => {
        if (err || res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      }
    })
  );

  app.use((req, res, next) => {
    const contextFields = { traceId: getCurrentTraceId() };
    res.locals.logContext = contextFields;
    res.locals.logger = logger.withContext(contextFields);
    res.locals.logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  if (appConfig.METRICS_ENABLED) {
    app.use(metricsMiddleware);
    app.use(metricsRouter);
  }

  if (openApiDocument) {
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  const attemptLimit = createAttemptRateLimit({
    windowMs: appConfig.RATE_LIMIT_WINDOW_SECONDS * 1000,
    limit: appConfig.RATE_LIMIT_MAX_REQUESTS
  });
  app.use(
    '/auth',
    createAuthController({ authService: context.authService, userService: context.userService, attemptLimit })
  );
  app.use(createSlotController({ catalog: context.catalog, ledger: context.ledger, auth: authMiddleware }));
  app.use(
    '/me',
    createMeController({ catalog: context.catalog, userService: context.userService, auth: authMiddleware })
  );
  app.use(
    '/admin',
    createAdminController({
      configuration: context.configuration,
      scheduler: context.scheduler,
      catalog: context.catalog,
      users: context.adminUsers,
      auth: authMiddleware,
      weather: context.weather
    })
  );

  app.get('/health', (_req: Request, res: Response) => {
    const reqLogger = res.locals.logger ?? logger;
    reqLogger.debug('Health check endpoint accessed');

    res.status(200).json({
      status: 'ok',
      service: appConfig.SERVICE_NAME,
      version: appConfig.NODE_ENV,
      persistence: appConfig.PERSISTENCE_DRIVER,
      weather: context.weather ? context.weather.getHealth() : { status: 'disabled' }
    });
  });

  app.use(errorMapper);

  return app;
}
