import cors from 'cors';
import express, { type Express } from 'express';

import type { ErrorResponse } from '@salonsvc/contracts';
import type { Logger } from '@salonsvc/shared';

import { errorMiddleware, requestLogger } from './http';
import type { ServiceObservability } from './observability';
import { ServicesController, createServicesRouter } from './routes';
import type { ServiceManager } from './serviceManager';

export type AppDeps = {
  manager: ServiceManager;
  observability: ServiceObservability;
  logger: Logger;
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors());
  // Base64 images travel inside the JSON body.
  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger(deps.logger, deps.observability));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, service: 'services-api', metrics: deps.observability.snapshot() });
  });

  app.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4').send(deps.observability.toPrometheus());
  });

  app.use('/services', createServicesRouter(new ServicesController(deps.manager)));

  app.use((_req, res) => {
    const body: ErrorResponse = { error: { code: 'NOT_FOUND', message: 'Route not found' } };
    res.status(404).json(body);
  });

  app.use(errorMiddleware(deps.logger));

  return app;
}
