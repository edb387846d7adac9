import cors from 'cors';
import express, { type Express } from 'express';
import { pinoHttp } from 'pino-http';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { advisorRouter } from './infrastructure/http/advisorRouter.js';
import { errorHandler } from './infrastructure/http/errorHandler.js';

export const SERVICE_NAME = 'Coverage Advisor API';
export const SERVICE_VERSION = '0.1.0';

export const createApp = (container: AppContainer = new AppContainer()): Express => {
  const app = express();

  app.use(cors({ origin: container.config.app.corsOrigin, credentials: false }));
  app.use(express.json({ limit: '1mb' }));
  app.use(pinoHttp({ logger: container.logger }));

  app.get('/', (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      providers: container.providers(),
      endpoints: {
        health: 'GET /advisor/health',
        advise: 'POST /advisor/advise',
        history: 'GET /advisor/history',
        compare: 'POST /advisor/compare',
      },
    });
  });

  app.use('/advisor', advisorRouter(container));
  app.use(errorHandler(container.logger));

  return app;
};
