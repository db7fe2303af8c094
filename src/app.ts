import express from 'express';
import helmet from 'helmet';
import pino from 'pino';
import { healthRouter } from './routes/health.js';
import { statusRouter, type StatusSource } from './routes/status.js';

const logger = pino({ name: 'http' });

export interface AppOptions {
  loop: StatusSource;
  healthCheck?: () => Promise<unknown>;
}

export function createApp({ loop, healthCheck }: AppOptions): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(healthRouter(healthCheck));
  app.use('/api/status', statusRouter(loop));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
