import express from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';
import { apiRouter } from './routes';
import { pagesRouter } from './routes/pages';
import { errorHandler } from './middleware/errorHandler';
import type { BattleService } from './services/battleService';

export interface AppOptions {
  battleService: BattleService;
  corsOrigin: string;
}

export function createApp({ battleService, corsOrigin }: AppOptions) {
  const app = express();

  app.use(cors({
    origin: corsOrigin,
    credentials: true,
  }));

  // Body parsing: JSON for the API, urlencoded for the HTML form
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));

  // Request logging with pino-http
  app.use(pinoHttp({
    logger,
    genReqId: () => uuidv4(),
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        query: req.query,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/v1', apiRouter(battleService));
  app.use('/', pagesRouter(battleService));

  app.use(errorHandler);

  return app;
}
