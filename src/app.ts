import cors from 'cors';
import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import register from './metrics/metrics.js';
import errorMiddleware from './middleware/errorMiddleware.js';
import instrumentMiddleware from './middleware/instrumentMiddleware.js';
import { createCacheRoutes } from './routes/cacheRoutes.js';
import { createLookupRoutes } from './routes/lookupRoutes.js';
import { createRequestRoutes } from './routes/requestRoutes.js';
import { createUserRoutes } from './routes/userRoutes.js';
import type { GovernanceContext } from './services/governanceContext.js';
import { asyncHandler } from './utils/asyncHandler.js';

const allowedOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'];

export const createApp = (context: GovernanceContext): Express => {
  const app = express();

  if (process.env.NODE_ENV !== 'production') {
    app.use(
      cors({
        origin: allowedOrigins,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      }),
    );
  }

  app.use(helmet());
  app.use(express.json());
  app.use(instrumentMiddleware);

  app.get('/api/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get(
    '/api/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', register.contentType);
      res.send(await register.metrics());
    }),
  );

  app.use('/api/cache', createCacheRoutes(context));
  app.use('/api/requests', createRequestRoutes(context));
  app.use('/api', createUserRoutes(context));
  app.use('/api', createLookupRoutes(context));

  app.use(errorMiddleware);

  return app;
};
