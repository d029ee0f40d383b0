import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { config, type CorsOrigins } from './config/env.js';
import { RegistryError } from './errors.js';
import { createActivitiesRouter } from './routes/activities.js';
import type { ActivityRegistry } from './services/registry.js';
import { logger } from './utils/logger.js';

export const STATIC_INDEX_PATH = '/static/index.html';

// Status carried by errors from Express internals such as param decoding
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export interface AppOptions {
  registry: ActivityRegistry;
  staticDir?: string;
  corsOrigins?: CorsOrigins;
}

export function createApp({
  registry,
  staticDir = config.STATIC_DIR,
  corsOrigins = config.CORS_ORIGINS
}: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: corsOrigins }));
  app.use(morgan('dev', {
    stream: { write: (line: string) => logger.http(line.trim()) },
    skip: () => config.NODE_ENV === 'test'
  }));

  app.get('/', (_req: Request, res: Response) => {
    res.redirect(307, STATIC_INDEX_PATH);
  });

  app.use('/static', express.static(staticDir));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activities: registry.size
    });
  });

  app.use('/activities', createActivitiesRouter(registry));

  // Handle 404
  app.use((req: Request, res: Response) => {
    logger.debug(`404 Not Found: ${req.method} ${req.originalUrl}`);
    res.status(404).json({ detail: 'Not Found' });
  });

  // Error handling
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (err instanceof RegistryError) {
      return res.status(err.status).json({ detail: err.detail });
    }

    const status = clientErrorStatus(err);
    if (status !== undefined) {
      logger.warn('Client error', {
        tags: ['http', 'client-error'],
        method: req.method,
        url: req.originalUrl,
        status,
        error: err instanceof Error ? err.message : String(err)
      });
      return res.status(status).json({ detail: err instanceof Error ? err.message : 'Bad Request' });
    }

    logger.error('Unhandled error', {
      tags: ['http', 'error'],
      method: req.method,
      url: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined
    });
    res.status(500).json({ detail: 'Internal Server Error' });
  });

  return app;
}
