import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { errorMessage } from './errors.js';
import { registerRoutes } from './routes.js';
import type { Services } from './services.js';

const MAX_LOG_LINE = 120;

export function createApp(services: Services): Express {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Request logging for the API surface
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    res.on('finish', () => {
      if (!path.startsWith('/api')) return;
      let line = `${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`;
      if (line.length > MAX_LOG_LINE) line = `${line.slice(0, MAX_LOG_LINE - 1)}…`;
      console.log(`[express] ${line}`);
    });
    next();
  });

  registerRoutes(app, services);

  // Malformed JSON bodies and anything a route did not handle itself
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error);
    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;
    if (status >= 500) console.error('❌ [API] Unhandled error:', errorMessage(error));
    res.status(status).json({ success: false, error: errorMessage(error), code: status >= 500 ? 'INTERNAL_ERROR' : 'INVALID_REQUEST' });
  });

  return app;
}
