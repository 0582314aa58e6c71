import type { Express, Request, Response } from 'express';
import { createFindingsRouter } from './routes/findings.js';
import { createPrecomputationRouter } from './routes/precomputation.js';
import type { Services } from './services.js';

export function registerRoutes(app: Express, services: Services): void {
  app.use('/api/findings', createFindingsRouter(services));
  app.use('/api/precomputation', createPrecomputationRouter(services));

  // Health check for deploy monitoring
  app.get('/health', async (_req: Request, res: Response) => {
    const database = await services.healthCheck();
    res.status(database ? 200 : 503).json({
      status: database ? 'healthy' : 'degraded',
      database,
      generator: services.generator.name,
      schemaVersion: services.config.findings.schemaVersion,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });
}
