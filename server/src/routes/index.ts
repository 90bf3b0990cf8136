// =============================================================================
// Route index — registers all route groups on the Express app.
//
//   /health        liveness probe
//   /api/*         analytics (status, summary, employees, reload-data)
//   /api/analyze   AI analysis
//
// Routers are built from the engine passed in by createApp(); nothing here
// reaches for a module-level instance.
// =============================================================================

import type { Express } from 'express';
import healthRouter from './health';
import { createAnalyticsRouter } from './analytics';
import { createAiRouter } from './ai';
import type { AnalyticsEngine } from '../services/analytics.engine';
import type { AppConfig } from '../config';

export function registerRoutes(app: Express, engine: AnalyticsEngine, config: AppConfig): void {
    app.use('/health', healthRouter);
    app.use('/api', createAnalyticsRouter(engine));
    app.use('/api', createAiRouter(engine, config));
}
