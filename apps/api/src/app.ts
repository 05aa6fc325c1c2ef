import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { ServiceRegistry } from './registry.js';
import { AppError } from './lib/errors.js';
import { createHealthRoutes } from './routes/health.js';
import { createConversionRoutes } from './routes/conversion.js';
import { createFinetuneRoutes } from './routes/finetune.js';
import { createRagRoutes } from './routes/rag.js';
import { createFeedbackRoutes } from './routes/feedback.js';
import { createProfileRoutes } from './routes/profile.js';

export interface AppOptions {
  corsOrigin: string;
  requestLogging?: boolean;
}

export const createApp = (registry: ServiceRegistry, { corsOrigin, requestLogging = true }: AppOptions) => {
  const app = new Hono();

  // Global middleware
  if (requestLogging) app.use('*', logger());
  app.use('/api/*', cors({
    origin: corsOrigin,
    allowHeaders: ['Content-Type'],
    allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  }));

  app.route('/health', createHealthRoutes(registry));
  app.route('/api/conversion', createConversionRoutes(registry));
  app.route('/api/finetune', createFinetuneRoutes(registry));
  app.route('/api/rag', createRagRoutes(registry));
  app.route('/api/feedback', createFeedbackRoutes(registry));
  app.route('/api/profile', createProfileRoutes(registry));

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json({ error: err.message, ...(err.code ? { code: err.code } : {}) }, err.statusCode);
    }
    console.error('[Server] Unhandled error:', err);
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  return app;
};
