import { Hono } from 'hono';
import type { DocumentIndexStatus, HealthResponse } from '@tonecraft/shared';
import type { ServiceRegistry } from '../registry.js';
import { errorMessage } from '../lib/errors.js';

export const createHealthRoutes = ({ engine, pipeline, documentIndex, preferences }: ServiceRegistry) => {
  const routes = new Hono();

  const indexStatus = async (): Promise<DocumentIndexStatus> => {
    if (!documentIndex.available) return { ready: false, count: 0 };
    try {
      return await documentIndex.handle.status();
    } catch (err) {
      console.warn(`[Health] Document index status failed: ${errorMessage(err)}`);
      return { ready: false, count: 0 };
    }
  };

  routes.get('/', async (c) => {
    const response: HealthResponse = {
      status: 'ok',
      service: 'tonecraft-api',
      openai_available: engine.available,
      specialized_endpoint_reachable: pipeline.available && pipeline.handle.getStatus().specializedReachable,
      document_index: { available: documentIndex.available, ...(await indexStatus()) },
      preference_store_available: preferences.available,
      timestamp: new Date().toISOString(),
    };
    return c.json(response);
  });

  return routes;
};
