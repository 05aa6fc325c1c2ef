import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './lib/config.js';
import { createServiceRegistry } from './registry.js';
import { createApp } from './app.js';

const start = async () => {
  const config = loadConfig();
  const registry = await createServiceRegistry(config);
  const app = createApp(registry, { corsOrigin: config.corsOrigin });

  console.log(`Server starting on port ${config.port}...`);
  const server = serve({ fetch: app.fetch, port: config.port });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    registry.close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

start().catch((err) => {
  console.error('Server failed to start:', err);
  process.exit(1);
});
