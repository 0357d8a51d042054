import express from 'express';
import { loadConfig } from './config.js';
import { InMemoryStore } from './storage.js';
import { Controllers } from './controllers.js'

/**
 * Builds the self-hosted collector the buffered tracker posts its batches to
 */
export const createApp = (store: InMemoryStore = new InMemoryStore()): express.Application => {
  const app = express();
  const controllers = new Controllers(store)

  // Middleware, needed for parsing JSON batches
  app.use(express.json({ limit: '256kb' }));

  // Routes
  app.post('/events', controllers.ingestEvents);
  app.get('/metrics', controllers.getMetrics);
  app.get('/funnel', controllers.getFunnel);
  app.get('/healthz', controllers.healthCheck);

  return app;
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const app = createApp();
  app.listen(config.port, () => {
    console.log(`Collector is running on http://localhost:${config.port}`);
    console.log(`Tracking vendor: ${config.vendor}, batch size: ${config.batchSize}`);
  });
}
