/**
 * Main server entry point for the knowledge graph HTTP server
 *
 * Reads configuration from the environment, opens the record store,
 * optionally seeds a collection and serves the API with Hono.
 */

import { serve } from '@hono/node-server';
import { loadEngineConfig } from '../config.js';
import { KnowledgeGraphService } from '../service/knowledge-graph-service.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';
import { createApp } from './api.js';
import { seedCollectionFromFile } from './seed.js';

async function main(): Promise<void> {
  const config = loadEngineConfig();
  const { port, host, seedFile, seedCollection } = config.server;

  console.log(`🧠 Starting Knowledge Graph Server...`);
  console.log(`💾 Storage: ${config.storage.type}${config.storage.type === 'jsonl' ? ` (${config.storage.directory})` : ''}`);

  const service = await KnowledgeGraphService.create(config);

  if (seedFile) {
    console.log(`🌱 Seeding ${seedCollection} from ${seedFile}...`);
    const seeded = await seedCollectionFromFile(service, seedFile, seedCollection);
    if (!seeded.success) {
      console.log(`⚠️  Seeding completed with errors:`);
      seeded.errors.forEach(error => console.log(`   - ${error}`));
    }
  }

  const app = createApp(service, config);
  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host
  }, info => {
    console.log(`✅ Knowledge Graph Server is running on http://${info.address}:${info.port}`);
    console.log(`🔗 API root: http://${info.address}:${info.port}/api/collections`);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`\n🛑 ${signal} received, shutting down Knowledge Graph Server...`);
    server.close(() => {
      service.close().then(
        () => process.exit(0),
        error => {
          ErrorHandler.handle(ErrorCategory.STORAGE, error, { phase: 'shutdown' });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  ErrorHandler.handle(ErrorCategory.CONFIGURATION, error, { phase: 'startup' });
  process.exit(1);
});
