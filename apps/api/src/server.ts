/**
 * Server entry point
 *
 * Loads configuration, wires the pipeline components over PostgreSQL and the
 * Claude client, and serves the API with @hono/node-server.
 */

import { serve } from '@hono/node-server';
import { createDatabase } from '../../../packages/db/src';
import { createApp, createPipeline } from './index';
import { loadConfig } from './config/env';
import { createTaskStore } from './services/task-store';

function main(): void {
  process.on('unhandledRejection', (reason) => {
    console.error('[API] Unhandled rejection:', reason);
  });

  console.log('[API] Starting server...');
  console.log('[API] Environment:', process.env.NODE_ENV || 'development');

  const config = loadConfig(process.env);
  if (!config.databaseUrl) {
    console.error('[API] ERROR: DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const { db, client } = createDatabase(config.databaseUrl, { debug: config.dbDebug });
  const app = createApp({ pipeline: createPipeline(config, createTaskStore(db)) });

  const configured = Object.entries(config.handlers)
    .filter(([, endpoint]) => endpoint.url)
    .map(([kind]) => kind);
  console.log('[API] Handlers configured:', configured.length > 0 ? configured.join(', ') : 'none');

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[API] Server running at http://localhost:${info.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[API] ${signal} received, shutting down...`);
    server.close();
    client
      .end({ timeout: 5 })
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[API] Failed to close database client:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
