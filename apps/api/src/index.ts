/**
 * Message Router API
 *
 * Builds the Hono application. Components are constructed by the caller
 * (see server.ts) and injected here, so tests can supply fakes.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import type { AppConfig } from './config/env';
import { createMessageRoutes, type RouterEnv } from './routes/messages';
import { createClaudeClient, type ClaudeClient } from './services/claude-client';
import { ClassifierGateway } from './services/classifier-gateway';
import { DispatchRouter } from './services/dispatch-router';
import { DownstreamForwarder } from './services/downstream-forwarder';
import { MessagePipeline } from './services/message-pipeline';
import { PersistenceGateway, type TaskStoreConnection } from './services/persistence-gateway';
import { ReconciliationLinker } from './services/reconciliation-linker';

export interface AppDependencies {
  pipeline: MessagePipeline;
  /** Disable request logging (tests) */
  quiet?: boolean;
}

/**
 * Build the message pipeline from configuration
 */
export function createPipeline(
  config: AppConfig,
  store: TaskStoreConnection,
  overrides: { claudeClient?: ClaudeClient; fetch?: typeof fetch } = {}
): MessagePipeline {
  const persistence = new PersistenceGateway(store);

  const classifier = new ClassifierGateway({
    client:
      overrides.claudeClient ??
      createClaudeClient({
        apiKey: config.classifier.apiKey,
        model: config.classifier.model,
        defaultTimeoutMs: config.classifier.timeoutMs,
      }),
    timeZone: config.timeZone,
    timeoutMs: config.classifier.timeoutMs,
  });

  const router = new DispatchRouter({
    persistence,
    forwarder: new DownstreamForwarder({ handlers: config.handlers, fetch: overrides.fetch }),
    linker: new ReconciliationLinker(persistence, { emailLinkBase: config.emailLinkBase }),
    timeZone: config.timeZone,
  });

  return new MessagePipeline({
    classifier,
    router,
    timeZone: config.timeZone,
    agentSource: config.agentSource,
    fallbackEmail: config.fallbackEmail,
  });
}

/**
 * Create the API application
 */
export function createApp(deps: AppDependencies): Hono<RouterEnv> {
  const app = new Hono<RouterEnv>();

  // Middleware
  if (!deps.quiet) {
    app.use('*', logger());
  }

  app.use('*', async (c, next) => {
    c.set('pipeline', deps.pipeline);
    await next();
  });

  // Health check
  app.get('/', (c) => c.json({ status: 'ok' }));
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // Mount routes
  app.route('/route', createMessageRoutes());

  // Error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.body(JSON.stringify({ error: err.message }), err.status, {
        'Content-Type': 'application/json',
      });
    }
    console.error('[API] Error:', err);
    return c.json(
      {
        error: 'Internal Server Error',
        message: err instanceof Error ? err.message : 'Unknown error',
      },
      500
    );
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found' }, 404);
  });

  return app;
}
