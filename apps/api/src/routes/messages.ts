/**
 * Message Routing API
 *
 * POST /route - classify a free-text message and dispatch it.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { RouteOutcome } from '../../../../packages/shared-types/src';
import type { MessagePipeline } from '../services/message-pipeline';

// Types for Hono context
export interface RouterEnv {
  Variables: {
    pipeline: MessagePipeline;
  };
}

// Request validation schema
const routeMessageSchema = z.object({
  message: z.string().default(''),
});

function statusFor(outcome: RouteOutcome): 200 | 404 | 502 {
  switch (outcome) {
    case 'not_found':
      return 404;
    case 'persistence_error':
      return 502;
    default:
      return 200;
  }
}

/**
 * Create message routing routes
 */
export function createMessageRoutes(): Hono<RouterEnv> {
  const app = new Hono<RouterEnv>();

  app.post(
    '/',
    zValidator('json', routeMessageSchema, (result, c) => {
      if (!result.success) {
        return c.json({ error: 'Request body must be {"message": string}' }, 400);
      }
    }),
    async (c) => {
      const message = c.req.valid('json').message.trim();

      if (!message) {
        return c.json({ error: 'Empty message' }, 400);
      }

      const pipeline = c.get('pipeline');
      const result = await pipeline.route(message);

      return c.json(result, statusFor(result.outcome));
    }
  );

  return app;
}
