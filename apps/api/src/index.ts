/**
 * Reminder Bot API
 *
 * Builds the Hono application: the Twilio webhook plus a health check.
 * The process entry point lives in ./server.ts.
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { ConversationEngine } from './services/conversation-engine';
import { createWebhookRoutes, type WebhookEnv } from './routes/webhook';

/**
 * Create the API application
 */
export function createApp(config: { engine: ConversationEngine }): Hono<WebhookEnv> {
  const app = new Hono<WebhookEnv>();

  // Middleware
  app.use('*', logger());
  app.use('*', async (c, next) => {
    c.set('engine', config.engine);
    await next();
  });

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // Mount routes
  app.route('/webhook', createWebhookRoutes());

  // Error handler
  app.onError((err, c) => {
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
