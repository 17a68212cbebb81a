/**
 * Process entry point: load config, wire services, serve HTTP and run the
 * reminder dispatcher until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import type { ReminderRepository } from '../../../packages/shared-types/src';
import { loadConfig } from './config/env';
import { createApp } from './index';
import { ConversationEngine } from './services/conversation-engine';
import { ConversationStore } from './services/conversation-store';
import { describeError } from './services/errors';
import { IntentClassifier } from './services/intent-classifier';
import { InMemoryReminderRepository } from './services/memory-repository';
import { createMessenger } from './services/messenger';
import { createTextIntelligence } from './services/text-intelligence';
import { createReminderDispatcher } from './worker/reminder-dispatcher';

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error('[API] Uncaught exception:', error);
  console.error('[API] Stack:', error.stack);
});

process.on('unhandledRejection', (reason) => {
  console.error('[API] Unhandled rejection:', reason);
});

console.log('[API] Starting server...');
console.log('[API] Environment:', process.env.NODE_ENV || 'development');

const config = loadConfig();

if (config.timeZone) {
  // Date and the cron trigger both read the process zone
  process.env.TZ = config.timeZone;
}
console.log('[API] Time zone:', Intl.DateTimeFormat().resolvedOptions().timeZone);

let repository: ReminderRepository;
let closeDatabase: () => Promise<void> = async () => {};

if (config.databaseUrl) {
  console.log('[API] Loading database module...');
  const { createDatabase, DrizzleReminderRepository } = await import('../../../packages/db/src');
  const database = createDatabase(config.databaseUrl);
  repository = new DrizzleReminderRepository(database.db);
  closeDatabase = database.close;
} else {
  console.warn('[API] DATABASE_URL not set, reminders are kept in memory only.');
  repository = new InMemoryReminderRepository();
}

console.log('[API] OPENAI_API_KEY:', config.openai.apiKey ? 'SET (hidden)' : 'NOT SET');
const textIntelligence = createTextIntelligence({
  apiKey: config.openai.apiKey,
  model: config.openai.model,
});

console.log('[API] TWILIO_AUTH_TOKEN:', config.twilio.authToken ? 'SET (hidden)' : 'NOT SET');
const messenger = createMessenger({
  accountSid: config.twilio.accountSid,
  authToken: config.twilio.authToken,
  fromNumber: config.twilio.whatsAppNumber,
});

const store = new ConversationStore({ pendingTtlMs: config.pendingTtlMs });
const engine = new ConversationEngine({
  repository,
  store,
  classifier: new IntentClassifier(textIntelligence),
  textIntelligence,
});

const app = createApp({ engine });

const dispatcher = createReminderDispatcher({
  repository,
  messenger,
  cronExpression: config.dispatch.cronExpression,
  spacingMs: config.dispatch.spacingMs,
});
dispatcher.start();

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[API] Server running at http://localhost:${info.port}`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[API] ${signal} received, shutting down...`);

  await dispatcher.stop();

  await new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      console.warn(
        `[API] In-flight requests still open after ${config.shutdownTimeoutMs}ms, closing them`
      );
      if ('closeAllConnections' in server) {
        server.closeAllConnections();
      }
      resolve();
    }, config.shutdownTimeoutMs);

    server.close((error) => {
      clearTimeout(timer);
      if (error) {
        console.error('[API] Server shutdown error:', describeError(error));
      }
      resolve();
    });
  });

  const pending = store.size();
  if (pending > 0) {
    // Pending text lives in memory only
    console.log(`[API] Dropping ${pending} reminder(s) still awaiting a priority`);
  }

  await closeDatabase();
  console.log('[API] Stopped');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('[API] Shutdown failed:', describeError(error));
        process.exit(1);
      });
  });
}
