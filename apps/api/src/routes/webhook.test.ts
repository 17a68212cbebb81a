/**
 * Webhook Route Tests
 *
 * Drives the full app through app.request() with the in-memory repository.
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { createApp } from '../index';
import { ConversationEngine, REPLIES } from '../services/conversation-engine';
import { ConversationStore } from '../services/conversation-store';
import { IntentClassifier } from '../services/intent-classifier';
import { InMemoryReminderRepository } from '../services/memory-repository';
import { FallbackTextIntelligence } from '../services/text-intelligence';
import { buildTwimlMessage } from './webhook';

function postMessage(app: ReturnType<typeof createApp>, fields: Record<string, string>) {
  return app.request('/webhook/twilio', {
    method: 'POST',
    body: new URLSearchParams(fields),
  });
}

describe('Webhook Routes', () => {
  let store: ConversationStore;
  let repository: InMemoryReminderRepository;
  let engine: ConversationEngine;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    store = new ConversationStore();
    repository = new InMemoryReminderRepository();
    engine = new ConversationEngine({
      repository,
      store,
      classifier: new IntentClassifier(),
      textIntelligence: new FallbackTextIntelligence(),
    });
    app = createApp({ engine });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('POST /webhook/twilio', () => {
    test('replies with TwiML', async () => {
      const res = await postMessage(app, { From: 'whatsapp:+15550001', Body: 'buy milk' });

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toContain('text/xml');
      expect(await res.text()).toContain(`<Message>${REPLIES.priorityPrompt}</Message>`);
    });

    test('keys conversation state by the bare phone number', async () => {
      await postMessage(app, { From: 'whatsapp:+15550001', Body: 'buy milk' });
      await postMessage(app, { From: 'whatsapp:+15550001', Body: '3' });

      const saved = await repository.listByUser('+15550001');
      expect(saved).toHaveLength(1);
      expect(saved[0]).toMatchObject({ content: 'buy milk', priority: 3 });
      expect(store.isAwaitingPriority('+15550001')).toBe(false);
    });

    test('asks for a message when Body is missing', async () => {
      const res = await postMessage(app, { From: 'whatsapp:+15550001' });

      expect(res.status).toBe(200);
      expect(await res.text()).toContain(`<Message>${REPLIES.emptyMessage}</Message>`);
    });

    test('asks for a message when Body is blank', async () => {
      const res = await postMessage(app, { From: 'whatsapp:+15550001', Body: '   ' });

      expect(await res.text()).toContain(`<Message>${REPLIES.emptyMessage}</Message>`);
      expect(store.size()).toBe(0);
    });

    test('asks for a message when From is missing', async () => {
      const res = await postMessage(app, { Body: 'buy milk' });

      expect(await res.text()).toContain(`<Message>${REPLIES.emptyMessage}</Message>`);
    });

    test('returns a JSON 500 when handling throws', async () => {
      vi.spyOn(engine, 'handleMessage').mockRejectedValue(new Error('engine exploded'));

      const res = await postMessage(app, { From: 'whatsapp:+15550001', Body: 'buy milk' });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'Internal Server Error',
        message: 'engine exploded',
      });
    });
  });

  describe('other routes', () => {
    test('GET /health', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });

    test('unknown routes return 404 JSON', async () => {
      const res = await app.request('/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not Found' });
    });
  });
});

describe('buildTwimlMessage', () => {
  test('escapes XML in the reply', () => {
    expect(buildTwimlMessage('milk & eggs <2>')).toContain(
      '<Response><Message>milk &amp; eggs &lt;2&gt;</Message></Response>'
    );
  });
});
