/**
 * Twilio WhatsApp Webhook
 *
 * Twilio posts each inbound message as a form. The reply goes back in the
 * response body as TwiML, so every outcome is a 200 with a message.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import twilio from 'twilio';
import type { ConversationEngine } from '../services/conversation-engine';
import { REPLIES } from '../services/conversation-engine';
import { sanitizeWhatsAppNumber } from '../services/messenger';

// Types for Hono context
export interface WebhookEnv {
  Variables: {
    engine: ConversationEngine;
  };
}

const TWIML_HEADERS = { 'Content-Type': 'text/xml' };

const inboundMessageSchema = z.object({
  From: z.string().trim().min(1),
  Body: z.string().trim().min(1),
});

/**
 * Create webhook routes
 */
export function createWebhookRoutes(): Hono<WebhookEnv> {
  const app = new Hono<WebhookEnv>();

  /**
   * POST /webhook/twilio - Handle an inbound WhatsApp message
   */
  app.post(
    '/twilio',
    zValidator('form', inboundMessageSchema, (result, c) => {
      if (!result.success) {
        return c.body(buildTwimlMessage(REPLIES.emptyMessage), 200, TWIML_HEADERS);
      }
    }),
    async (c) => {
      const { From, Body } = c.req.valid('form');
      const engine = c.get('engine');

      const userId = sanitizeWhatsAppNumber(From);
      const reply = await engine.handleMessage(userId, Body);

      return c.body(buildTwimlMessage(reply), 200, TWIML_HEADERS);
    }
  );

  return app;
}

/**
 * Wrap reply text in a TwiML <Message>
 */
export function buildTwimlMessage(text: string): string {
  const response = new twilio.twiml.MessagingResponse();
  response.message(text);
  return response.toString();
}
