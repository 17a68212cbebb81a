/**
 * Outbound WhatsApp messaging via Twilio
 */

import twilio from 'twilio';
import type { Messenger } from '../../../../packages/shared-types/src';

/**
 * The subset of the Twilio REST client the messenger uses
 */
export interface TwilioMessagesApi {
  messages: {
    create(params: { to: string; from: string; body: string }): Promise<{ sid: string }>;
  };
}

export interface TwilioMessengerConfig {
  accountSid: string;
  authToken: string;
  /** Sender number, with or without the whatsapp: prefix */
  fromNumber: string;
  /** Replaces the Twilio REST client, for tests */
  client?: TwilioMessagesApi;
}

export class TwilioMessenger implements Messenger {
  private client: TwilioMessagesApi;
  private sender: string;

  constructor(config: TwilioMessengerConfig) {
    this.client = config.client ?? twilio(config.accountSid, config.authToken);
    this.sender = normalizeWhatsAppAddress(config.fromNumber);
  }

  async send(userId: string, body: string): Promise<void> {
    if (!this.sender) {
      throw new Error('twilio sender WhatsApp number is not configured');
    }

    const recipient = normalizeWhatsAppAddress(userId);
    if (!recipient) {
      throw new Error('recipient number missing or invalid');
    }

    console.log(`[Messenger] Sending WhatsApp message to ${recipient}`);
    const message = await this.client.messages.create({
      to: recipient,
      from: this.sender,
      body,
    });
    console.log(`[Messenger] Twilio message sent, SID: ${message.sid}`);
  }
}

/**
 * Logs messages instead of sending them. Used when Twilio credentials are
 * missing.
 */
export class ConsoleMessenger implements Messenger {
  async send(userId: string, body: string): Promise<void> {
    console.log(`[Messenger] (not sent) to ${userId}: ${body}`);
  }
}

/**
 * Twilio addresses WhatsApp numbers as "whatsapp:+<E.164>"
 */
export function normalizeWhatsAppAddress(number: string): string {
  const trimmed = number.trim();
  if (!trimmed) {
    return '';
  }
  if (trimmed.startsWith('whatsapp:')) {
    return trimmed;
  }
  if (trimmed.startsWith('+')) {
    return `whatsapp:${trimmed}`;
  }
  return `whatsapp:+${trimmed}`;
}

/**
 * Inverse of normalizeWhatsAppAddress for inbound webhook senders
 */
export function sanitizeWhatsAppNumber(from: string): string {
  return from.trim().replace(/^whatsapp:/, '');
}

/**
 * Create a messenger based on configuration
 */
export function createMessenger(config: {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
}): Messenger {
  if (!config.accountSid || !config.authToken) {
    console.warn('[Messenger] Twilio credentials not set, reminders will only be logged.');
    return new ConsoleMessenger();
  }
  if (!config.fromNumber) {
    console.warn('[Messenger] TWILIO_WHATSAPP_NUMBER not set, sends will fail.');
  }

  return new TwilioMessenger({
    accountSid: config.accountSid,
    authToken: config.authToken,
    fromNumber: config.fromNumber ?? '',
  });
}
