/**
 * Text Intelligence Client
 *
 * Wraps the OpenAI chat completions API to provide:
 * - classifyIntent(): label a free-form message for the reminder bot
 * - summarize(): shorten reminder text to one sentence
 *
 * Without an API key the fallback client is used instead: classification
 * rejects with TextIntelligenceNotConfiguredError and summaries are plain
 * truncation.
 */

import OpenAI from 'openai';
import type { Intent, TextIntelligence } from '../../../../packages/shared-types/src';
import { isIntent } from '../../../../packages/shared-types/src';
import { TextIntelligenceNotConfiguredError } from './errors';

export const SUMMARY_MAX_LENGTH = 80;

const CLASSIFY_TIMEOUT_MS = 10_000;
const SUMMARIZE_TIMEOUT_MS = 15_000;

const CLASSIFY_SYSTEM_PROMPT =
  "Classify the user's request for a reminder bot. Reply with exactly one label: " +
  'add_reminder, list_reminders, delete_reminder, clear_reminders, help, or unknown.';

const SUMMARIZE_SYSTEM_PROMPT = 'You summarise reminder texts in one short sentence.';

/**
 * A single system + user chat completion
 */
export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export type CompleteFn = (request: CompletionRequest) => Promise<string>;

/**
 * Configuration for the OpenAI-backed client
 */
export interface OpenAITextIntelligenceConfig {
  apiKey: string;
  /** Defaults to gpt-4o-mini */
  model?: string;
  /** Replaces the OpenAI call, for tests */
  complete?: CompleteFn;
}

export class OpenAITextIntelligence implements TextIntelligence {
  private complete: CompleteFn;

  constructor(config: OpenAITextIntelligenceConfig) {
    this.complete =
      config.complete ??
      createOpenAICompletion(
        new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }),
        config.model ?? 'gpt-4o-mini'
      );
  }

  async classifyIntent(text: string): Promise<Intent> {
    requireContent(text);

    const label = await this.complete({
      system: CLASSIFY_SYSTEM_PROMPT,
      user: text,
      temperature: 0,
      maxTokens: 8,
      timeoutMs: CLASSIFY_TIMEOUT_MS,
    });

    const normalized = label.trim().toLowerCase();
    return isIntent(normalized) ? normalized : 'unknown';
  }

  async summarize(text: string): Promise<string> {
    requireContent(text);

    const summary = await this.complete({
      system: SUMMARIZE_SYSTEM_PROMPT,
      user: `Summarise the following reminder in one sentence: ${text}`,
      temperature: 0.3,
      maxTokens: 60,
      timeoutMs: SUMMARIZE_TIMEOUT_MS,
    });

    const trimmed = summary.trim();
    if (!trimmed) {
      throw new Error('empty summary received');
    }
    return trimmed;
  }
}

/**
 * Used when no API key is configured
 */
export class FallbackTextIntelligence implements TextIntelligence {
  async classifyIntent(_text: string): Promise<Intent> {
    throw new TextIntelligenceNotConfiguredError();
  }

  async summarize(text: string): Promise<string> {
    requireContent(text);
    return truncateSummary(text);
  }
}

/**
 * Cut text to SUMMARY_MAX_LENGTH characters, marking the cut with "..."
 */
export function truncateSummary(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= SUMMARY_MAX_LENGTH) {
    return text;
  }
  return chars.slice(0, SUMMARY_MAX_LENGTH).join('') + '...';
}

function requireContent(text: string): void {
  if (!text.trim()) {
    throw new Error('content cannot be empty');
  }
}

function createOpenAICompletion(client: OpenAI, model: string): CompleteFn {
  return async (request) => {
    const response = await client.chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { timeout: request.timeoutMs }
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('no completion received');
    }
    return content;
  };
}

/**
 * Create a text intelligence client based on configuration
 */
export function createTextIntelligence(config: {
  apiKey?: string;
  model?: string;
}): TextIntelligence {
  if (!config.apiKey) {
    console.warn('[TextIntelligence] OPENAI_API_KEY not set, using fallback client.');
    return new FallbackTextIntelligence();
  }

  console.log(`[TextIntelligence] Using OpenAI (${config.model ?? 'gpt-4o-mini'})`);
  return new OpenAITextIntelligence({ apiKey: config.apiKey, model: config.model });
}
