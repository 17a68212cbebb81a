/**
 * Intent Classifier
 *
 * Keyword rules are checked first and always win. Only messages they do not
 * recognise go to the optional text classifier; any failure there means the
 * message is treated as a new reminder.
 */

import type { ClassifiedIntent, TextIntelligence } from '../../../../packages/shared-types/src';
import { extractDeleteKeyword } from './delete-parser';
import { TextIntelligenceNotConfiguredError, describeError } from './errors';

const CLEAR_ALL_PHRASES = new Set([
  'clear all reminders',
  'clear reminders',
  'delete all reminders',
]);

const HELP_WORDS = new Set(['help', '?', 'menu', 'commands']);

export class IntentClassifier {
  constructor(private textIntelligence?: TextIntelligence) {}

  async classify(message: string): Promise<ClassifiedIntent> {
    const ruleMatch = classifyByRules(message);
    if (ruleMatch) {
      return ruleMatch;
    }

    if (!this.textIntelligence) {
      return { intent: 'add_reminder' };
    }

    try {
      const intent = await this.textIntelligence.classifyIntent(message);
      switch (intent) {
        case 'delete_reminder':
          return { intent, keyword: extractDeleteKeyword(message) };
        case 'list_reminders':
        case 'clear_reminders':
        case 'help':
        case 'add_reminder':
          return { intent };
        default:
          return { intent: 'add_reminder' };
      }
    } catch (error) {
      if (!(error instanceof TextIntelligenceNotConfiguredError)) {
        console.error('[IntentClassifier] Classification error:', describeError(error));
      }
      return { intent: 'add_reminder' };
    }
  }
}

/**
 * Deterministic rules, in priority order. Returns null when none match.
 */
export function classifyByRules(message: string): ClassifiedIntent | null {
  const normalized = normalizePhrase(message);

  if (CLEAR_ALL_PHRASES.has(normalized)) {
    return { intent: 'clear_reminders' };
  }
  if (isListRequest(normalized)) {
    return { intent: 'list_reminders' };
  }

  const keyword = extractDeleteKeyword(message);
  if (keyword) {
    return { intent: 'delete_reminder', keyword };
  }

  if (HELP_WORDS.has(normalized)) {
    return { intent: 'help' };
  }
  return null;
}

export function isListRequest(lowerMessage: string): boolean {
  return (
    (lowerMessage.includes('list') || lowerMessage.includes('show')) &&
    lowerMessage.includes('reminder')
  );
}

/**
 * Lowercase, collapse whitespace, drop trailing "." and "!"
 */
function normalizePhrase(message: string): string {
  return message
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.!]+$/, '')
    .trim();
}
