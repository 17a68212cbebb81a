/**
 * Intent Classifier Unit Tests
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Intent, TextIntelligence } from '../../../../packages/shared-types/src';
import { IntentClassifier, classifyByRules } from './intent-classifier';
import { FallbackTextIntelligence } from './text-intelligence';

function createMockIntelligence(classify: (text: string) => Promise<Intent>) {
  return {
    classifyIntent: vi.fn(classify),
    summarize: vi.fn(async (text: string) => text),
  } satisfies TextIntelligence;
}

describe('classifyByRules', () => {
  test('recognises the clear-all vocabulary', () => {
    expect(classifyByRules('clear all reminders')).toEqual({ intent: 'clear_reminders' });
    expect(classifyByRules('Clear Reminders')).toEqual({ intent: 'clear_reminders' });
    expect(classifyByRules('  delete   all reminders! ')).toEqual({ intent: 'clear_reminders' });
  });

  test('clear-all needs a near-exact phrase', () => {
    expect(classifyByRules('please clear all reminders for me')).toBeNull();
  });

  test('recognises list requests by keyword', () => {
    expect(classifyByRules('list reminders')).toEqual({ intent: 'list_reminders' });
    expect(classifyByRules('Show my reminders please')).toEqual({ intent: 'list_reminders' });
    expect(classifyByRules('can you list all my reminders?')).toEqual({ intent: 'list_reminders' });
  });

  test('list takes precedence over delete', () => {
    expect(classifyByRules('delete the list of reminders')).toEqual({ intent: 'list_reminders' });
  });

  test('recognises delete requests with a target', () => {
    expect(classifyByRules('delete reminder about rent')).toEqual({
      intent: 'delete_reminder',
      keyword: 'rent',
    });
    expect(classifyByRules('delete 2, 3')).toEqual({ intent: 'delete_reminder', keyword: '2, 3' });
  });

  test('delete without a target is left to the classifier', () => {
    expect(classifyByRules('delete reminder')).toBeNull();
  });

  test('recognises bare help words', () => {
    expect(classifyByRules('Help')).toEqual({ intent: 'help' });
    expect(classifyByRules('?')).toEqual({ intent: 'help' });
    expect(classifyByRules('help me remember the keys')).toBeNull();
  });

  test('returns null for free-form text', () => {
    expect(classifyByRules('buy milk')).toBeNull();
  });
});

describe('IntentClassifier', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('defaults to add without a text capability', async () => {
    const classifier = new IntentClassifier();

    expect(await classifier.classify('buy milk')).toEqual({ intent: 'add_reminder' });
  });

  test('rules are not overridden by the text capability', async () => {
    const intelligence = createMockIntelligence(async () => 'add_reminder');
    const classifier = new IntentClassifier(intelligence);

    expect(await classifier.classify('list reminders')).toEqual({ intent: 'list_reminders' });
    expect(intelligence.classifyIntent).not.toHaveBeenCalled();
  });

  test('uses the returned label for free-form text', async () => {
    const intelligence = createMockIntelligence(async () => 'help');
    const classifier = new IntentClassifier(intelligence);

    expect(await classifier.classify('what can you do')).toEqual({ intent: 'help' });
    expect(intelligence.classifyIntent).toHaveBeenCalledWith('what can you do');
  });

  test('re-extracts the keyword for delete labels', async () => {
    const classifier = new IntentClassifier(createMockIntelligence(async () => 'delete_reminder'));

    expect(await classifier.classify('delete reminder')).toEqual({
      intent: 'delete_reminder',
      keyword: '',
    });
    expect(await classifier.classify('get rid of the milk one')).toEqual({
      intent: 'delete_reminder',
      keyword: '',
    });
  });

  test('maps unknown labels to add', async () => {
    const classifier = new IntentClassifier(createMockIntelligence(async () => 'unknown'));

    expect(await classifier.classify('hmm')).toEqual({ intent: 'add_reminder' });
  });

  test('falls back to add and logs when the capability fails', async () => {
    const classifier = new IntentClassifier(
      createMockIntelligence(async () => {
        throw new Error('Request timed out.');
      })
    );

    expect(await classifier.classify('buy milk')).toEqual({ intent: 'add_reminder' });
    expect(console.error).toHaveBeenCalledWith(
      '[IntentClassifier] Classification error:',
      'Request timed out.'
    );
  });

  test('does not log when the capability is not configured', async () => {
    const classifier = new IntentClassifier(new FallbackTextIntelligence());

    expect(await classifier.classify('buy milk')).toEqual({ intent: 'add_reminder' });
    expect(console.error).not.toHaveBeenCalled();
  });
});
