/**
 * Conversation Engine
 *
 * Turns one inbound message into one reply. Per user there are two states:
 * idle, and awaiting a priority for the reminder text sent in the previous
 * message. Idle messages are classified and dispatched to a handler.
 */

import type {
  Reminder,
  ReminderRepository,
  TextIntelligence,
} from '../../../../packages/shared-types/src';
import { MAX_PRIORITY, MIN_PRIORITY } from '../../../../packages/shared-types/src';
import type { ConversationStore } from './conversation-store';
import { formatIndices, parseIndices } from './delete-parser';
import {
  InfrastructureError,
  UserFacingError,
  describeError,
  isInfrastructureError,
  isUserFacingError,
} from './errors';
import type { IntentClassifier } from './intent-classifier';
import { truncateSummary } from './text-intelligence';

export const REPLIES = {
  emptyMessage: 'I need a message to work with. Please try again.',
  priorityPrompt: 'What priority should I set? Reply with a number between 1 (low) and 5 (high).',
  priorityReprompt: 'Please send a priority between 1 (lowest) and 5 (highest).',
  lostTrack: 'I lost track of that reminder. Please send it again.',
  saveFailed: "I couldn't save the reminder. Please try again.",
  noReminders: 'You have no reminders yet. Send me one to get started!',
  listFailed: "I couldn't load your reminders right now. Please try again later.",
  nothingToClear: "You don't have any reminders to clear.",
  cleared: 'All reminders cleared.',
  clearFailed: "I couldn't clear your reminders. Please try again later.",
  deleteTargetPrompt: "Tell me which reminder to delete, e.g. 'delete reminder about milk'.",
  deleteNotFound: "I couldn't find any reminders matching that description.",
  deleteFailed: "I couldn't delete that reminder. Please try again later.",
  deleteIndicesFailed: "I couldn't delete those reminders. Please try again later.",
  lookupFailed: "I couldn't look up your reminders right now. Please try again later.",
  noRemindersYet: "You don't have any reminders yet.",
  unexpected: 'Something went wrong on my side. Please try again.',
  help: [
    'You can say things like:',
    '- "Remind me to pay rent" to add a reminder',
    '- "List reminders" to see everything saved',
    '- "Delete reminder about rent" to remove one',
    '- "Delete 1, 3" to remove reminders by their number in the list',
    '- "Clear all reminders" to wipe everything',
  ].join('\n'),
} as const;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Conversation Engine Configuration
 */
export interface ConversationEngineConfig {
  repository: ReminderRepository;
  store: ConversationStore;
  classifier: IntentClassifier;
  textIntelligence: TextIntelligence;
}

export class ConversationEngine {
  private repository: ReminderRepository;
  private store: ConversationStore;
  private classifier: IntentClassifier;
  private textIntelligence: TextIntelligence;
  // Tail of each user's message chain
  private userQueues = new Map<string, Promise<void>>();

  constructor(config: ConversationEngineConfig) {
    this.repository = config.repository;
    this.store = config.store;
    this.classifier = config.classifier;
    this.textIntelligence = config.textIntelligence;
  }

  /**
   * Process a message and return the reply text. Messages from the same user
   * are handled one at a time, in arrival order.
   */
  async handleMessage(userId: string, message: string): Promise<string> {
    return this.runExclusive(userId, () => this.process(userId, message.trim()));
  }

  private async process(userId: string, message: string): Promise<string> {
    if (!message) {
      return REPLIES.emptyMessage;
    }

    try {
      if (this.store.isAwaitingPriority(userId)) {
        return await this.handlePriorityResponse(userId, message);
      }

      const classified = await this.classifier.classify(message);
      switch (classified.intent) {
        case 'list_reminders':
          return await this.listReminders(userId);
        case 'clear_reminders':
          return await this.clearReminders(userId);
        case 'delete_reminder':
          return await this.deleteReminders(userId, classified.keyword);
        case 'help':
          return REPLIES.help;
        case 'add_reminder':
          this.store.setPendingMessage(userId, message);
          return REPLIES.priorityPrompt;
      }
    } catch (error) {
      return this.replyForError(error);
    }
  }

  private async handlePriorityResponse(userId: string, message: string): Promise<string> {
    const priority = parsePriority(message);
    if (priority === null) {
      return REPLIES.priorityReprompt;
    }

    const pending = this.store.popPendingMessage(userId);
    if (!pending.found) {
      return REPLIES.lostTrack;
    }

    const summary = await this.summarize(pending.text);
    await this.attempt('save reminder', REPLIES.saveFailed, () =>
      this.repository.create({ userId, content: pending.text, priority, summary })
    );

    return `Got it! I'll remind you: ${summary} (priority ${priority}).`;
  }

  private async listReminders(userId: string): Promise<string> {
    const reminders = await this.attempt('list reminders', REPLIES.listFailed, () =>
      this.repository.listByUser(userId)
    );
    if (reminders.length === 0) {
      return REPLIES.noReminders;
    }
    return formatReminderList(reminders);
  }

  private async clearReminders(userId: string): Promise<string> {
    const deleted = await this.attempt('clear reminders', REPLIES.clearFailed, () =>
      this.repository.deleteAllByUser(userId)
    );
    if (deleted === 0) {
      throw new UserFacingError(REPLIES.nothingToClear);
    }
    return REPLIES.cleared;
  }

  private async deleteReminders(userId: string, keyword: string): Promise<string> {
    const target = keyword.trim();
    if (!target) {
      return REPLIES.deleteTargetPrompt;
    }

    const indices = parseIndices(target);
    if (indices) {
      await this.deleteByIndices(userId, indices);
      return `Deleted reminder(s): ${formatIndices(indices)}.`;
    }

    const deleted = await this.attempt('delete reminders by keyword', REPLIES.deleteFailed, () =>
      this.repository.deleteByUserAndContentSubstring(userId, target)
    );
    if (deleted === 0) {
      throw new UserFacingError(REPLIES.deleteNotFound);
    }
    return `Deleted reminders matching '${target}'.`;
  }

  /**
   * Positions refer to the listing order. Every index is checked before
   * anything is deleted.
   */
  private async deleteByIndices(userId: string, indices: number[]): Promise<number> {
    const reminders = await this.attempt('look up reminders', REPLIES.lookupFailed, () =>
      this.repository.listByUser(userId)
    );
    if (reminders.length === 0) {
      throw new UserFacingError(REPLIES.noRemindersYet);
    }

    const ids: number[] = [];
    for (const index of indices) {
      const reminder = reminders[index - 1];
      if (!reminder) {
        throw new UserFacingError(
          `Reminder ${index} doesn't exist. Choose between 1 and ${reminders.length}.`
        );
      }
      ids.push(reminder.id);
    }

    const deleted = await this.attempt('delete reminders by index', REPLIES.deleteIndicesFailed, () =>
      this.repository.deleteByUserAndIds(userId, ids)
    );
    if (deleted === 0) {
      throw new UserFacingError(REPLIES.deleteIndicesFailed);
    }
    return deleted;
  }

  private async summarize(content: string): Promise<string> {
    try {
      return await this.textIntelligence.summarize(content);
    } catch (error) {
      console.error('[Engine] Summarize error:', describeError(error));
      return truncateSummary(content);
    }
  }

  /**
   * Run a repository call, tagging failures as infrastructure errors
   */
  private async attempt<T>(operation: string, reply: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new InfrastructureError(reply, { cause: error, operation });
    }
  }

  private replyForError(error: unknown): string {
    if (isUserFacingError(error)) {
      return error.message;
    }
    if (isInfrastructureError(error)) {
      console.error(`[Engine] ${error.message}`);
      return error.reply;
    }
    console.error('[Engine] Unexpected error:', error);
    return REPLIES.unexpected;
  }

  private async runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.userQueues.get(userId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.userQueues.set(userId, tail);

    try {
      return await run;
    } finally {
      if (this.userQueues.get(userId) === tail) {
        this.userQueues.delete(userId);
      }
    }
  }
}

/**
 * Parse a priority reply. Returns null unless it is an integer in range.
 */
export function parsePriority(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const priority = Number.parseInt(trimmed, 10);
  if (priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
    return null;
  }
  return priority;
}

/**
 * Summary when there is one, otherwise the full content
 */
export function displayText(reminder: Pick<Reminder, 'summary' | 'content'>): string {
  return reminder.summary.trim() ? reminder.summary : reminder.content;
}

export function formatReminderList(reminders: Reminder[]): string {
  const lines = reminders.map(
    (r, i) => `${i + 1}. [${r.priority}] ${displayText(r)} (saved ${formatSavedAt(r.createdAt)})`
  );
  return ['Here are your reminders:', ...lines].join('\n');
}

/**
 * "Jan 02 15:04" in the process time zone
 */
export function formatSavedAt(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes()
  )}`;
}
