// Intent labels, as returned by the text classifier
export type Intent =
  | 'add_reminder'
  | 'list_reminders'
  | 'delete_reminder'
  | 'clear_reminders'
  | 'help'
  | 'unknown';

export const INTENTS: readonly Intent[] = [
  'add_reminder',
  'list_reminders',
  'delete_reminder',
  'clear_reminders',
  'help',
  'unknown',
] as const;

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

// Priority is always an integer in [MIN_PRIORITY, MAX_PRIORITY] once persisted
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

// Reminder interface (application-level)
export interface Reminder {
  id: number;
  userId: string;
  content: string;
  priority: number;
  summary: string;
  createdAt: Date;
}

export interface NewReminder {
  userId: string;
  content: string;
  priority: number;
  summary: string;
}

/**
 * Storage for reminders, always scoped by user.
 *
 * `listByUser` returns reminders ordered by priority (highest first), then by
 * creation time (oldest first). Positional deletes rely on that ordering.
 */
export interface ReminderRepository {
  create(input: NewReminder): Promise<Reminder>;
  listByUser(userId: string): Promise<Reminder[]>;
  deleteByUserAndIds(userId: string, ids: number[]): Promise<number>;
  /** Case-insensitive substring match on content */
  deleteByUserAndContentSubstring(userId: string, substring: string): Promise<number>;
  deleteAllByUser(userId: string): Promise<number>;
  distinctUserIds(): Promise<string[]>;
}

/**
 * Outbound message delivery. Rejects when the message could not be sent.
 */
export interface Messenger {
  send(userId: string, text: string): Promise<void>;
}

/**
 * Optional language-model capability used to classify free-form messages
 * and to shorten reminder text.
 */
export interface TextIntelligence {
  classifyIntent(text: string): Promise<Intent>;
  summarize(text: string): Promise<string>;
}

// Result of reading a user's pending reminder text
export type PendingMessage =
  | { found: true; text: string }
  | { found: false; text: '' };

// Classifier output: delete carries the keyword extracted from the message
export type ClassifiedIntent =
  | { intent: 'add_reminder' }
  | { intent: 'list_reminders' }
  | { intent: 'clear_reminders' }
  | { intent: 'help' }
  | { intent: 'delete_reminder'; keyword: string };
