/**
 * In-memory reminder storage, used when no DATABASE_URL is configured and in
 * tests. Contents are lost when the process exits.
 */

import type {
  NewReminder,
  Reminder,
  ReminderRepository,
} from '../../../../packages/shared-types/src';

export class InMemoryReminderRepository implements ReminderRepository {
  private reminders: Reminder[] = [];
  private nextId = 1;
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(input: NewReminder): Promise<Reminder> {
    const reminder: Reminder = {
      id: this.nextId++,
      userId: input.userId,
      content: input.content,
      priority: input.priority,
      summary: input.summary,
      createdAt: this.now(),
    };
    this.reminders.push(reminder);
    return { ...reminder };
  }

  async listByUser(userId: string): Promise<Reminder[]> {
    return this.reminders
      .filter((r) => r.userId === userId)
      .sort(compareForListing)
      .map((r) => ({ ...r }));
  }

  async deleteByUserAndIds(userId: string, ids: number[]): Promise<number> {
    const targets = new Set(ids);
    return this.removeWhere((r) => r.userId === userId && targets.has(r.id));
  }

  async deleteByUserAndContentSubstring(userId: string, substring: string): Promise<number> {
    const needle = substring.toLowerCase();
    return this.removeWhere(
      (r) => r.userId === userId && r.content.toLowerCase().includes(needle)
    );
  }

  async deleteAllByUser(userId: string): Promise<number> {
    return this.removeWhere((r) => r.userId === userId);
  }

  async distinctUserIds(): Promise<string[]> {
    return [...new Set(this.reminders.map((r) => r.userId))];
  }

  private removeWhere(predicate: (reminder: Reminder) => boolean): number {
    const before = this.reminders.length;
    this.reminders = this.reminders.filter((r) => !predicate(r));
    return before - this.reminders.length;
  }
}

/**
 * Priority descending, then oldest first; id breaks ties between reminders
 * created in the same millisecond
 */
export function compareForListing(a: Reminder, b: Reminder): number {
  return (
    b.priority - a.priority ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id - b.id
  );
}
