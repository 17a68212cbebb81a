import { and, asc, desc, eq, ilike, inArray } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type {
  NewReminder,
  Reminder,
  ReminderRepository,
} from '../../shared-types/src';
import { reminders, type NewReminderRow, type ReminderRow } from './schema';
import type * as schema from './schema';

/**
 * Postgres-backed reminder storage
 */
export class DrizzleReminderRepository implements ReminderRepository {
  constructor(private db: PostgresJsDatabase<typeof schema>) {}

  async create(input: NewReminder): Promise<Reminder> {
    const values: NewReminderRow = {
      userId: input.userId,
      content: input.content,
      priority: input.priority,
      summary: input.summary,
    };
    const [row] = await this.db.insert(reminders).values(values).returning();
    if (!row) {
      throw new Error('Insert returned no row');
    }
    return toReminder(row);
  }

  async listByUser(userId: string): Promise<Reminder[]> {
    const rows = await this.db
      .select()
      .from(reminders)
      .where(eq(reminders.userId, userId))
      .orderBy(desc(reminders.priority), asc(reminders.createdAt), asc(reminders.id));
    return rows.map(toReminder);
  }

  async deleteByUserAndIds(userId: string, ids: number[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const deleted = await this.db
      .delete(reminders)
      .where(and(eq(reminders.userId, userId), inArray(reminders.id, ids)))
      .returning({ id: reminders.id });
    return deleted.length;
  }

  async deleteByUserAndContentSubstring(userId: string, substring: string): Promise<number> {
    const deleted = await this.db
      .delete(reminders)
      .where(
        and(
          eq(reminders.userId, userId),
          ilike(reminders.content, `%${escapeLikePattern(substring)}%`)
        )
      )
      .returning({ id: reminders.id });
    return deleted.length;
  }

  async deleteAllByUser(userId: string): Promise<number> {
    const deleted = await this.db
      .delete(reminders)
      .where(eq(reminders.userId, userId))
      .returning({ id: reminders.id });
    return deleted.length;
  }

  async distinctUserIds(): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ userId: reminders.userId })
      .from(reminders);
    return rows.map((r) => r.userId);
  }
}

/**
 * Escape LIKE wildcards so user text matches literally (backslash is the
 * default escape character in Postgres)
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    userId: row.userId,
    content: row.content,
    priority: row.priority,
    summary: row.summary,
    createdAt: row.createdAt,
  };
}
