import { sql } from 'drizzle-orm';
import {
  check,
  pgTable,
  serial,
  text,
  integer,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

// Reminders table
export const reminders = pgTable(
  'reminders',
  {
    id: serial('id').primaryKey(),
    // Sender number without the whatsapp: prefix
    userId: text('user_id').notNull(),
    content: text('content').notNull(),
    // 1 (low) to 5 (high), enforced by reminders_priority_range
    priority: integer('priority').notNull(),
    summary: text('summary').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_reminders_user_id').on(table.userId),
    // Listing and dispatch order
    index('idx_reminders_user_priority').on(
      table.userId,
      table.priority,
      table.createdAt
    ),
    check('reminders_priority_range', sql`${table.priority} between 1 and 5`),
  ]
);

export type ReminderRow = typeof reminders.$inferSelect;
export type NewReminderRow = typeof reminders.$inferInsert;
