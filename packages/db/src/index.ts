import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

/**
 * Open a Postgres connection pool and wrap it with Drizzle.
 * The pool connects lazily on the first query.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to open a database connection');
  }

  console.log('[DB] Initializing database connection...');
  console.log('[DB] DATABASE_URL:', redactConnectionString(connectionString));

  const client = postgres(connectionString, {
    onnotice: (notice) => console.log('[DB] Notice:', notice.message),
    debug: (_connection, query) => {
      if (process.env.DB_DEBUG === 'true') {
        console.log('[DB] Query:', query.substring(0, 100));
      }
    },
  });

  const db = drizzle(client, { schema });
  console.log('[DB] Drizzle ORM initialized');

  return {
    db,
    close: () => client.end({ timeout: 5 }),
  };
}

/**
 * Hide credentials in a postgres:// URL before it is logged
 */
export function redactConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    if (url.password) {
      url.password = '***';
    }
    return url.toString();
  } catch {
    return '(unparseable connection string)';
  }
}

export { DrizzleReminderRepository } from './reminders';
export * from './schema';
