import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

/**
 * Open a drizzle database over a postgres-js client.
 * The caller owns the returned client and must end it on shutdown.
 */
export function createDatabase(connectionString: string, options: { debug?: boolean } = {}) {
  console.log('[DB] Initializing database connection...');
  console.log('[DB] DATABASE_URL:', redactConnectionString(connectionString));

  const client = postgres(connectionString, {
    onnotice: (notice) => console.log('[DB] Notice:', notice.message),
    debug: (_connection, query) => {
      if (options.debug) {
        console.log('[DB] Query:', query.substring(0, 100));
      }
    },
  });

  console.log('[DB] PostgreSQL client created');
  const db = drizzle(client, { schema });
  console.log('[DB] Drizzle ORM initialized');

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

export function redactConnectionString(connectionString: string): string {
  const at = connectionString.lastIndexOf('@');
  if (at === -1) {
    return connectionString;
  }
  const scheme = connectionString.indexOf('://');
  const userStart = scheme === -1 ? 0 : scheme + 3;
  const credentials = connectionString.slice(userStart, at);
  const user = credentials.split(':')[0];
  return `${connectionString.slice(0, userStart)}${user}:***${connectionString.slice(at)}`;
}

// Export schema for use elsewhere
export * from './schema';
