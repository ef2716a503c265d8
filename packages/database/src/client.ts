import { config } from 'dotenv';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

config();

interface Connection {
  sql: postgres.Sql;
  database: PostgresJsDatabase;
}

// One pool per process; benchmark runs open it lazily and close it on exit
let connection: Connection | undefined;

/**
 * Get a Drizzle database instance (singleton)
 *
 * @throws Error if DATABASE_URL is not set
 */
export function getDatabase(): PostgresJsDatabase {
  if (connection !== undefined) {
    return connection.database;
  }

  const databaseUrl = process.env['DATABASE_URL'];

  if (typeof databaseUrl !== 'string' || databaseUrl.trim() === '') {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const sql = postgres(databaseUrl);
  connection = { sql, database: drizzle(sql) };
  return connection.database;
}

/**
 * Whether DATABASE_URL is configured, without opening a connection
 */
export function isDatabaseConfigured(): boolean {
  const databaseUrl = process.env['DATABASE_URL'];
  return typeof databaseUrl === 'string' && databaseUrl.trim() !== '';
}

/**
 * Close the pooled connection so the process can exit. No-op when never opened.
 */
export async function closeDatabase(): Promise<void> {
  if (connection === undefined) {
    return;
  }
  const { sql } = connection;
  connection = undefined;
  await sql.end();
}
