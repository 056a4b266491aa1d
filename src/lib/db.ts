import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { PostgresJsDatabase, PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { env } from '@/lib/env';

import * as schema from '@/db/schema';

export type Database = PostgresJsDatabase<typeof schema>;

/** Either the pooled database or an open transaction on it. */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

// Lazy initialization so importing this module never opens a connection
let _client: postgres.Sql | null = null;
let _db: Database | null = null;

export function getDb(): Database {
  if (_db) return _db;

  _client = postgres(env.DATABASE_URL, {
    max: env.NODE_ENV === 'production' ? 20 : 10,
    idle_timeout: 20, // seconds
    connect_timeout: 10, // seconds
  });

  _db = drizzle(_client, {
    schema,
    logger: env.NODE_ENV === 'development' && env.DEBUG_SQL,
  });

  return _db;
}

export async function closeDb(): Promise<void> {
  if (!_client) return;
  const client = _client;
  _client = null;
  _db = null;
  await client.end({ timeout: 5 });
}

// Re-export all table and enum definitions for easier access
export * from '@/db/schema';
