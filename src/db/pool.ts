// src/db/pool.ts
// What: Postgres connection pool for the query log.
// How: Creates a small pg Pool from DATABASE_URL. Only constructed when DATABASE_URL is configured.

import pg from 'pg';
import type { Pool } from 'pg';

export function createPool(databaseUrl: string): Pool {
  return new pg.Pool({
    connectionString: databaseUrl,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}
