// scripts/run-migrations.ts
// What: Migration runner for the query-log schema in src/db/migrations.
// How: Loads .env, discovers *.sql files, sorts by filename, and executes each file's SQL via pg using a
//      single connection. Each migration carries its own BEGIN/COMMIT and IF NOT EXISTS for idempotency.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { createPool } from '../src/db/pool.js';

async function main(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'src/db/migrations');
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    console.log('No migrations found.');
    return;
  }

  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    throw new Error('DATABASE_URL is not set; the query log needs a Postgres database');
  }

  const pool = createPool(connStr);
  try {
    const client = await pool.connect();
    console.log('[migrate] Connected to database');
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        console.log(`Applying migration: ${file}`);
        await client.query(sql);
        console.log(`Applied: ${file}`);
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  console.log('Migrations complete.');
}

main().catch((err: unknown) => {
  console.error('[migrate] Migration failed:', err);
  process.exit(1);
});
