// src/db/queryLog.ts
// What: Audit trail of answered and similar-course queries.
// How: QueryLogRepository is the seam the routes depend on; PgQueryLogRepository inserts one row per query
//      into query_logs. recordQuery never fails the request: a failed insert is logged at warn level.

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging.js';

export type QueryKind = 'answer' | 'similar';
export type QueryOutcome = 'answered' | 'rejected' | 'failed' | 'ok';

export interface QueryLogEntry {
  kind: QueryKind;
  queryText: string;
  topK: number;
  outcome: QueryOutcome;
  matchCount: number;
}

export interface QueryLogRepository {
  record(entry: QueryLogEntry): Promise<void>;
}

// Subset of pg.Pool used here.
export interface Queryable {
  query(text: string, params: unknown[]): Promise<unknown>;
}

export class PgQueryLogRepository implements QueryLogRepository {
  constructor(private readonly db: Queryable) {}

  async record(entry: QueryLogEntry): Promise<void> {
    await this.db.query(
      'INSERT INTO query_logs (id, kind, query_text, top_k, outcome, match_count) VALUES ($1,$2,$3,$4,$5,$6)',
      [uuidv4(), entry.kind, entry.queryText, entry.topK, entry.outcome, entry.matchCount],
    );
  }
}

export async function recordQuery(
  repo: QueryLogRepository | undefined,
  entry: QueryLogEntry,
  logger: Logger,
): Promise<void> {
  if (!repo) return;
  try {
    await repo.record(entry);
  } catch (err) {
    logger.warn({ err, kind: entry.kind }, 'Failed to record query log');
  }
}
