import { describe, expect, it } from 'vitest';
import { PgQueryLogRepository, recordQuery, type Queryable, type QueryLogEntry } from '../src/db/queryLog.js';
import { silentLogger } from '../src/logging.js';

class FakeDb implements Queryable {
  readonly queries: { text: string; params: unknown[] }[] = [];
  failWith?: Error;

  async query(text: string, params: unknown[]): Promise<unknown> {
    if (this.failWith) throw this.failWith;
    this.queries.push({ text, params });
    return { rowCount: 1 };
  }
}

const entry: QueryLogEntry = {
  kind: 'answer',
  queryText: 'python course',
  topK: 3,
  outcome: 'answered',
  matchCount: 2,
};

describe('PgQueryLogRepository', () => {
  it('inserts one row per query', async () => {
    const db = new FakeDb();
    await new PgQueryLogRepository(db).record(entry);

    expect(db.queries).toHaveLength(1);
    const [{ text, params }] = db.queries;
    expect(text).toBe(
      'INSERT INTO query_logs (id, kind, query_text, top_k, outcome, match_count) VALUES ($1,$2,$3,$4,$5,$6)',
    );
    expect(params.slice(1)).toEqual(['answer', 'python course', 3, 'answered', 2]);
    expect(params[0]).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('recordQuery', () => {
  it('does nothing without a repository', async () => {
    await expect(recordQuery(undefined, entry, silentLogger())).resolves.toBeUndefined();
  });

  it('does not propagate insert failures', async () => {
    const db = new FakeDb();
    db.failWith = new Error('connection refused');
    await expect(recordQuery(new PgQueryLogRepository(db), entry, silentLogger())).resolves.toBeUndefined();
  });
});
