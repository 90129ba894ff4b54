import { describe, it, expect, beforeEach } from 'vitest';
import type { QueryResultRow } from 'pg';
import { PgDocumentStore, type SqlExecutor } from './document-store';
import { BadRequestError } from '../../shared/errors';

class RecordingExecutor implements SqlExecutor {
  queries: Array<{ text: string; params: unknown[] }> = [];
  rows: QueryResultRow[] = [];

  async queryMany<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
    this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), params });
    return this.rows.filter((row): row is T => row !== undefined);
  }
}

describe('PgDocumentStore', () => {
  let executor: RecordingExecutor;
  let store: PgDocumentStore;

  beforeEach(() => {
    executor = new RecordingExecutor();
    store = new PgDocumentStore(executor);
  });

  it('upserts documents as JSON keyed by collection', async () => {
    await store.upsert('sessions', 'session-1', { sessionId: 'session-1' });

    expect(executor.queries[0]?.text).toBe(
      'INSERT INTO documents (collection, key, doc, updated_at) VALUES ($1, $2, $3::jsonb, NOW()) ' +
      'ON CONFLICT (collection, key) DO UPDATE SET doc = EXCLUDED.doc, updated_at = NOW()'
    );
    expect(executor.queries[0]?.params).toEqual(['sessions', 'session-1', '{"sessionId":"session-1"}']);
  });

  it('finds one document by containment', async () => {
    executor.rows = [{ doc: { id: 'p-1' } }];

    const found = await store.findOne('patients', { id: 'p-1' });

    expect(found).toEqual({ id: 'p-1' });
    expect(executor.queries[0]?.params).toEqual(['patients', '{"id":"p-1"}']);
  });

  it('returns null when nothing matches', async () => {
    expect(await store.findOne('patients', { id: 'missing' })).toBeNull();
  });

  it('sorts and limits through parameters', async () => {
    executor.rows = [{ doc: { a: 1 } }, { doc: { a: 2 } }];

    const docs = await store.findMany('sessions', { patientId: 'p-1' }, {
      sort: { field: 'startTime', direction: 'desc' },
      limit: 5,
    });

    expect(docs).toEqual([{ a: 1 }, { a: 2 }]);
    expect(executor.queries[0]?.text).toBe(
      'SELECT doc FROM documents WHERE collection = $1 AND doc @> $2::jsonb ORDER BY doc->>$3 DESC LIMIT $4'
    );
    expect(executor.queries[0]?.params).toEqual(['sessions', '{"patientId":"p-1"}', 'startTime', 5]);
  });

  it('rejects sort fields that are not plain names', async () => {
    await expect(store.findMany('sessions', {}, { sort: { field: 'a; DROP TABLE x', direction: 'asc' } }))
      .rejects.toBeInstanceOf(BadRequestError);
    expect(executor.queries).toHaveLength(0);
  });
});
