import type { QueryResultRow } from 'pg';
import type { DocumentFilter, DocumentStore, FindManyOptions } from '../../shared/types';
import { BadRequestError } from '../../shared/errors';

export interface SqlExecutor {
  queryMany<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

interface DocumentRow {
  doc: unknown;
}

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Collections of JSON documents in the `documents` table
 * (migrations/001_documents.sql). Filters are JSONB containment, so only
 * equality on top-level fields is supported.
 */
export class PgDocumentStore implements DocumentStore {
  constructor(private executor: SqlExecutor) {}

  async upsert(collection: string, key: string, document: object): Promise<void> {
    await this.executor.queryMany(
      `INSERT INTO documents (collection, key, doc, updated_at)
       VALUES ($1, $2, $3::jsonb, NOW())
       ON CONFLICT (collection, key)
       DO UPDATE SET doc = EXCLUDED.doc, updated_at = NOW()`,
      [collection, key, JSON.stringify(document)]
    );
  }

  async findOne(collection: string, filter: DocumentFilter): Promise<unknown | null> {
    const rows = await this.executor.queryMany<DocumentRow>(
      `SELECT doc FROM documents
       WHERE collection = $1 AND doc @> $2::jsonb
       ORDER BY updated_at DESC
       LIMIT 1`,
      [collection, JSON.stringify(filter)]
    );
    return rows[0]?.doc ?? null;
  }

  async findMany(collection: string, filter: DocumentFilter, options: FindManyOptions = {}): Promise<unknown[]> {
    const params: unknown[] = [collection, JSON.stringify(filter)];
    let sql = `SELECT doc FROM documents
       WHERE collection = $1 AND doc @> $2::jsonb`;

    if (options.sort) {
      if (!FIELD_NAME.test(options.sort.field)) {
        throw new BadRequestError(`Invalid sort field: ${options.sort.field}`);
      }
      params.push(options.sort.field);
      sql += `\n       ORDER BY doc->>$${params.length} ${options.sort.direction === 'desc' ? 'DESC' : 'ASC'}`;
    }

    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += `\n       LIMIT $${params.length}`;
    }

    const rows = await this.executor.queryMany<DocumentRow>(sql, params);
    return rows.map((row) => row.doc);
  }
}
