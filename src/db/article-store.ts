/**
 * Article store
 * Idempotent upserts keyed by article id, and an ordered lazy read-back.
 */

import { and, asc, eq, gt, or, sql } from 'drizzle-orm';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';

import * as schema from './schema';
import { articles, type ArticleRow, type NewArticleRow } from './schema';
import { openDatabase, type ArticleDatabase, type DatabaseHandle } from './client';
import { StorageUnavailableError, describeError } from '../types/errors';
import type { ArticleRecord, UpsertOutcome, UpsertSummary } from '../types/article';

const DEFAULT_PAGE_SIZE = 200;

// The database itself or an open transaction on it
type Executor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

function toRow(record: ArticleRecord): NewArticleRow {
  return {
    id: record.id,
    title: record.title,
    link: record.link,
    summary: record.summary,
    organization: record.organization,
    body: record.body,
    publishedAt: record.published_at,
    fetchedAt: record.fetched_at,
  };
}

function toRecord(row: ArticleRow): ArticleRecord {
  return {
    id: row.id,
    title: row.title,
    link: row.link,
    summary: row.summary,
    organization: row.organization,
    body: row.body,
    published_at: row.publishedAt,
    fetched_at: row.fetchedAt,
  };
}

// Runs a storage call, surfacing any driver error as StorageUnavailableError
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      throw error;
    }
    throw new StorageUnavailableError(`Storage error during ${operation}: ${describeError(error)}`, { cause: error });
  }
}

export class ArticleStore {
  constructor(
    private readonly db: ArticleDatabase,
    private readonly pageSize: number = DEFAULT_PAGE_SIZE
  ) {}

  private upsertRow(db: Executor, record: ArticleRecord): UpsertOutcome {
    const existing = db
      .select({ id: articles.id })
      .from(articles)
      .where(eq(articles.id, record.id))
      .get();

    const row = toRow(record);
    db.insert(articles)
      .values(row)
      .onConflictDoUpdate({
        target: articles.id,
        set: {
          title: row.title,
          link: row.link,
          summary: row.summary,
          organization: row.organization,
          body: row.body,
          publishedAt: row.publishedAt,
          fetchedAt: row.fetchedAt,
        },
      })
      .run();

    return existing ? 'updated' : 'inserted';
  }

  /**
   * Insert the record, or replace every field of the row with the same id.
   */
  upsert(record: ArticleRecord): UpsertOutcome {
    return guard('upsert', () => this.upsertRow(this.db, record));
  }

  /**
   * Upsert a batch inside one transaction. Either every record lands or none does.
   */
  upsertMany(records: ArticleRecord[]): UpsertSummary {
    return guard('batch upsert', () =>
      this.db.transaction(tx => {
        const summary: UpsertSummary = { inserted: 0, updated: 0 };
        for (const record of records) {
          summary[this.upsertRow(tx, record)] += 1;
        }
        return summary;
      })
    );
  }

  get(id: string): ArticleRecord | null {
    const row = guard('get', () => this.db.select().from(articles).where(eq(articles.id, id)).get());
    return row ? toRecord(row) : null;
  }

  count(): number {
    const result = guard('count', () =>
      this.db.select({ count: sql<number>`count(*)` }).from(articles).get()
    );
    return result?.count ?? 0;
  }

  /**
   * Every stored record, ordered by published_at ascending (ties by id).
   * Lazy: rows are read a page at a time as the sequence is consumed.
   * Each call starts a fresh read.
   */
  *queryAll(): Generator<ArticleRecord, void, undefined> {
    let cursor: { publishedAt: Date; id: string } | null = null;

    for (;;) {
      const after = cursor;
      const page: ArticleRow[] = guard('query', () =>
        this.db
          .select()
          .from(articles)
          .where(
            after
              ? or(
                  gt(articles.publishedAt, after.publishedAt),
                  and(eq(articles.publishedAt, after.publishedAt), gt(articles.id, after.id))
                )
              : undefined
          )
          .orderBy(asc(articles.publishedAt), asc(articles.id))
          .limit(this.pageSize)
          .all()
      );

      for (const row of page) {
        yield toRecord(row);
      }

      const last = page[page.length - 1];
      if (page.length < this.pageSize || !last) {
        return;
      }
      cursor = { publishedAt: last.publishedAt, id: last.id };
    }
  }
}

/**
 * Open a store for the duration of `fn`; the connection is closed on every exit path.
 */
export async function withArticleStore<T>(
  filePath: string,
  fn: (store: ArticleStore) => Promise<T> | T,
  options: { pageSize?: number } = {}
): Promise<T> {
  const handle: DatabaseHandle = openDatabase(filePath);
  try {
    return await fn(new ArticleStore(handle.db, options.pageSize));
  } finally {
    handle.close();
  }
}
