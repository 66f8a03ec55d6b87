/**
 * Articles table - one row per feed entry, keyed by the entry's stable identifier.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const articles = sqliteTable(
  'articles',
  {
    // Atom <id> (or link when absent)
    id: text('id').primaryKey(),

    title: text('title').notNull(),
    link: text('link'),
    summary: text('summary'),
    organization: text('organization'), // NULL when the publisher is unknown
    body: text('body').notNull().default(''),

    publishedAt: integer('published_at', { mode: 'timestamp_ms' }).notNull(),
    fetchedAt: integer('fetched_at', { mode: 'timestamp_ms' }).notNull(),
  },
  table => ({
    publishedIdx: index('articles_published_at_idx').on(table.publishedAt, table.id),
  })
);

export type ArticleRow = typeof articles.$inferSelect;
export type NewArticleRow = typeof articles.$inferInsert;

// Kept in step with the table definition above
export const CREATE_ARTICLES_SQL = `
  CREATE TABLE IF NOT EXISTS articles (
    id TEXT PRIMARY KEY NOT NULL,
    title TEXT NOT NULL,
    link TEXT,
    summary TEXT,
    organization TEXT,
    body TEXT NOT NULL DEFAULT '',
    published_at INTEGER NOT NULL,
    fetched_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS articles_published_at_idx ON articles (published_at, id);
`;
