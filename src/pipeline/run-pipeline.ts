/**
 * Main ingestion pipeline. Runs each stage to completion before the next:
 * 1. Fetches and parses the Atom feed
 * 2. Enriches entries with body text and organisation from their article pages
 * 3. Normalizes every entry into an article record
 * 4. Upserts the records into the SQLite store in one transaction
 * 5. Renders charts from the stored records and writes them to disk
 *
 * Fetch, parse and storage failures abort the run. A malformed entry aborts the run
 * unless skipping is enabled. Article page failures are logged and counted only.
 */

import pLimit from 'p-limit';

import { fetchFeed, parseFeed } from '../adapters/gov-uk-feed';
import { fetchArticleDetails } from '../adapters/article-page';
import type { FetchTextOptions } from '../adapters/http';
import { normalizeEntry } from './normalizer';
import { withArticleStore } from '../db/article-store';
import { render, writeChartArtifacts } from '../charts/renderer';
import { MalformedEntryError, describeError } from '../types/errors';
import { logger } from '../utils/logger';
import type { EnvironmentConfig } from '../config/environment';
import type { ArticleDetails, ArticleRecord, RawFeedEntry } from '../types/article';

export interface PipelineDependencies {
  fetchFeed: (url: string, options: FetchTextOptions) => Promise<string>;
  parseFeed: (xml: string) => Promise<RawFeedEntry[]>;
  fetchArticleDetails: (url: string, options: FetchTextOptions) => Promise<ArticleDetails>;
  now: () => Date;
}

export interface PipelineStats {
  totalEntries: number;
  newArticles: number;
  updatedArticles: number;
  skippedEntries: number;
  partialFailures: number;
  storedArticles: number;
  startTime: number;
  endTime?: number;
}

export interface PipelineResult {
  stats: PipelineStats;
  chartFiles: string[];
  duration: number;
}

const defaultDependencies: PipelineDependencies = {
  fetchFeed,
  parseFeed,
  fetchArticleDetails,
  now: () => new Date(),
};

/**
 * Fetch article pages with bounded concurrency. A page that fails, or that is missing
 * its body or organisation, counts as a partial failure.
 */
async function enrichEntries(
  entries: RawFeedEntry[],
  config: EnvironmentConfig,
  deps: PipelineDependencies,
  stats: PipelineStats
): Promise<(ArticleDetails | null)[]> {
  if (!config.enrichment.enabled) {
    logger.info('Article page enrichment disabled');
    return entries.map(() => null);
  }

  const limit = pLimit(config.enrichment.concurrencyLimit);
  const options: FetchTextOptions = { userAgent: config.feed.userAgent, timeoutMs: config.feed.timeoutMs };

  return Promise.all(
    entries.map(entry =>
      limit(async (): Promise<ArticleDetails | null> => {
        if (!entry.link) {
          stats.partialFailures++;
          logger.warn('Entry has no link to enrich from', { id: entry.id });
          return null;
        }

        try {
          const details = await deps.fetchArticleDetails(entry.link, options);
          if (!details.body_text || !details.organization) {
            stats.partialFailures++;
            logger.warn(`Incomplete article page: ${entry.link}`, {
              bodyText: details.body_text ? 'found' : 'missing',
              organization: details.organization ?? 'missing',
            });
          } else {
            logger.debug(`Enriched ${entry.link}`, { organization: details.organization });
          }
          return details;
        } catch (error) {
          stats.partialFailures++;
          logger.warn(`Could not enrich ${entry.link}: ${describeError(error)}`);
          return null;
        }
      })
    )
  );
}

function normalizeEntries(
  entries: RawFeedEntry[],
  details: (ArticleDetails | null)[],
  fetchedAt: Date,
  config: EnvironmentConfig,
  stats: PipelineStats
): ArticleRecord[] {
  const records: ArticleRecord[] = [];

  entries.forEach((entry, index) => {
    try {
      records.push(normalizeEntry(entry, details[index] ?? null, fetchedAt));
    } catch (error) {
      if (error instanceof MalformedEntryError && config.ingestion.skipMalformedEntries) {
        stats.skippedEntries++;
        logger.warn(`Skipping malformed entry: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  return records;
}

export async function runPipeline(
  config: EnvironmentConfig,
  overrides: Partial<PipelineDependencies> = {}
): Promise<PipelineResult> {
  const deps: PipelineDependencies = { ...defaultDependencies, ...overrides };
  const stats: PipelineStats = {
    totalEntries: 0,
    newArticles: 0,
    updatedArticles: 0,
    skippedEntries: 0,
    partialFailures: 0,
    storedArticles: 0,
    startTime: Date.now(),
  };

  logger.info(`Fetching feed ${config.feed.url}`);
  const xml = await deps.fetchFeed(config.feed.url, {
    userAgent: config.feed.userAgent,
    timeoutMs: config.feed.timeoutMs,
  });
  const entries = await deps.parseFeed(xml);
  stats.totalEntries = entries.length;
  logger.info(`Feed contains ${entries.length} entries`);

  const details = await enrichEntries(entries, config, deps, stats);

  const fetchedAt = deps.now();
  const records = normalizeEntries(entries, details, fetchedAt, config, stats);

  const chartFiles = await withArticleStore(
    config.database.path,
    store => {
      const summary = store.upsertMany(records);
      stats.newArticles = summary.inserted;
      stats.updatedArticles = summary.updated;
      stats.storedArticles = store.count();
      logger.info(`Stored ${records.length} articles`, summary);

      const artifacts = render(store.queryAll(), { topWords: config.charts.topWords });
      return writeChartArtifacts(artifacts, config.charts.outputDir, config.charts.format);
    },
    { pageSize: config.database.pageSize }
  );

  stats.endTime = Date.now();
  const duration = stats.endTime - stats.startTime;

  logger.info('Pipeline run completed', { stats, duration: `${duration}ms` });

  return { stats, chartFiles, duration };
}
