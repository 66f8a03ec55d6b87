/**
 * Environment configuration for the ingestion pipeline
 * Loads and validates environment variables, falling back to defaults
 */

import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

export const DEFAULT_FEED_URL = 'https://www.gov.uk/search/news-and-communications.atom';

export type ChartFormat = 'svg' | 'json';

export interface EnvironmentConfig {
  feed: {
    url: string;
    userAgent: string;
    timeoutMs: number;
  };
  enrichment: {
    enabled: boolean;
    concurrencyLimit: number;
  };
  database: {
    path: string;
    pageSize: number;
  };
  ingestion: {
    skipMalformedEntries: boolean;
  };
  charts: {
    outputDir: string;
    format: ChartFormat;
    topWords: number;
  };
  logging: {
    level: LogLevel;
  };
}

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform(value => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  FEED_URL: z.string().url().default(DEFAULT_FEED_URL),
  USER_AGENT: z.string().min(1).default('gov-news-tracker/1.0'),
  FETCH_TIMEOUT_MS: positiveInt(10000),
  ENRICH_ARTICLES: booleanFlag(true),
  CONCURRENCY_LIMIT: positiveInt(4),
  DATABASE_PATH: z.string().min(1).default('data/gov_uk_news.db'),
  QUERY_PAGE_SIZE: positiveInt(200),
  SKIP_MALFORMED_ENTRIES: booleanFlag(false),
  CHART_OUTPUT_DIR: z.string().min(1).default('data/charts'),
  CHART_FORMAT: z.enum(['svg', 'json']).default('svg'),
  TOP_WORDS_LIMIT: positiveInt(20),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Load and validate environment configuration
 * Empty variables are treated as unset.
 * @throws Error listing every invalid variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment variables: ${problems.join(', ')}`);
  }

  const vars = parsed.data;
  return {
    feed: {
      url: vars.FEED_URL,
      userAgent: vars.USER_AGENT,
      timeoutMs: vars.FETCH_TIMEOUT_MS,
    },
    enrichment: {
      enabled: vars.ENRICH_ARTICLES,
      concurrencyLimit: vars.CONCURRENCY_LIMIT,
    },
    database: {
      path: vars.DATABASE_PATH,
      pageSize: vars.QUERY_PAGE_SIZE,
    },
    ingestion: {
      skipMalformedEntries: vars.SKIP_MALFORMED_ENTRIES,
    },
    charts: {
      outputDir: vars.CHART_OUTPUT_DIR,
      format: vars.CHART_FORMAT,
      topWords: vars.TOP_WORDS_LIMIT,
    },
    logging: {
      level: vars.LOG_LEVEL,
    },
  };
}
