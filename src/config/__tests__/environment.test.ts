import { DEFAULT_FEED_URL, loadEnvironmentConfig } from '../environment';

describe('loadEnvironmentConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadEnvironmentConfig({})).toEqual({
      feed: { url: DEFAULT_FEED_URL, userAgent: 'gov-news-tracker/1.0', timeoutMs: 10000 },
      enrichment: { enabled: true, concurrencyLimit: 4 },
      database: { path: 'data/gov_uk_news.db', pageSize: 200 },
      ingestion: { skipMalformedEntries: false },
      charts: { outputDir: 'data/charts', format: 'svg', topWords: 20 },
      logging: { level: 'info' },
    });
  });

  it('reads and coerces provided values', () => {
    const config = loadEnvironmentConfig({
      FEED_URL: 'https://example.org/feed.atom',
      FETCH_TIMEOUT_MS: '2500',
      ENRICH_ARTICLES: 'false',
      CONCURRENCY_LIMIT: '2',
      DATABASE_PATH: '/tmp/articles.db',
      SKIP_MALFORMED_ENTRIES: '1',
      CHART_FORMAT: 'json',
      LOG_LEVEL: 'debug',
    });

    expect(config.feed).toEqual({ url: 'https://example.org/feed.atom', userAgent: 'gov-news-tracker/1.0', timeoutMs: 2500 });
    expect(config.enrichment).toEqual({ enabled: false, concurrencyLimit: 2 });
    expect(config.database.path).toBe('/tmp/articles.db');
    expect(config.ingestion.skipMalformedEntries).toBe(true);
    expect(config.charts.format).toBe('json');
    expect(config.logging.level).toBe('debug');
  });

  it('treats empty variables as unset', () => {
    expect(loadEnvironmentConfig({ FEED_URL: '', LOG_LEVEL: '  ' }).feed.url).toBe(DEFAULT_FEED_URL);
  });

  it('lists every invalid variable', () => {
    expect(() =>
      loadEnvironmentConfig({ FEED_URL: 'not-a-url', CONCURRENCY_LIMIT: '0', CHART_FORMAT: 'png' })
    ).toThrow(/Invalid environment variables: .*FEED_URL.*CONCURRENCY_LIMIT.*CHART_FORMAT/);
  });
});
