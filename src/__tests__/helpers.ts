/**
 * Shared test helpers: fixtures, stubbed fetch responses and config builders
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';
import type { ArticleRecord } from '../types/article';

export const FEED_URL = 'https://www.gov.uk/search/news-and-communications.atom';
export const BUDGET_URL = 'https://www.gov.uk/government/news/budget-update';
export const HEALTH_URL = 'https://www.gov.uk/government/news/health-notice';

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

// Builds a fetch Response for stubbed network calls
export const createMockResponse = (body: string, status = 200, contentType = 'text/html') =>
  new Response(body, { status, headers: { 'Content-Type': contentType } });

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Stub global fetch with a URL -> body table. Unknown URLs answer 404.
 */
export function stubFetch(routes: Record<string, string>) {
  return jest.spyOn(globalThis, 'fetch').mockImplementation(async input => {
    const url = requestUrl(input);
    const body = routes[url];
    if (body === undefined) {
      return createMockResponse('Not found', 404);
    }
    return createMockResponse(body, 200, url.endsWith('.atom') ? 'application/atom+xml' : 'text/html');
  });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gov-news-test-'));
}

export function testConfig(dir: string, env: NodeJS.ProcessEnv = {}): EnvironmentConfig {
  return loadEnvironmentConfig({
    FEED_URL,
    DATABASE_PATH: path.join(dir, 'articles.db'),
    CHART_OUTPUT_DIR: path.join(dir, 'charts'),
    LOG_LEVEL: 'error',
    ...env,
  });
}

export function makeRecord(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    id: 'https://www.gov.uk/government/news/example',
    title: 'Example article',
    link: 'https://www.gov.uk/government/news/example',
    summary: 'Example summary',
    organization: 'Cabinet Office',
    body: 'Example body text',
    published_at: new Date('2024-01-01T09:00:00Z'),
    fetched_at: new Date('2024-01-03T12:00:00Z'),
    ...overrides,
  };
}
