/**
 * Single-shot HTTP GET used by the feed and article page adapters.
 * No retries: any failure is reported as a FetchError.
 */

import { FetchError, describeError } from '../types/errors';

export interface FetchTextOptions {
  userAgent: string;
  timeoutMs: number;
  accept?: string;
}

export async function fetchText(url: string, options: FetchTextOptions): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? '*/*',
      },
    });

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status} fetching ${url}`, { status: response.status });
    }

    return await response.text();
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    const reason = error instanceof Error && error.name === 'AbortError'
      ? `timed out after ${options.timeoutMs}ms`
      : describeError(error);
    throw new FetchError(url, `Request to ${url} failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}
