/**
 * Entry normalizer
 * Maps raw feed entries into canonical article records
 */

import { MalformedEntryError } from '../types/errors';
import { collapseWhitespace, stripMarkup } from '../utils/html';
import type { ArticleDetails, ArticleRecord, RawFeedEntry } from '../types/article';

// RFC 3339 / ISO 8601 with an explicit offset; the colon in the offset is optional
const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

// RFC 822 as used by RSS pubDate, e.g. "Mon, 01 Jan 2024 09:30:00 GMT"
const RFC822 = /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2,4})\s+\d{2}:\d{2}(?::\d{2})?\s+(?:[A-Za-z]{1,5}|[+-]\d{4})$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Date.parse rolls 2023-02-29 over to 2023-03-01, so the written day must exist
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

// Two-digit RFC 822 years follow the same pivot as Date.parse
function fullYear(year: string): number {
  const value = Number(year);
  if (year.length > 2) return value;
  return value < 50 ? 2000 + value : 1900 + value;
}

/**
 * Parse a feed date. Returns null for anything outside the accepted formats,
 * and for dates that name a day the calendar does not have.
 */
export function parseFeedDate(value: string): Date | null {
  const trimmed = value.trim();
  let candidate: string;

  const iso = RFC3339.exec(trimmed);
  const rfc822 = iso ? null : RFC822.exec(trimmed);

  if (iso) {
    if (!isCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))) return null;
    candidate = trimmed.replace(' ', 'T').replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  } else if (rfc822) {
    const month = MONTHS.indexOf(rfc822[2].toLowerCase()) + 1;
    if (month === 0 || !isCalendarDate(fullYear(rfc822[3]), month, Number(rfc822[1]))) return null;
    candidate = trimmed;
  } else {
    return null;
  }

  const time = Date.parse(candidate);
  return Number.isNaN(time) ? null : new Date(time);
}

function present(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return value.trim() === '' ? undefined : value;
}

// The first date field present is authoritative; later ones are not consulted
function rawPublishDate(entry: RawFeedEntry): string | undefined {
  return present(entry.updated) ?? present(entry.published) ?? present(entry.pubDate);
}

function extractBody(entry: RawFeedEntry, details: ArticleDetails | null): string {
  const pageBody = present(details?.body_text);
  if (pageBody) {
    return collapseWhitespace(pageBody);
  }
  const markup = present(entry.content) ?? present(entry.summary);
  return markup ? stripMarkup(markup) : '';
}

function extractOrganization(entry: RawFeedEntry, details: ArticleDetails | null): string | null {
  const organization = present(details?.organization) ?? present(entry.author);
  return organization ? collapseWhitespace(organization) : null;
}

/**
 * Normalize one raw feed entry.
 * @throws MalformedEntryError when the identifier, title or publish date is missing or unparsable
 */
export function normalizeEntry(
  entry: RawFeedEntry,
  details: ArticleDetails | null,
  fetchedAt: Date
): ArticleRecord {
  const id = present(entry.id)?.trim() ?? present(entry.link)?.trim();
  if (!id) {
    throw new MalformedEntryError('Feed entry has no identifier or link');
  }

  const title = present(entry.title);
  if (!title) {
    throw new MalformedEntryError('Feed entry has no title', id);
  }

  const rawDate = rawPublishDate(entry);
  if (!rawDate) {
    throw new MalformedEntryError('Feed entry has no publish date', id);
  }
  const publishedAt = parseFeedDate(rawDate);
  if (!publishedAt) {
    throw new MalformedEntryError(`Unparsable publish date "${rawDate}"`, id);
  }

  const summary = present(entry.summary);

  return {
    id,
    title: collapseWhitespace(title),
    link: present(entry.link)?.trim() ?? null,
    summary: summary ? stripMarkup(summary) : null,
    organization: extractOrganization(entry, details),
    body: extractBody(entry, details),
    published_at: publishedAt,
    fetched_at: fetchedAt,
  };
}
