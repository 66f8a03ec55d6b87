import Parser from 'rss-parser';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { fetchText, type FetchTextOptions } from './http';
import { FeedParseError, describeError } from '../types/errors';
import type { RawFeedEntry } from '../types/article';

// Fields rss-parser can set on RSS items that its Item type leaves out,
// plus the raw date elements copied through customFields.
interface RssItemFields {
  id?: string;
  author?: string;
  updated?: string;
  published?: string;
}

type FeedItem = Parser.Item & RssItemFields;

const ATOM_ACCEPT = 'application/atom+xml, application/xml;q=0.9, */*;q=0.8';

function textField(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function toRawEntry(item: FeedItem): RawFeedEntry {
  return {
    id: textField(item.id) ?? textField(item.guid),
    link: textField(item.link),
    title: textField(item.title),
    updated: textField(item.updated),
    published: textField(item.published),
    pubDate: textField(item.pubDate),
    summary: textField(item.summary),
    content: textField(item.content),
    author: textField(item.author) ?? textField(item.creator),
  };
}

/**
 * Retrieve the raw feed document. Throws FetchError on network failure,
 * timeout or a non-success status.
 */
export async function fetchFeed(url: string, options: FetchTextOptions): Promise<string> {
  return fetchText(url, { ...options, accept: ATOM_ACCEPT });
}

// xml2js element shapes: every child is an array; text with attributes sits under `_`
const textElements = z
  .array(z.union([z.string(), z.object({ _: z.string().optional() })]))
  .optional()
  .catch(undefined);

const linkElements = z
  .array(z.union([z.string(), z.object({ $: z.object({ href: z.string().optional(), rel: z.string().optional() }).optional() })]))
  .optional()
  .catch(undefined);

const authorElements = z
  .array(z.union([z.string(), z.object({ name: textElements })]))
  .optional()
  .catch(undefined);

const atomEntrySchema = z.object({
  id: textElements,
  link: linkElements,
  title: textElements,
  updated: textElements,
  published: textElements,
  summary: textElements,
  content: textElements,
  author: authorElements,
});

const atomDocumentSchema = z.object({
  feed: z.union([z.string(), z.object({ entry: z.array(z.unknown()).optional() })]),
});

type AtomEntry = z.infer<typeof atomEntrySchema>;

function firstText(elements: z.infer<typeof textElements>): string | undefined {
  const element = elements?.[0];
  return textField(typeof element === 'string' ? element : element?._);
}

// The alternate link points at the article page; other rels are feeds or enclosures
function alternateLink(elements: z.infer<typeof linkElements>): string | undefined {
  const links = (elements ?? []).flatMap(element => (typeof element !== 'string' && element.$ ? [element.$] : []));
  const alternate = links.find(link => link.rel === undefined || link.rel === 'alternate') ?? links[0];
  return textField(alternate?.href);
}

function authorName(elements: z.infer<typeof authorElements>): string | undefined {
  const element = elements?.[0];
  return typeof element === 'string' ? textField(element) : firstText(element?.name);
}

// Dates stay as written; they are validated when the entry is normalized
function toAtomRawEntry(entry: AtomEntry): RawFeedEntry {
  return {
    id: firstText(entry.id),
    link: alternateLink(entry.link),
    title: firstText(entry.title),
    updated: firstText(entry.updated),
    published: firstText(entry.published),
    summary: firstText(entry.summary),
    content: firstText(entry.content),
    author: authorName(entry.author),
  };
}

async function parseRss(xml: string): Promise<RawFeedEntry[]> {
  const parser = new Parser<Record<string, unknown>, RssItemFields>({
    customFields: {
      item: ['updated', 'published']
    }
  });
  const feed = await parser.parseString(xml);
  return feed.items.map(toRawEntry);
}

/**
 * Parse an Atom (or RSS) document into raw entries.
 * Atom entries are read element by element, so one bad entry reaches the
 * normalizer on its own instead of failing the document.
 */
export async function parseFeed(xml: string): Promise<RawFeedEntry[]> {
  try {
    const document: unknown = await parseStringPromise(xml);
    const atom = atomDocumentSchema.safeParse(document);
    if (!atom.success) {
      return await parseRss(xml);
    }

    const entries = typeof atom.data.feed === 'string' ? [] : atom.data.feed.entry ?? [];
    return entries.map(entry => {
      const parsed = atomEntrySchema.safeParse(entry);
      return parsed.success ? toAtomRawEntry(parsed.data) : {};
    });
  } catch (error) {
    throw new FeedParseError(`Feed document could not be parsed: ${describeError(error)}`, { cause: error });
  }
}

export async function fetchAndParse(url: string, options: FetchTextOptions): Promise<RawFeedEntry[]> {
  const xml = await fetchFeed(url, options);
  return parseFeed(xml);
}
