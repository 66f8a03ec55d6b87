/**
 * Article page enrichment
 * Pulls the body text and primary publishing organisation out of a GOV.UK article page
 */

import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import { fetchText, type FetchTextOptions } from './http';
import { collapseWhitespace, nodeToText } from '../utils/html';
import type { ArticleDetails } from '../types/article';

const BODY_SELECTOR = 'div.gem-c-govspeak';
const ORGANISATION_META = 'meta[name="govuk:primary-publishing-organisation"]';

function nonEmpty(value: string | null | undefined): string | null {
  if (!value) return null;
  const collapsed = collapseWhitespace(value);
  return collapsed === '' ? null : collapsed;
}

/**
 * Extract details from article HTML. Missing pieces come back as null.
 */
export function extractArticleDetails(html: string, url: string | null = null): ArticleDetails {
  const dom = new JSDOM(html, { url: url ?? undefined });
  const document = dom.window.document;

  const organization = nonEmpty(document.querySelector(ORGANISATION_META)?.getAttribute('content'));

  const govspeak = document.querySelector(BODY_SELECTOR);
  let bodyText = govspeak ? nonEmpty(nodeToText(govspeak)) : null;

  if (!bodyText) {
    // Readability mutates the document, so it runs after the meta lookup
    const article = new Readability(document).parse();
    bodyText = nonEmpty(article?.textContent);
  }

  return { body_text: bodyText, organization };
}

export async function fetchArticleDetails(url: string, options: FetchTextOptions): Promise<ArticleDetails> {
  const html = await fetchText(url, { ...options, accept: 'text/html' });
  return extractArticleDetails(html, url);
}
