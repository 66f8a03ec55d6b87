/**
 * Markup helpers shared by the feed normalizer and the article page enricher
 */

import { JSDOM } from 'jsdom';

// Elements whose boundaries separate words when flattened to text
const BLOCK_ELEMENTS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt',
  'figcaption', 'figure', 'footer', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'td', 'th', 'tr', 'ul',
]);

const SKIPPED_ELEMENTS = new Set(['script', 'style', 'noscript', 'template']);

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

function collectText(node: Node, parts: string[]) {
  if (node.nodeType === TEXT_NODE) {
    parts.push(node.textContent ?? '');
    return;
  }

  const tag = node.nodeType === ELEMENT_NODE ? node.nodeName.toLowerCase() : '';
  if (SKIPPED_ELEMENTS.has(tag)) {
    return;
  }

  const isBlock = BLOCK_ELEMENTS.has(tag);
  if (isBlock) parts.push(' ');
  node.childNodes.forEach(child => collectText(child, parts));
  if (isBlock) parts.push(' ');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Flatten a DOM node to single-spaced plain text.
 */
export function nodeToText(node: Node): string {
  const parts: string[] = [];
  collectText(node, parts);
  return collapseWhitespace(parts.join(''));
}

/**
 * Strip markup from an HTML snippet, decoding entities.
 * Returns an empty string when nothing but markup remains.
 */
export function stripMarkup(html: string): string {
  if (!html.trim()) {
    return '';
  }
  return nodeToText(JSDOM.fragment(html));
}
