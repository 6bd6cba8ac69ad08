/**
 * Generic web document extraction using JSDOM with an ordered strategy cascade
 */

import { JSDOM } from 'jsdom';
import type { ExtractionResult, Source } from '../types.js';
import type { ExtractorOptions } from './index.js';
import { fetchPage } from '../http.js';
import { collapseWhitespace, truncate } from '../text.js';
import { describeError } from '../errors.js';
import { logger } from '../../logger.js';

/** Below this many characters the paragraph fallback kicks in */
const MIN_PRIMARY_TEXT = 100;
const MAX_TABLES = 2;
const MAX_STRUCTURED_DATA = 500;

const CONTENT_SELECTORS = [
  'article',
  'main',
  'div.content, div.main-content, div.post, div.article',
];

interface ExtractionStrategy {
  name: string;
  /** When set, the strategy only runs if this holds for the text gathered so far */
  when?: (gathered: string[]) => boolean;
  extract: (doc: Document) => string | null;
}

/**
 * Flatten an element's text, one space between text nodes
 */
function flattenText(node: Node): string {
  const parts: string[] = [];
  const walk = (current: Node) => {
    if (current.nodeType === current.TEXT_NODE) {
      const text = current.textContent?.trim();
      if (text) parts.push(text);
      return;
    }
    current.childNodes.forEach(walk);
  };
  walk(node);
  return parts.join(' ');
}

/**
 * Cascade order matters: headings, lists and tables are additive,
 * paragraphs are a fallback for pages without a recognizable container.
 */
const STRATEGIES: ExtractionStrategy[] = [
  {
    name: 'container',
    extract(doc) {
      for (const selector of CONTENT_SELECTORS) {
        const el = doc.querySelector(selector);
        if (el) return flattenText(el) || null;
      }
      return null;
    },
  },
  {
    name: 'headings',
    extract(doc) {
      const headings = Array.from(doc.querySelectorAll('h1, h2, h3'))
        .map((h) => ({ tag: h.tagName.toLowerCase(), text: flattenText(h) }))
        .filter((h) => h.text)
        .map((h) => `${h.tag}: ${h.text}`);
      return headings.length > 0 ? `Document Structure: ${headings.join(' | ')}` : null;
    },
  },
  {
    name: 'paragraphs',
    when: (gathered) => gathered.join(' ').length < MIN_PRIMARY_TEXT,
    extract(doc) {
      const text = Array.from(doc.querySelectorAll('p'))
        .map(flattenText)
        .filter(Boolean)
        .join(' ');
      return text || null;
    },
  },
  {
    name: 'lists',
    extract(doc) {
      const lists = Array.from(doc.querySelectorAll('ul, ol'))
        .map((list) =>
          Array.from(list.querySelectorAll('li'))
            .map((item) => `• ${flattenText(item)}`)
            .join(' '),
        )
        .filter(Boolean);
      return lists.length > 0 ? lists.join(' ') : null;
    },
  },
  {
    name: 'tables',
    extract(doc) {
      const rows: string[] = [];
      for (const table of Array.from(doc.querySelectorAll('table')).slice(0, MAX_TABLES)) {
        for (const row of Array.from(table.querySelectorAll('tr'))) {
          const cells = Array.from(row.querySelectorAll('td, th')).map(flattenText);
          if (cells.length > 0) rows.push(cells.join(' | '));
        }
      }
      return rows.length > 0 ? `Table Content: ${rows.join(' / ')}` : null;
    },
  },
];

function readMetadata(doc: Document): string | null {
  const metadata: string[] = [];

  const title = doc.querySelector('title')?.textContent?.trim();
  if (title) metadata.push(`Title: ${title}`);

  const description = doc.querySelector('meta[name="description"]')?.getAttribute('content')?.trim();
  if (description) metadata.push(`Description: ${description}`);

  return metadata.length > 0 ? `METADATA: ${metadata.join(' | ')}` : null;
}

/**
 * First JSON-LD block that parses, pretty-printed and clipped
 */
function readStructuredData(doc: Document): string | null {
  for (const script of Array.from(doc.querySelectorAll('script[type="application/ld+json"]'))) {
    try {
      const data: unknown = JSON.parse(script.textContent ?? '');
      const pretty = JSON.stringify(data, null, 2).slice(0, MAX_STRUCTURED_DATA);
      return `STRUCTURED DATA: Structured Data: ${pretty}...`;
    } catch (err) {
      logger.debug('Skipping unparseable JSON-LD block', describeError(err));
    }
  }
  return null;
}

/**
 * Extract readable text from an HTML document.
 * Returns whitespace-collapsed text, empty when nothing usable was found.
 */
export function extractMarkup(html: string): string {
  const doc = new JSDOM(html).window.document;

  const header = [readMetadata(doc), readStructuredData(doc)].filter(
    (part): part is string => part !== null,
  );

  doc.querySelectorAll('script, style, noscript, template').forEach((el) => el.remove());

  const gathered: string[] = [];
  for (const strategy of STRATEGIES) {
    if (strategy.when && !strategy.when(gathered)) {
      continue;
    }
    const text = strategy.extract(doc);
    if (text) {
      logger.debug(`Strategy ${strategy.name} produced ${text.length} chars`);
      gathered.push(text);
    }
  }

  return collapseWhitespace([...header, ...gathered].join(' '));
}

function isMarkup(contentType: string): boolean {
  return contentType.includes('text/html') || contentType.includes('application/xhtml+xml');
}

/** Content types worth downloading: markup, JSON and other text */
function isReadable(contentType: string): boolean {
  return isMarkup(contentType) || contentType.includes('application/json') || contentType.includes('text/');
}

/**
 * Fetch a URL and extract its text according to its content type
 */
export async function extractDocument(
  source: Source,
  options: ExtractorOptions,
  signal?: AbortSignal,
): Promise<ExtractionResult> {
  const { url, kind } = source;

  try {
    new URL(url);
  } catch {
    return { success: false, url, kind, reason: 'invalid_url', error: `Invalid URL: ${url}` };
  }

  let page: Awaited<ReturnType<typeof fetchPage>>;
  try {
    page = await fetchPage(url, {
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      signal,
      accepts: isReadable,
    });
  } catch (err) {
    const error = describeError(err);
    logger.error(`Failed to fetch ${url}:`, error);
    return { success: false, url, kind, reason: 'network_error', error };
  }

  if (!page.ok) {
    const error = `HTTP ${page.status} ${page.statusText}`.trim();
    logger.error(`Failed to fetch ${url}:`, error);
    return { success: false, url, kind, reason: 'http_error', error };
  }

  const contentType = page.contentType.toLowerCase();

  if (!isMarkup(contentType)) {
    logger.warn(`Non-HTML content detected at ${url} (${contentType || 'no content type'})`);

    if (contentType.includes('application/json')) {
      try {
        const data: unknown = JSON.parse(page.body);
        return { success: true, url, kind, text: truncate(JSON.stringify(data, null, 2), options.maxLength) };
      } catch (err) {
        return { success: false, url, kind, reason: 'parse_error', error: describeError(err) };
      }
    }

    if (contentType.includes('text/')) {
      if (!page.body.trim()) {
        return { success: false, url, kind, reason: 'empty_content', error: 'Empty response body' };
      }
      return { success: true, url, kind, text: truncate(page.body, options.maxLength) };
    }

    return {
      success: false,
      url,
      kind,
      reason: 'unsupported_type',
      error: `Unsupported content type: ${contentType || 'unknown'}`,
    };
  }

  let text: string;
  try {
    text = extractMarkup(page.body);
  } catch (err) {
    const error = describeError(err);
    logger.error(`Failed to parse ${url}:`, error);
    return { success: false, url, kind, reason: 'parse_error', error };
  }

  if (!text) {
    logger.warn(`No significant text extracted from ${url}`);
    return { success: false, url, kind, reason: 'empty_content', error: 'No text extracted' };
  }

  return { success: true, url, kind, text: truncate(text, options.maxLength) };
}
