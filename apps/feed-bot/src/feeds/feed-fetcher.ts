/**
 * Feed Fetcher
 *
 * Fetches RSS/Atom feeds and returns normalized FeedEntry[].
 *
 * - Feeds are parsed with regex extraction: RSS 2.0 and RSS 1.0 `<item>`
 *   blocks, Atom `<entry>` blocks. No XML parser dependency.
 * - Every request is bounded by a timeout.
 * - Failures raise FetchError; fetchAllFeeds() records them per feed and
 *   carries on with the rest.
 */

import { FetchError, errorMessage } from '../errors.js';
import type { Logger } from '../output.js';
import type { FeedEntry, FailedFeed, FetchAllResult } from './types.js';

export const USER_AGENT = 'feed-bot/1.0';
const DEFAULT_TIMEOUT_MS = 30_000;
const DESCRIPTION_LIMIT = 500;

// ── RSS/Atom Parsing ────────────────────────────────────────────────────────

export type FeedFormat = 'rss' | 'rdf' | 'atom';

export interface RawFeedEntry {
  title: string;
  link: string;
  guid: string;
  pubDate: string;
  description: string;
}

const CLOSING_TAG: Record<FeedFormat, RegExp> = {
  rss: /<\/rss\s*>/i,
  rdf: /<\/rdf:RDF\s*>/i,
  atom: /<\/feed\s*>/i,
};

/**
 * Identify the document type from its root element. Returns null for
 * anything that is not a feed (HTML error pages, JSON, empty bodies).
 */
export function detectFeedFormat(xml: string): FeedFormat | null {
  if (/<rss[\s>]/i.test(xml)) return 'rss';
  if (/<rdf:RDF[\s>]/i.test(xml)) return 'rdf';
  if (/<feed[\s>]/i.test(xml)) return 'atom';
  return null;
}

/**
 * Parse RSS/Atom XML into raw entries.
 * @throws Error if the document is not a feed or is truncated.
 */
export function parseFeedXml(xml: string): RawFeedEntry[] {
  const format = detectFeedFormat(xml);
  if (!format) throw new Error('not an RSS or Atom document');
  if (!CLOSING_TAG[format].test(xml)) throw new Error(`truncated ${format} document`);

  if (format === 'atom') {
    const atomEntries = xml.match(/<entry[\s>][\s\S]*?<\/entry>/gi) || [];
    return atomEntries.map((entry) => ({
      title: extractTag(entry, 'title'),
      link: extractAtomLink(entry) || extractTag(entry, 'link'),
      guid: extractTag(entry, 'id'),
      pubDate: extractTag(entry, 'published') || extractTag(entry, 'updated'),
      description: stripHtml(extractTag(entry, 'summary') || extractTag(entry, 'content')).slice(0, DESCRIPTION_LIMIT),
    }));
  }

  const rssItems = xml.match(/<item[\s>][\s\S]*?<\/item>/gi) || [];
  return rssItems.map((item) => ({
    title: extractTag(item, 'title'),
    link: extractTag(item, 'link') || extractAtomLink(item),
    guid: extractTag(item, 'guid'),
    pubDate: extractTag(item, 'pubDate') || extractTag(item, 'dc:date') || extractTag(item, 'published'),
    description: stripHtml(extractTag(item, 'description') || extractTag(item, 'content:encoded')).slice(0, DESCRIPTION_LIMIT),
  }));
}

/**
 * Text content of the first `<tag>` element, with CDATA unwrapped.
 * Self-closing elements are ignored.
 */
export function extractTag(xml: string, tag: string): string {
  const pattern = new RegExp(`<${tag}(?:\\s[^>]*)?(?<!/)>([\\s\\S]*?)</${tag}>`, 'i');
  const match = xml.match(pattern);
  if (!match) return '';
  return match[1].replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1').trim();
}

function extractAttr(attrs: string, name: string): string {
  const match = attrs.match(new RegExp(`\\b${name}\\s*=\\s*["']([^"']*)["']`, 'i'));
  return match ? decodeEntities(match[1]) : '';
}

/**
 * Atom-style `<link href="..."/>`. Prefers rel="alternate" (or no rel) over
 * self/enclosure/replies links.
 */
export function extractAtomLink(xml: string): string {
  let fallback = '';
  for (const match of xml.matchAll(/<(?:atom:)?link\b([^>]*)>/gi)) {
    const href = extractAttr(match[1], 'href');
    if (!href) continue;
    const rel = extractAttr(match[1], 'rel');
    if (!rel || rel === 'alternate') return href;
    if (!fallback) fallback = href;
  }
  return fallback;
}

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
};

export function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&([a-z]+);/gi, (entity: string, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? entity)
    .replace(/&amp;/g, '&');
}

/**
 * Plain text from an HTML fragment. Entities are decoded on both sides of tag
 * removal since feeds often entity-escape their HTML.
 */
export function stripHtml(html: string): string {
  return decodeEntities(decodeEntities(html).replace(/<[^>]+>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

function toIsoTimestamp(raw: string): string | null {
  if (!raw) return null;
  const date = new Date(raw);
  return isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Normalize raw entries. Entries without a title, or without both a link and
 * a guid, are dropped since they can be neither posted nor deduplicated.
 */
export function toFeedEntries(feedUrl: string, rawEntries: RawFeedEntry[]): FeedEntry[] {
  const entries: FeedEntry[] = [];

  for (const raw of rawEntries) {
    const title = stripHtml(raw.title);
    const link = decodeEntities(raw.link).trim();
    const guid = decodeEntities(raw.guid).trim() || null;
    const id = link || guid;
    if (!title || !id) continue;

    entries.push({
      feedUrl,
      id,
      title,
      link: link || (guid && /^https?:\/\//i.test(guid) ? guid : ''),
      guid,
      publishedAt: toIsoTimestamp(raw.pubDate),
      description: raw.description,
    });
  }

  return entries;
}

// ── Feed Fetching ───────────────────────────────────────────────────────────

export interface FetchFeedOptions {
  timeoutMs?: number;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function toFetchError(url: string, err: unknown, timeoutMs: number): FetchError {
  if (err instanceof FetchError) return err;
  if (isAbort(err)) {
    return new FetchError(url, 'timeout', `Timed out after ${timeoutMs}ms fetching ${url}`);
  }
  return new FetchError(url, 'network', `Network error fetching ${url}: ${errorMessage(err)}`);
}

/**
 * Fetch one feed and return its entries.
 * @throws FetchError on HTTP, network, timeout or parse failure.
 */
export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<FeedEntry[]> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  let xml: string;
  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new FetchError(url, 'http', `HTTP ${response.status} fetching ${url}`, response.status);
    }
    xml = await response.text();
  } catch (err: unknown) {
    throw toFetchError(url, err, timeoutMs);
  }

  let rawEntries: RawFeedEntry[];
  try {
    rawEntries = parseFeedXml(xml);
  } catch (err: unknown) {
    throw new FetchError(url, 'malformed', `Malformed feed at ${url}: ${errorMessage(err)}`);
  }

  return toFeedEntries(url, rawEntries);
}

/**
 * Fetch every feed in order. A failing feed is recorded in `failedFeeds`
 * and never stops the remaining feeds.
 */
export async function fetchAllFeeds(
  urls: string[],
  options: FetchFeedOptions & { log?: Logger } = {},
): Promise<FetchAllResult> {
  const { log, ...fetchOptions } = options;
  const entries: FeedEntry[] = [];
  const fetchedFeeds: string[] = [];
  const failedFeeds: FailedFeed[] = [];

  for (const url of urls) {
    log?.debug(`  Fetching ${url}...`);
    try {
      const feedEntries = await fetchFeed(url, fetchOptions);
      entries.push(...feedEntries);
      fetchedFeeds.push(url);
      log?.debug(`    Found ${feedEntries.length} entries`);
    } catch (err: unknown) {
      const error = toFetchError(url, err, fetchOptions.timeoutMs ?? DEFAULT_TIMEOUT_MS);
      failedFeeds.push({ url, reason: error.reason, error: error.message.slice(0, 200) });
      log?.warn(`Feed failed (${error.reason}): ${error.message.slice(0, 200)}`);
    }
  }

  return { entries, fetchedFeeds, failedFeeds };
}
