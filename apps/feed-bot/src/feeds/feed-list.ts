/**
 * Feed list loading.
 *
 * The feed file holds one URL per line. Blank lines and `#` comments are
 * ignored. Anything after `!` is an annotation, and only the first
 * whitespace-separated token counts, so both of these work:
 *
 *   https://example.com/feed.xml ! tech news
 *   https://example.org/rss      science
 */

import { existsSync, readFileSync } from 'fs';
import { ConfigError } from '../errors.js';
import type { FeedList, SkippedFeedLine } from './types.js';

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function parseFeedList(text: string): FeedList {
  const urls: string[] = [];
  const skipped: SkippedFeedLine[] = [];
  const seen = new Set<string>();

  text.split(/\r?\n/).forEach((raw, idx) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const token = line.split('!')[0].trim().split(/\s+/)[0];
    if (!token || !isHttpUrl(token)) {
      skipped.push({ line: idx + 1, text: line, reason: 'invalid-url' });
      return;
    }
    if (seen.has(token)) {
      skipped.push({ line: idx + 1, text: line, reason: 'duplicate' });
      return;
    }

    seen.add(token);
    urls.push(token);
  });

  return { urls, skipped };
}

/**
 * Read and parse the feed file.
 * @throws ConfigError if the file is missing or lists no usable URL.
 */
export function loadFeedList(path: string): FeedList {
  if (!existsSync(path)) {
    throw new ConfigError(`Feed list not found: ${path}`);
  }

  const list = parseFeedList(readFileSync(path, 'utf-8'));
  if (list.urls.length === 0) {
    throw new ConfigError(`Feed list ${path} contains no valid feed URLs`);
  }
  return list;
}
