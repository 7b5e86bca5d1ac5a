/**
 * Shared fixtures for tests.
 */

import { vi } from 'vitest';
import { DEFAULT_POST_API_URL, type BotConfig } from './config.js';
import type { FeedEntry } from './feeds/types.js';
import type { Logger } from './output.js';
import type { Poster, PostResult } from './poster.js';

export const TEST_CREDENTIALS = {
  consumerKey: 'test-consumer-key',
  consumerSecret: 'test-consumer-secret',
  accessToken: 'test-access-token',
  accessTokenSecret: 'test-token-secret',
};

export const TEST_ENV: NodeJS.ProcessEnv = {
  OAUTH_CONSUMER_KEY: 'test-consumer-key',
  OAUTH_CONSUMER_SECRET: 'test-consumer-secret',
  OAUTH_ACCESS_TOKEN: 'test-access-token',
  OAUTH_ACCESS_TOKEN_SECRET: 'test-token-secret',
};

export function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    feedsFile: '/nonexistent/rss_feeds.txt',
    logsDir: '/nonexistent/logs',
    maxPosts: 5,
    timeoutMs: 5000,
    shuffle: false,
    dryRun: false,
    postApiUrl: DEFAULT_POST_API_URL,
    credentials: TEST_CREDENTIALS,
    xai: null,
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<FeedEntry> = {}): FeedEntry {
  const link = overrides.link ?? 'https://example.com/posts/1';
  return {
    feedUrl: 'https://feeds.test/a.xml',
    id: link,
    title: 'Test Article',
    link,
    guid: null,
    publishedAt: '2025-01-06T10:00:00.000Z',
    description: 'Article summary text.',
    ...overrides,
  };
}

export interface TestItem {
  title: string;
  link?: string;
  guid?: string;
  pubDate?: string;
  description?: string;
}

export function rssXml(items: TestItem[]): string {
  const body = items
    .map((item) => [
      '<item>',
      `<title>${item.title}</title>`,
      item.link ? `<link>${item.link}</link>` : '',
      item.guid ? `<guid>${item.guid}</guid>` : '',
      item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : '',
      item.description ? `<description>${item.description}</description>` : '',
      '</item>',
    ].join(''))
    .join('\n');
  return `<?xml version="1.0"?>\n<rss version="2.0"><channel><title>Test Feed</title>\n${body}\n</channel></rss>`;
}

export interface LoggedLine {
  level: string;
  msg: string;
}

/** A Logger that records messages instead of printing them. */
export function captureLogger(): Logger & { lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const record = (level: string) => (msg: string) => {
    lines.push({ level, msg });
  };
  return {
    lines,
    error: record('error'),
    warn: record('warn'),
    info: record('info'),
    success: record('success'),
    dim: record('dim'),
    debug: record('debug'),
  };
}

/** Poster that replays canned results and records what it was asked to post. */
export class FakePoster implements Poster {
  readonly texts: string[] = [];
  private readonly results: PostResult[];

  constructor(results: PostResult[]) {
    this.results = [...results];
  }

  async post(text: string): Promise<PostResult> {
    this.texts.push(text);
    return this.results.shift() ?? { ok: true, id: `post-${this.texts.length}` };
  }
}

type FetchRoute = (init?: RequestInit) => Response | Promise<Response>;

/**
 * Stub global fetch, answering by URL. Unknown URLs reject like a DNS
 * failure. Responses are built per call so bodies can be read every time.
 */
export function stubFetch(routes: Record<string, FetchRoute>) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (!route) throw new TypeError(`fetch failed: getaddrinfo ENOTFOUND ${url}`);
    return route(init);
  });
  vi.stubGlobal('fetch', mock);
  return mock;
}

export function xmlResponse(xml: string, status = 200): Response {
  return new Response(xml, { status, headers: { 'Content-Type': 'application/rss+xml' } });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}
