/**
 * Post composition.
 *
 * Turns a feed entry into post text that fits the platform limit. X counts
 * every link as 23 characters regardless of its real length.
 *
 * TemplateComposer writes "<title> <link>". XaiComposer asks xAI for a
 * livelier post and falls back to the template if that fails.
 */

import { errorMessage } from './errors.js';
import { callXai, type ChatMessage } from './xai.js';
import type { XaiSettings } from './config.js';
import type { FeedEntry } from './feeds/types.js';

export const MAX_POST_LENGTH = 280;
export const LINK_WEIGHT = 23;
export const URL_PLACEHOLDER = '[URL]';

const URL_PATTERN = /https?:\/\/\S+/g;

// ── Length helpers ──────────────────────────────────────────────────────────

// Code points X counts as one character. Everything else (CJK, emoji, most
// symbols) counts as two.
const SINGLE_WEIGHT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0000, 0x10ff],
  [0x2000, 0x200d],
  [0x2010, 0x201f],
  [0x2032, 0x2037],
];

function charWeight(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  return SINGLE_WEIGHT_RANGES.some(([lo, hi]) => cp >= lo && cp <= hi) ? 1 : 2;
}

function textWeight(text: string): number {
  let weight = 0;
  for (const ch of text) weight += charWeight(ch);
  return weight;
}

/**
 * Length as the platform counts it: links as 23, CJK and emoji code points
 * as 2. Multi-code-point emoji are weighed per code point, which can only
 * overestimate.
 */
export function weightedLength(text: string): number {
  let length = 0;
  let last = 0;
  for (const match of text.matchAll(URL_PATTERN)) {
    const start = match.index ?? 0;
    length += textWeight(text.slice(last, start)) + LINK_WEIGHT;
    last = start + match[0].length;
  }
  return length + textWeight(text.slice(last));
}

/**
 * Cut `text` to at most `max` code points, ending in an ellipsis. Breaks at
 * a word boundary when one falls in the last 40% of the kept text.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  if (max < 1) return '';

  let cut = chars.slice(0, max - 1).join('');
  const space = cut.lastIndexOf(' ');
  if (space > cut.length * 0.6) cut = cut.slice(0, space);
  return cut.trimEnd() + '…';
}

function truncateWeighted(text: string, budget: number): string {
  let max = budget;
  let out = truncate(text, max);
  while (max > 0 && weightedLength(out) > budget) {
    max--;
    out = truncate(text, max);
  }
  return out;
}

/** Make sure the post carries the link: fill a [URL] placeholder or append it. */
export function ensureLink(text: string, link: string): string {
  if (!link || text.includes(link)) return text;
  if (text.includes(URL_PLACEHOLDER)) return text.split(URL_PLACEHOLDER).join(link);
  return `${text.trimEnd()} ${link}`;
}

/**
 * Return text that contains `link` and fits MAX_POST_LENGTH, shortening the
 * prose (never the link) when needed.
 */
export function fitToLimit(text: string, link: string): string {
  const normalized = text.replace(/[ \t]+/g, ' ').trim();
  const withLink = ensureLink(normalized, link);
  if (weightedLength(withLink) <= MAX_POST_LENGTH) return withLink;

  const prose = (link ? withLink.split(link).join(' ') : withLink).replace(/\s+/g, ' ').trim();
  if (!link) return truncateWeighted(prose, MAX_POST_LENGTH);

  const budget = MAX_POST_LENGTH - LINK_WEIGHT - 1;
  const fitted = truncateWeighted(prose, budget);
  return fitted ? `${fitted} ${link}` : link;
}

export function formatTemplatePost(entry: FeedEntry): string {
  return fitToLimit(entry.title.replace(/\s+/g, ' '), entry.link);
}

// ── Composers ───────────────────────────────────────────────────────────────

export interface ComposeResult {
  text: string;
  composer: 'template' | 'xai';
  /** Set when xAI failed and the template was used instead. */
  fallbackReason?: string;
}

export interface Composer {
  readonly name: ComposeResult['composer'];
  compose(entry: FeedEntry): Promise<ComposeResult>;
}

export class TemplateComposer implements Composer {
  readonly name = 'template';

  async compose(entry: FeedEntry): Promise<ComposeResult> {
    return { text: formatTemplatePost(entry), composer: 'template' };
  }
}

const SYSTEM_PROMPT = `You write posts for X (Twitter) that share news articles.
Be informative and conversational. Do not wrap the post in quotation marks.
Keep the post under 240 characters and end it with the article URL exactly as given.`;

export function buildPromptMessages(entry: FeedEntry): ChatMessage[] {
  const summary = entry.description ? `\nSummary: ${entry.description.slice(0, 500)}` : '';
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Write a post about this article.\n\nTitle: ${entry.title}${summary}\nURL: ${entry.link}`,
    },
  ];
}

function stripWrappingQuotes(text: string): string {
  return text.replace(/^["“](.*)["”]$/s, '$1').trim();
}

export class XaiComposer implements Composer {
  readonly name = 'xai';
  private readonly settings: XaiSettings;
  private readonly timeoutMs: number;
  private readonly fallback = new TemplateComposer();

  constructor(settings: XaiSettings, timeoutMs: number) {
    this.settings = settings;
    this.timeoutMs = timeoutMs;
  }

  async compose(entry: FeedEntry): Promise<ComposeResult> {
    try {
      const content = await callXai(this.settings, buildPromptMessages(entry), { timeoutMs: this.timeoutMs });
      return { text: fitToLimit(stripWrappingQuotes(content), entry.link), composer: 'xai' };
    } catch (err: unknown) {
      const fallback = await this.fallback.compose(entry);
      return { ...fallback, fallbackReason: errorMessage(err) };
    }
  }
}
