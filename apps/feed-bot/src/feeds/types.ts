/**
 * Types for feed fetching.
 */

import type { FetchFailureReason } from '../errors.js';

export interface FeedEntry {
  feedUrl: string;
  /** Dedup key: the entry link, or its guid when the link is missing. */
  id: string;
  title: string;
  link: string;
  guid: string | null;
  publishedAt: string | null;  // ISO timestamp, null when absent or unparseable
  description: string;         // Plain text, first ~500 chars
}

export interface FailedFeed {
  url: string;
  reason: FetchFailureReason;
  error: string;
}

export interface FetchAllResult {
  entries: FeedEntry[];
  fetchedFeeds: string[];
  failedFeeds: FailedFeed[];
}

export interface SkippedFeedLine {
  line: number;
  text: string;
  reason: 'invalid-url' | 'duplicate';
}

export interface FeedList {
  urls: string[];
  skipped: SkippedFeedLine[];
}
