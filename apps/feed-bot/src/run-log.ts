/**
 * Run Log — one JSON line per run in `logs/runs.jsonl`.
 *
 * Lines are only ever appended. The CI job commits the file after each run.
 */

import { existsSync } from 'fs';
import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { formatCount } from './output.js';

const PostedItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  feedUrl: z.string(),
  postId: z.string(),
  composer: z.enum(['template', 'xai']),
});

const PostFailureSchema = z.object({
  id: z.string(),
  title: z.string(),
  kind: z.string(),
  error: z.string(),
});

const FailedFeedSchema = z.object({
  url: z.string(),
  reason: z.enum(['http', 'network', 'timeout', 'malformed']),
  error: z.string(),
});

export const RunLogEntrySchema = z.object({
  startedAt: z.string(),
  completedAt: z.string(),
  dryRun: z.boolean(),
  feedsChecked: z.number(),
  feedsFailed: z.array(FailedFeedSchema),
  entriesFetched: z.number(),
  entriesNew: z.number(),
  posted: z.array(PostedItemSchema),
  postFailures: z.array(PostFailureSchema),
  summary: z.string(),
  fatalError: z.string().optional(),
});

export type RunLogEntry = z.infer<typeof RunLogEntrySchema>;
export type PostedItem = z.infer<typeof PostedItemSchema>;
export type PostFailure = z.infer<typeof PostFailureSchema>;

export interface RunLog {
  append(entry: RunLogEntry): Promise<void>;
  /** All readable entries, oldest first. Unparseable lines are skipped. */
  read(): Promise<RunLogEntry[]>;
}

export function summarizeRun(
  entry: Pick<RunLogEntry, 'entriesNew' | 'posted' | 'postFailures' | 'feedsFailed' | 'fatalError'>,
): string {
  if (entry.fatalError) return `run aborted: ${entry.fatalError}`;

  const parts = [
    entry.entriesNew === 0
      ? 'no new entries'
      : `posted ${entry.posted.length} of ${formatCount(entry.entriesNew, 'new entry', 'new entries')}`,
  ];
  if (entry.postFailures.length > 0) parts.push(`${formatCount(entry.postFailures.length, 'post')} failed`);
  if (entry.feedsFailed.length > 0) parts.push(`${formatCount(entry.feedsFailed.length, 'feed')} failed`);
  return parts.join('; ');
}

/** Entry for a run that stopped before fetching anything. */
export function abortedRunEntry(
  fatalError: string,
  startedAt: Date,
  dryRun: boolean,
  completedAt: Date = new Date(),
): RunLogEntry {
  const counts = { entriesNew: 0, posted: [], postFailures: [], feedsFailed: [] };
  return {
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    dryRun,
    feedsChecked: 0,
    entriesFetched: 0,
    ...counts,
    summary: summarizeRun({ ...counts, fatalError }),
    fatalError,
  };
}

export function parseRunLog(content: string): RunLogEntry[] {
  const entries: RunLogEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    try {
      const parsed = RunLogEntrySchema.safeParse(JSON.parse(line));
      if (parsed.success) entries.push(parsed.data);
    } catch {
      // Partial line from an interrupted write
    }
  }
  return entries;
}

export class JsonlRunLog implements RunLog {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async append(entry: RunLogEntry): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, JSON.stringify(entry) + '\n');
  }

  async read(): Promise<RunLogEntry[]> {
    if (!existsSync(this.path)) return [];
    return parseRunLog(await readFile(this.path, 'utf-8'));
  }
}

export class MemoryRunLog implements RunLog {
  readonly entries: RunLogEntry[] = [];

  async append(entry: RunLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async read(): Promise<RunLogEntry[]> {
    return [...this.entries];
  }
}
