/**
 * Runner
 *
 * One pass: fetch feeds → drop already-posted entries → compose → post →
 * record successes → append the run log.
 *
 * Entry point for both the CLI and the scheduled CI job. There is no loop;
 * the CI schedule supplies periodicity. Two overlapping runs would read the
 * same dedup file and can double-post.
 */

import { filterNewEntries, toPostedRecord, type DedupStore } from './dedup.js';
import { errorMessage } from './errors.js';
import { fetchAllFeeds } from './feeds/feed-fetcher.js';
import { formatCount } from './output.js';
import { summarizeRun, type PostFailure, type PostedItem, type RunLog, type RunLogEntry } from './run-log.js';
import type { Composer } from './composer.js';
import type { BotConfig } from './config.js';
import type { FailedFeed } from './feeds/types.js';
import type { Logger } from './output.js';
import type { PostErrorKind, Poster } from './poster.js';

export interface RunDeps {
  config: BotConfig;
  feeds: string[];
  store: DedupStore;
  runLog: RunLog;
  composer: Composer;
  poster: Poster;
  log: Logger;
  random?: () => number;
  now?: () => Date;
}

/**
 * A failed post does not use up a slot, so one entry the API always refuses
 * cannot block the entries behind it. Attempts are capped per slot.
 */
const ATTEMPTS_PER_POST = 3;

/** Failures that every further post would hit too. */
const STOP_KINDS: ReadonlySet<PostErrorKind> = new Set(['rate_limited', 'unauthorized']);

/** Fisher–Yates shuffle into a new array. */
export function shuffled<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * 0 for a completed run, 1 if the run aborted or every attempted post failed.
 */
export function exitCodeFor(entry: RunLogEntry): number {
  if (entry.fatalError) return 1;
  if (entry.posted.length === 0 && entry.postFailures.length > 0) return 1;
  return 0;
}

export async function runOnce(deps: RunDeps): Promise<RunLogEntry> {
  const { config, store, runLog, composer, poster, log } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  let feedsChecked = 0;
  let feedsFailed: FailedFeed[] = [];
  let entriesFetched = 0;
  let entriesNew = 0;
  const posted: PostedItem[] = [];
  const postFailures: PostFailure[] = [];
  let fatalError: string | undefined;

  try {
    await store.load();
    log.debug(`Dedup store holds ${formatCount(store.size, 'entry', 'entries')}`);

    const feeds = config.shuffle ? shuffled(deps.feeds, deps.random) : deps.feeds;
    feedsChecked = feeds.length;
    log.info(`Fetching ${formatCount(feeds.length, 'feed')}...`);

    const fetched = await fetchAllFeeds(feeds, { timeoutMs: config.timeoutMs, log });
    feedsFailed = fetched.failedFeeds;
    entriesFetched = fetched.entries.length;

    const fresh = filterNewEntries(fetched.entries, store);
    entriesNew = fresh.length;
    log.info(`Fetched ${formatCount(entriesFetched, 'entry', 'entries')}, ${entriesNew} new`);

    const attemptLimit = config.maxPosts * ATTEMPTS_PER_POST;
    let attempts = 0;
    for (const entry of fresh) {
      if (posted.length >= config.maxPosts || attempts >= attemptLimit) break;
      attempts++;
      log.info(`Found entry: ${entry.title}`);

      const composed = await composer.compose(entry);
      if (composed.fallbackReason) {
        log.warn(`xAI composition failed, using template: ${composed.fallbackReason}`);
      }
      log.debug(`Composed (${composed.composer}): ${composed.text}`);

      const result = await poster.post(composed.text);
      if (!result.ok) {
        postFailures.push({ id: entry.id, title: entry.title, kind: result.kind, error: result.message });
        log.error(`Post failed (${result.kind}) for ${entry.id}: ${result.message}`);
        if (STOP_KINDS.has(result.kind)) break;
        continue;
      }

      posted.push({
        id: entry.id,
        title: entry.title,
        feedUrl: entry.feedUrl,
        postId: result.id,
        composer: composed.composer,
      });

      if (config.dryRun) {
        log.dim(`[dry run] would post: ${composed.text}`);
      } else {
        store.append(toPostedRecord(entry, result.id, now()));
        await store.flush();
        log.success(`Posted ${result.id}: ${entry.title}`);
      }
    }
  } catch (err: unknown) {
    fatalError = errorMessage(err);
    log.error(`Run aborted: ${fatalError}`);
  }

  const partial = { entriesNew, posted, postFailures, feedsFailed, fatalError };
  const entry: RunLogEntry = {
    startedAt,
    completedAt: now().toISOString(),
    dryRun: config.dryRun,
    feedsChecked,
    feedsFailed,
    entriesFetched,
    entriesNew,
    posted,
    postFailures,
    summary: summarizeRun(partial),
    ...(fatalError !== undefined && { fatalError }),
  };

  await runLog.append(entry);
  log.info(`Run complete: ${entry.summary}`);
  return entry;
}
