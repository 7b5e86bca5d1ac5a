/**
 * Command Handlers
 *
 * Subcommands:
 *   run       One pass: fetch → dedup → compose → post → log (default)
 *   feeds     List the feeds the bot would read
 *   history   Show past runs from the run log
 */

import { resolve } from 'path';
import { maskSecret, readSecret } from './api-keys.js';
import { TemplateComposer, XaiComposer, type Composer } from './composer.js';
import { DEFAULT_LOGS_DIR, loadConfig, logPaths, type BotConfig, type ConfigOverrides } from './config.js';
import { JsonFileDedupStore } from './dedup.js';
import { ConfigError, StoreError, errorMessage } from './errors.js';
import { loadFeedList } from './feeds/feed-list.js';
import type { FeedList } from './feeds/types.js';
import { boolOpt, parseCliArgs, parseIntOpt, stringOpt, type ParsedCliArgs } from './cli.js';
import { createFileSink, createLogger, formatCount, formatDuration, getColors, isCI } from './output.js';
import { DryRunPoster, XPoster, type Poster } from './poster.js';
import { JsonlRunLog, abortedRunEntry, type RunLogEntry } from './run-log.js';
import { exitCodeFor, runOnce } from './runner.js';

export interface CommandResult {
  output: string;
  exitCode: number;
}

type CommandHandler = (
  positional: string[],
  args: ParsedCliArgs,
  env: NodeJS.ProcessEnv,
) => Promise<CommandResult>;

export const USAGE = `Usage: feed-bot [command] [options]

Commands:
  run              Fetch feeds and post new entries (default)
  feeds            List configured feeds
  history [n]      Show the last n runs (default 10)

Options:
  --feeds-file <path>   Feed list (default rss_feeds.txt)
  --logs-dir <path>     Directory for history and logs (default logs)
  --max-posts <n>       Posts per run (default 1)
  --timeout <ms>        Per-request timeout (default 30000)
  --shuffle             Visit feeds in random order
  --dry-run             Compose but do not post or record
  --json                Print machine-readable output
  --verbose             Show per-feed progress
  --ci                  Plain output without colors
  --all                 history: show every run`;

function overridesFrom(args: ParsedCliArgs): ConfigOverrides {
  return {
    feedsFile: stringOpt(args, 'feeds-file'),
    logsDir: stringOpt(args, 'logs-dir'),
    maxPosts: stringOpt(args, 'max-posts'),
    timeoutMs: stringOpt(args, 'timeout'),
    shuffle: boolOpt(args, 'shuffle'),
    dryRun: boolOpt(args, 'dry-run'),
  };
}

export function createComposer(config: BotConfig): Composer {
  return config.xai ? new XaiComposer(config.xai, config.timeoutMs) : new TemplateComposer();
}

export function createPoster(config: BotConfig): Poster {
  if (config.dryRun || !config.credentials) return new DryRunPoster();
  return new XPoster(config.credentials, { apiUrl: config.postApiUrl, timeoutMs: config.timeoutMs });
}

function logsDirFrom(args: ParsedCliArgs, env: NodeJS.ProcessEnv): string {
  return resolve(stringOpt(args, 'logs-dir') ?? readSecret(env, 'FEED_BOT_LOGS_DIR') ?? DEFAULT_LOGS_DIR);
}

function dryRunFrom(args: ParsedCliArgs, env: NodeJS.ProcessEnv): boolean {
  const value = boolOpt(args, 'dry-run');
  if (value !== undefined) return value;
  const fromEnv = readSecret(env, 'FEED_BOT_DRY_RUN');
  return fromEnv === 'true' || fromEnv === '1';
}

/**
 * A run that fails before it starts still leaves an ERROR line in
 * feed_bot.log and a fatalError entry in runs.jsonl, so the committed logs
 * show why nothing was posted.
 */
async function recordStartupFailure(logsDir: string, err: unknown, startedAt: Date, dryRun: boolean): Promise<void> {
  const paths = logPaths({ logsDir });
  const message = errorMessage(err);
  const prefix = err instanceof ConfigError ? 'Configuration error' : 'Start-up failed';
  try {
    createFileSink(paths.logFile)('ERROR', `${prefix}: ${message}`);
    await new JsonlRunLog(paths.runLog).append(abortedRunEntry(message, startedAt, dryRun));
  } catch (logErr: unknown) {
    console.error(`Could not record the failed run in ${logsDir}: ${errorMessage(logErr)}`);
  }
}

// ── Commands ────────────────────────────────────────────────────────────────

/**
 * One full pass
 */
async function run(_positional: string[], args: ParsedCliArgs, env: NodeJS.ProcessEnv): Promise<CommandResult> {
  const startedAt = new Date();
  let config: BotConfig;
  let feedList: FeedList;
  try {
    // Both throw ConfigError before any network call
    config = loadConfig(env, overridesFrom(args));
    feedList = loadFeedList(config.feedsFile);
  } catch (err: unknown) {
    await recordStartupFailure(logsDirFrom(args, env), err, startedAt, dryRunFrom(args, env));
    throw err;
  }

  const json = args.json === true;
  const paths = logPaths(config);
  const log = createLogger({
    ciMode: args.ci === true || json || isCI(),
    verbose: args.verbose === true,
    file: paths.logFile,
  });

  for (const skipped of feedList.skipped) {
    log.warn(`Skipping feed list line ${skipped.line} (${skipped.reason}): ${skipped.text}`);
  }
  if (config.dryRun) log.dim('Dry run: nothing will be posted or recorded');
  if (config.credentials) log.debug(`Posting with consumer key ${maskSecret(config.credentials.consumerKey)}`);
  if (config.xai) log.debug(`Composing with ${config.xai.model} (key ${maskSecret(config.xai.apiKey)})`);

  const start = Date.now();
  const entry = await runOnce({
    config,
    feeds: feedList.urls,
    store: new JsonFileDedupStore(paths.history),
    runLog: new JsonlRunLog(paths.runLog),
    composer: createComposer(config),
    poster: createPoster(config),
    log,
  });
  log.debug(`Finished in ${formatDuration(Date.now() - start)}`);

  return {
    output: json ? JSON.stringify(entry, null, 2) : '',
    exitCode: exitCodeFor(entry),
  };
}

/**
 * List the feed URLs the bot would read, and lines it would skip
 */
async function feeds(_positional: string[], args: ParsedCliArgs, env: NodeJS.ProcessEnv): Promise<CommandResult> {
  const config = loadConfig(env, { ...overridesFrom(args), dryRun: true });
  const list = loadFeedList(config.feedsFile);

  if (args.json === true) {
    return { output: JSON.stringify(list, null, 2), exitCode: 0 };
  }

  const c = getColors(args.ci === true || isCI());
  let output = `${c.bold}${formatCount(list.urls.length, 'feed')}${c.reset} in ${config.feedsFile}\n`;
  for (const url of list.urls) {
    output += `  ${url}\n`;
  }
  if (list.skipped.length > 0) {
    output += `\n${c.yellow}Skipped lines:${c.reset}\n`;
    for (const skipped of list.skipped) {
      output += `  ${String(skipped.line).padStart(4)}  ${skipped.reason.padEnd(11)} ${skipped.text}\n`;
    }
  }
  return { output: output.trimEnd(), exitCode: 0 };
}

export function formatRunLine(entry: RunLogEntry): string {
  const status = entry.fatalError ? '✗' : entry.postFailures.length > 0 ? '⚠' : '✓';
  const dry = entry.dryRun ? ' [dry run]' : '';
  return `${status} ${entry.startedAt}${dry}  ${entry.summary}`;
}

/**
 * Summarize past runs
 */
async function history(positional: string[], args: ParsedCliArgs, env: NodeJS.ProcessEnv): Promise<CommandResult> {
  const config = loadConfig(env, { ...overridesFrom(args), dryRun: true });
  const paths = logPaths(config);
  const runs = await new JsonlRunLog(paths.runLog).read();

  const store = new JsonFileDedupStore(paths.history);
  await store.load();

  const count = args.all === true ? runs.length : Math.max(1, parseIntOpt(positional[0], 10));
  const recent = runs.slice(-count).reverse();

  if (args.json === true) {
    return { output: JSON.stringify({ runs: recent, postedTotal: store.size }, null, 2), exitCode: 0 };
  }

  if (runs.length === 0) {
    return { output: `No runs recorded yet. ${formatCount(store.size, 'entry', 'entries')} in history.`, exitCode: 0 };
  }

  const c = getColors(args.ci === true || isCI());
  const posts = runs.reduce((sum, r) => sum + (r.dryRun ? 0 : r.posted.length), 0);
  const failures = runs.reduce((sum, r) => sum + r.postFailures.length, 0);

  let output = `${c.bold}${formatCount(runs.length, 'run')}${c.reset}: `;
  output += `${formatCount(posts, 'post')}, ${formatCount(failures, 'failed post')}, `;
  output += `${formatCount(store.size, 'entry', 'entries')} in history\n\n`;

  for (const entry of recent) {
    output += formatRunLine(entry) + '\n';
    for (const item of entry.posted) {
      output += `${c.dim}    + ${item.title}${c.reset}\n`;
    }
    for (const failure of entry.postFailures) {
      output += `${c.red}    ! ${failure.title}: ${failure.error}${c.reset}\n`;
    }
  }

  return { output: output.trimEnd(), exitCode: 0 };
}

export const COMMANDS = new Map<string, CommandHandler>([
  ['run', run],
  ['feeds', feeds],
  ['history', history],
]);

/**
 * Dispatch argv to a command. Configuration and store errors become exit
 * code 1, unknown commands exit code 2.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<CommandResult> {
  const args = parseCliArgs(argv);
  if (args.help === true) return { output: USAGE, exitCode: 0 };

  const [name = 'run', ...rest] = args._positional;
  const handler = COMMANDS.get(name);
  if (!handler) {
    return { output: `Unknown command: ${name}\n\n${USAGE}`, exitCode: 2 };
  }

  try {
    return await handler(rest, args, env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      return { output: `Configuration error: ${err.message}`, exitCode: 1 };
    }
    if (err instanceof StoreError) {
      return { output: `Store error: ${err.message}`, exitCode: 1 };
    }
    throw err;
  }
}
