/**
 * Bot configuration.
 *
 * Built once at start-up from the environment plus CLI overrides, validated
 * with zod, frozen, and passed explicitly to everything that needs it.
 */

import { join, resolve } from 'path';
import { z } from 'zod';
import { readSecret } from './api-keys.js';
import { ConfigError } from './errors.js';

export const DEFAULT_FEEDS_FILE = 'rss_feeds.txt';
export const DEFAULT_LOGS_DIR = 'logs';
export const DEFAULT_POST_API_URL = 'https://api.twitter.com/2/tweets';
export const DEFAULT_XAI_API_URL = 'https://api.x.ai/v1/chat/completions';
export const DEFAULT_XAI_MODEL = 'grok-3-mini';
export const DEFAULT_TIMEOUT_MS = 30_000;

export const CREDENTIAL_VARS = [
  'OAUTH_CONSUMER_KEY',
  'OAUTH_CONSUMER_SECRET',
  'OAUTH_ACCESS_TOKEN',
  'OAUTH_ACCESS_TOKEN_SECRET',
] as const;

export interface OAuthCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface XaiSettings {
  apiKey: string;
  model: string;
  apiUrl: string;
}

export interface BotConfig {
  readonly feedsFile: string;
  readonly logsDir: string;
  readonly maxPosts: number;
  readonly timeoutMs: number;
  readonly shuffle: boolean;
  readonly dryRun: boolean;
  readonly postApiUrl: string;
  /** Null only for dry runs, which never sign a request. */
  readonly credentials: Readonly<OAuthCredentials> | null;
  /** Null when XAI_API_KEY is unset; messages then use the plain template. */
  readonly xai: Readonly<XaiSettings> | null;
}

/** Values taken from CLI flags; they win over the environment. */
export interface ConfigOverrides {
  feedsFile?: string;
  logsDir?: string;
  maxPosts?: string | number;
  timeoutMs?: string | number;
  shuffle?: boolean;
  dryRun?: boolean;
}

const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const ConfigSchema = z.object({
  feedsFile: z.string().min(1).default(DEFAULT_FEEDS_FILE),
  logsDir: z.string().min(1).default(DEFAULT_LOGS_DIR),
  maxPosts: z.coerce.number().int().positive().default(1),
  timeoutMs: z.coerce.number().int().min(1000).max(300_000).default(DEFAULT_TIMEOUT_MS),
  shuffle: flag.default(false),
  dryRun: flag.default(false),
  postApiUrl: z.string().url().default(DEFAULT_POST_API_URL),
  xaiApiUrl: z.string().url().default(DEFAULT_XAI_API_URL),
  xaiModel: z.string().min(1).default(DEFAULT_XAI_MODEL),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the run configuration.
 *
 * @throws ConfigError when a value fails validation, or when posting
 *   credentials are missing outside a dry run.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): BotConfig {
  const parsed = ConfigSchema.safeParse({
    feedsFile: overrides.feedsFile ?? readSecret(env, 'FEED_BOT_FEEDS_FILE'),
    logsDir: overrides.logsDir ?? readSecret(env, 'FEED_BOT_LOGS_DIR'),
    maxPosts: overrides.maxPosts ?? readSecret(env, 'FEED_BOT_MAX_POSTS'),
    timeoutMs: overrides.timeoutMs ?? readSecret(env, 'FEED_BOT_TIMEOUT_MS'),
    shuffle: overrides.shuffle ?? readSecret(env, 'FEED_BOT_SHUFFLE'),
    dryRun: overrides.dryRun ?? readSecret(env, 'FEED_BOT_DRY_RUN'),
    postApiUrl: readSecret(env, 'POST_API_URL'),
    xaiApiUrl: readSecret(env, 'XAI_API_URL'),
    xaiModel: readSecret(env, 'XAI_MODEL'),
  });

  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;

  let credentials: OAuthCredentials | null = null;
  const missing = CREDENTIAL_VARS.filter((name) => !readSecret(env, name));
  if (missing.length === 0) {
    credentials = {
      consumerKey: readSecret(env, 'OAUTH_CONSUMER_KEY') ?? '',
      consumerSecret: readSecret(env, 'OAUTH_CONSUMER_SECRET') ?? '',
      accessToken: readSecret(env, 'OAUTH_ACCESS_TOKEN') ?? '',
      accessTokenSecret: readSecret(env, 'OAUTH_ACCESS_TOKEN_SECRET') ?? '',
    };
  } else if (!values.dryRun) {
    throw new ConfigError(`Missing posting credentials: ${missing.join(', ')}`);
  }

  const xaiApiKey = readSecret(env, 'XAI_API_KEY');

  return Object.freeze({
    feedsFile: resolve(values.feedsFile),
    logsDir: resolve(values.logsDir),
    maxPosts: values.maxPosts,
    timeoutMs: values.timeoutMs,
    shuffle: values.shuffle,
    dryRun: values.dryRun,
    postApiUrl: values.postApiUrl,
    credentials: credentials && Object.freeze(credentials),
    xai: xaiApiKey
      ? Object.freeze({ apiKey: xaiApiKey, model: values.xaiModel, apiUrl: values.xaiApiUrl })
      : null,
  });
}

// ── Files under logsDir ─────────────────────────────────────────────────────

export const HISTORY_FILE = 'posted_articles.json';
export const RUN_LOG_FILE = 'runs.jsonl';
export const LOG_FILE = 'feed_bot.log';

export interface LogPaths {
  history: string;
  runLog: string;
  logFile: string;
}

export function logPaths(config: Pick<BotConfig, 'logsDir'>): LogPaths {
  return {
    history: join(config.logsDir, HISTORY_FILE),
    runLog: join(config.logsDir, RUN_LOG_FILE),
    logFile: join(config.logsDir, LOG_FILE),
  };
}
