/**
 * Error types shared across the bot.
 *
 * Per-feed and per-entry failures are caught at their boundary and recorded in
 * the run log. ConfigError and StoreError abort the run.
 */

/** Missing or invalid configuration. Raised before any network call. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type FetchFailureReason = 'http' | 'network' | 'timeout' | 'malformed';

/** A single feed could not be fetched or parsed. */
export class FetchError extends Error {
  url: string;
  reason: FetchFailureReason;
  status?: number;

  constructor(url: string, reason: FetchFailureReason, message: string, status?: number) {
    super(message);
    this.name = 'FetchError';
    this.url = url;
    this.reason = reason;
    this.status = status;
  }
}

/** The dedup store on disk is unreadable or corrupt. */
export class StoreError extends Error {
  path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'StoreError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
