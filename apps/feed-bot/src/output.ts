/**
 * Output Utilities
 *
 * Terminal colors and logging. Supports CI mode (no colors) via --ci flag or
 * CI=true. Every message can also be appended to a plain-text log file, which
 * the CI job commits alongside the run log.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export interface Colors {
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  dim: string;
  bold: string;
  reset: string;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  success: (msg: string) => void;
  dim: (msg: string) => void;
  /** Printed only with --verbose; always written to the log file. */
  debug: (msg: string) => void;
}

export interface LoggerOptions {
  ciMode?: boolean;
  verbose?: boolean;
  /** Path of the plain-text log file. Omit to log to the console only. */
  file?: string | null;
}

/**
 * Detect if running in CI mode
 */
export function isCI(): boolean {
  return process.argv.includes('--ci') || process.env.CI === 'true';
}

/**
 * Get color codes (empty strings in CI mode)
 */
export function getColors(ciMode: boolean = isCI()): Colors {
  if (ciMode) {
    return { red: '', green: '', yellow: '', blue: '', cyan: '', dim: '', bold: '', reset: '' };
  }

  return {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    dim: '\x1b[2m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
  };
}

/** One log-file line: `2026-01-05T10:00:00.000Z - INFO - message`. */
export function formatLogLine(level: LogLevel, msg: string, now: Date = new Date()): string {
  return `${now.toISOString()} - ${level} - ${msg}`;
}

/** Appends formatted lines to `file`, creating its directory on first use. */
export function createFileSink(file: string | null | undefined): (level: LogLevel, msg: string) => void {
  if (!file) return () => {};

  let ready = false;
  return (level, msg) => {
    if (!ready) {
      const dir = dirname(file);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      ready = true;
    }
    appendFileSync(file, formatLogLine(level, msg) + '\n');
  };
}

/**
 * Create a logger with color support and an optional file sink
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { ciMode = isCI(), verbose = false, file = null } = options;
  const c = getColors(ciMode);
  const toFile = createFileSink(file);

  return {
    error: (msg: string) => {
      console.log(`${c.red}${msg}${c.reset}`);
      toFile('ERROR', msg);
    },
    warn: (msg: string) => {
      console.log(`${c.yellow}${msg}${c.reset}`);
      toFile('WARNING', msg);
    },
    info: (msg: string) => {
      console.log(`${c.blue}${msg}${c.reset}`);
      toFile('INFO', msg);
    },
    success: (msg: string) => {
      console.log(`${c.green}${msg}${c.reset}`);
      toFile('INFO', msg);
    },
    dim: (msg: string) => {
      console.log(`${c.dim}${msg}${c.reset}`);
      toFile('INFO', msg);
    },
    debug: (msg: string) => {
      if (verbose) console.log(`${c.dim}${msg}${c.reset}`);
      toFile('DEBUG', msg);
    },
  };
}

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural: string | null = null): string {
  const form = count === 1 ? singular : (plural || singular + 's');
  return `${count} ${form}`;
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}
