/**
 * CLI argument helpers.
 */

/**
 * Parsed CLI arguments.
 * Named options are stored as key-value pairs.
 * Positional arguments are stored in _positional.
 */
export interface ParsedCliArgs {
  _positional: string[];
  [key: string]: string | boolean | string[];
}

/** Flags that never take a value, so `--dry-run feeds` keeps `feeds` positional. */
const BOOLEAN_FLAGS = new Set(['ci', 'json', 'verbose', 'dry-run', 'shuffle', 'all', 'help']);

/**
 * Parse CLI arguments, handling both --key=value and --key value formats.
 * Bare '--' separators are skipped. Boolean flags (no value) are set to true.
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const opts: ParsedCliArgs = { _positional: [] };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') continue;
    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      if (eqIdx !== -1) {
        opts[raw.slice(0, eqIdx)] = raw.slice(eqIdx + 1);
      } else {
        const next = argv[i + 1];
        if (!BOOLEAN_FLAGS.has(raw) && next !== undefined && !next.startsWith('--')) {
          opts[raw] = next;
          i++;
        } else {
          opts[raw] = true;
        }
      }
    } else {
      positional.push(arg);
    }
  }
  opts._positional = positional;
  return opts;
}

/** String value of an option, or undefined when absent or given as a bare flag. */
export function stringOpt(args: ParsedCliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

/** True for `--flag` and `--flag=true`; undefined when absent. */
export function boolOpt(args: ParsedCliArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value === 'true' || value === '1';
  return undefined;
}

/**
 * Parse an integer CLI value with a fallback.
 * Returns fallback on undefined or NaN. Correctly handles 0.
 */
export function parseIntOpt(val: string | undefined, fallback: number): number {
  if (val === undefined) return fallback;
  const n = parseInt(val, 10);
  return Number.isNaN(n) ? fallback : n;
}
