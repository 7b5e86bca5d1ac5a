/**
 * Reading secrets from the environment.
 *
 * CI secret stores and some .env parsers leave surrounding quotes on values,
 * which breaks request signing, so every secret goes through readSecret().
 */

/**
 * Read a variable from `env`, stripping surrounding quotes and whitespace.
 * Returns undefined if the variable is unset or empty after cleaning.
 */
export function readSecret(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (!raw) return undefined;

  const cleaned = raw.replace(/^["'\s]+|["'\s]+$/g, '');
  return cleaned || undefined;
}

/** Mask a secret for log output, keeping the last four characters. */
export function maskSecret(value: string): string {
  if (value.length <= 4) return '****';
  return `****${value.slice(-4)}`;
}
