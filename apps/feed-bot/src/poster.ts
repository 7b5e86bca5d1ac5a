/**
 * Poster — submits composed text to the X v2 API.
 *
 * post() never throws for an API or network failure. It returns a
 * PostResult, and the runner leaves failed entries out of the dedup store so
 * the next scheduled run retries them.
 */

import { z } from 'zod';
import { errorMessage } from './errors.js';
import { signOAuth1 } from './oauth1.js';
import type { OAuthCredentials } from './config.js';

export type PostErrorKind =
  | 'rate_limited'   // 429
  | 'unauthorized'   // 401/403
  | 'rejected'       // other 4xx, or 403 for duplicate content
  | 'server_error'   // 5xx
  | 'network'
  | 'timeout';

export type PostResult =
  | { ok: true; id: string }
  | { ok: false; kind: PostErrorKind; message: string; status?: number };

export interface Poster {
  post(text: string): Promise<PostResult>;
}

export interface XPosterOptions {
  apiUrl: string;
  timeoutMs: number;
}

const CreatedSchema = z.object({
  data: z.object({ id: z.string() }),
});

const ApiErrorSchema = z.object({
  detail: z.string().optional(),
  title: z.string().optional(),
  errors: z.array(z.object({ message: z.string().optional() })).optional(),
});

/**
 * X answers 403 both for bad credentials and for refused content such as a
 * duplicate post; the error detail tells them apart.
 */
export function classifyStatus(status: number, detail = ''): PostErrorKind {
  if (status === 429) return 'rate_limited';
  if (status === 403 && /duplicate/i.test(detail)) return 'rejected';
  if (status === 401 || status === 403) return 'unauthorized';
  if (status >= 400 && status < 500) return 'rejected';
  return 'server_error';
}

function describeApiError(body: string): string {
  try {
    const parsed = ApiErrorSchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      const msg = parsed.data.detail || parsed.data.errors?.[0]?.message || parsed.data.title;
      if (msg) return msg;
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return body.slice(0, 300) || 'no response body';
}

export class XPoster implements Poster {
  private readonly credentials: OAuthCredentials;
  private readonly options: XPosterOptions;

  constructor(credentials: OAuthCredentials, options: XPosterOptions) {
    this.credentials = credentials;
    this.options = options;
  }

  async post(text: string): Promise<PostResult> {
    const { apiUrl, timeoutMs } = this.options;

    let response: Response;
    try {
      response = await fetch(apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': signOAuth1({ method: 'POST', url: apiUrl }, this.credentials),
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err: unknown) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        return { ok: false, kind: 'timeout', message: `Post timed out after ${timeoutMs}ms` };
      }
      return { ok: false, kind: 'network', message: errorMessage(err) };
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const detail = describeApiError(body);
      const kind = classifyStatus(response.status, detail);
      let message = `HTTP ${response.status}: ${detail}`;
      const reset = Number(response.headers.get('x-rate-limit-reset'));
      if (kind === 'rate_limited' && Number.isFinite(reset) && reset > 0) {
        message += ` (limit resets at ${new Date(reset * 1000).toISOString()})`;
      }
      return { ok: false, kind, message, status: response.status };
    }

    const parsed = CreatedSchema.safeParse(await response.json().catch(() => null));
    // 2xx means the post was created, whatever the body says.
    return { ok: true, id: parsed.success ? parsed.data.data.id : 'unknown' };
  }
}

/** Accepts every post without sending anything. */
export class DryRunPoster implements Poster {
  readonly posted: string[] = [];

  async post(text: string): Promise<PostResult> {
    this.posted.push(text);
    return { ok: true, id: 'dry-run' };
  }
}
