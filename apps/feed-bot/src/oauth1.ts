/**
 * OAuth 1.0a request signing (RFC 5849, HMAC-SHA1) for the posting API.
 *
 * JSON request bodies are not part of the signature; only the OAuth
 * parameters and any query-string parameters are signed.
 */

import { createHmac, randomBytes } from 'crypto';
import type { OAuthCredentials } from './config.js';

export interface SignableRequest {
  method: string;
  url: string;
}

export interface SigningOverrides {
  nonce?: string;
  timestamp?: number;
}

/** RFC 3986 percent-encoding, stricter than encodeURIComponent. */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function normalizeBaseUrl(url: URL): string {
  const defaultPort = (url.protocol === 'https:' && url.port === '443') || (url.protocol === 'http:' && url.port === '80');
  const host = url.port && !defaultPort ? `${url.hostname}:${url.port}` : url.hostname;
  return `${url.protocol}//${host.toLowerCase()}${url.pathname}`;
}

export function buildSignatureBaseString(
  method: string,
  url: string,
  params: Array<[string, string]>,
): string {
  const parsed = new URL(url);
  const all: Array<[string, string]> = [...params, ...parsed.searchParams.entries()];

  const paramString = all
    .map(([k, v]): [string, string] => [percentEncode(k), percentEncode(v)])
    .sort(([ak, av], [bk, bv]) => (ak === bk ? (av < bv ? -1 : av > bv ? 1 : 0) : ak < bk ? -1 : 1))
    .map(([k, v]) => `${k}=${v}`)
    .join('&');

  return [method.toUpperCase(), percentEncode(normalizeBaseUrl(parsed)), percentEncode(paramString)].join('&');
}

/**
 * Build the `Authorization` header value for a request.
 * Nonce and timestamp are generated unless overridden.
 */
export function signOAuth1(
  request: SignableRequest,
  credentials: OAuthCredentials,
  overrides: SigningOverrides = {},
): string {
  const oauthParams: Array<[string, string]> = [
    ['oauth_consumer_key', credentials.consumerKey],
    ['oauth_nonce', overrides.nonce ?? randomBytes(16).toString('hex')],
    ['oauth_signature_method', 'HMAC-SHA1'],
    ['oauth_timestamp', String(overrides.timestamp ?? Math.floor(Date.now() / 1000))],
    ['oauth_token', credentials.accessToken],
    ['oauth_version', '1.0'],
  ];

  const baseString = buildSignatureBaseString(request.method, request.url, oauthParams);
  const signingKey = `${percentEncode(credentials.consumerSecret)}&${percentEncode(credentials.accessTokenSecret)}`;
  const signature = createHmac('sha1', signingKey).update(baseString).digest('base64');

  const signed: Array<[string, string]> = [...oauthParams, ['oauth_signature', signature]];
  const header = signed
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${percentEncode(k)}="${percentEncode(v)}"`)
    .join(', ');

  return `OAuth ${header}`;
}
