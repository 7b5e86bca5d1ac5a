/**
 * xAI API Integration
 *
 * Chat completions against the OpenAI-compatible xAI endpoint, used to write
 * post text for an entry.
 */

import { z } from 'zod';
import type { XaiSettings } from './config.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface XaiCallOptions {
  timeoutMs?: number;
}

const TEMPERATURE = 0.7;
const MAX_TOKENS = 300;

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
});

function describeError(body: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(body));
    if (parsed.success && parsed.data.error) {
      const error = parsed.data.error;
      const msg = typeof error === 'string' ? error : error.message;
      if (msg) return msg;
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return body.slice(0, 300);
}

/**
 * Call xAI chat completions and return the completion text.
 * @throws Error on HTTP failure, timeout, or an unexpected response shape.
 */
export async function callXai(
  settings: XaiSettings,
  messages: ChatMessage[],
  options: XaiCallOptions = {},
): Promise<string> {
  const { timeoutMs = 30_000 } = options;

  const response = await fetch(settings.apiUrl, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${settings.apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: settings.model,
      messages,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      stream: false,
    }),
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const msg = describeError(await response.text().catch(() => ''));
    if (response.status === 401 || response.status === 403) {
      throw new Error(`xAI auth failed (${response.status}): check XAI_API_KEY (${msg})`);
    }
    if (response.status === 429) {
      throw new Error(`xAI rate limited: ${msg}`);
    }
    throw new Error(`xAI error (HTTP ${response.status}): ${msg}`);
  }

  const parsed = ChatCompletionSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error('xAI returned an unexpected response shape');
  }

  const content = parsed.data.choices[0].message.content?.trim() ?? '';
  if (!content) throw new Error('xAI returned an empty completion');

  return content;
}
