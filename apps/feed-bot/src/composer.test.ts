import { describe, it, expect } from 'vitest';
import { DEFAULT_XAI_API_URL } from './config.js';
import { jsonResponse, makeEntry, stubFetch } from './test-helpers.js';
import {
  MAX_POST_LENGTH,
  TemplateComposer,
  XaiComposer,
  buildPromptMessages,
  ensureLink,
  fitToLimit,
  formatTemplatePost,
  truncate,
  weightedLength,
} from './composer.js';

const XAI = { apiKey: 'test-secret', model: 'grok-3-mini', apiUrl: DEFAULT_XAI_API_URL };

describe('weightedLength', () => {
  it('counts each link as 23 characters', () => {
    expect(weightedLength('Read https://example.com/a-very-long-path-indeed now')).toBe(5 + 23 + 4);
  });

  it('counts Latin as 1 and emoji as 2', () => {
    expect(weightedLength('héllo 😀')).toBe(8);
  });

  it('counts CJK characters and the ellipsis as 2', () => {
    expect(weightedLength('日本語…')).toBe(8);
    expect(weightedLength('“quoted” — ok')).toBe(13);
  });
});

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('breaks at a late word boundary', () => {
    expect(truncate('alpha beta gamma', 12)).toBe('alpha beta…');
  });

  it('cuts mid-word when the last space is too early', () => {
    expect(truncate('hello world foo', 10)).toBe('hello wor…');
  });

  it('returns empty text for a zero budget', () => {
    expect(truncate('abc', 0)).toBe('');
  });
});

describe('ensureLink', () => {
  const link = 'https://example.com/x';

  it('appends a missing link', () => {
    expect(ensureLink('Look at this', link)).toBe('Look at this https://example.com/x');
  });

  it('fills a [URL] placeholder', () => {
    expect(ensureLink('See [URL] now', link)).toBe('See https://example.com/x now');
  });

  it('keeps text that already has the link', () => {
    expect(ensureLink(`Already ${link}`, link)).toBe(`Already ${link}`);
  });
});

describe('fitToLimit / formatTemplatePost', () => {
  it('formats "<title> <link>"', () => {
    const entry = makeEntry({ title: '  Widgets\n  are   back ' });
    expect(formatTemplatePost(entry)).toBe('Widgets are back https://example.com/posts/1');
  });

  it('shortens a long title and keeps the whole link', () => {
    const entry = makeEntry({ title: 'word '.repeat(60).trim(), link: 'https://example.com/a' });
    const text = formatTemplatePost(entry);

    expect(text).toBe(`${'word '.repeat(50)}word… https://example.com/a`);
    expect(weightedLength(text)).toBeLessThanOrEqual(MAX_POST_LENGTH);
  });

  it('fits a CJK title by its doubled weight', () => {
    const entry = makeEntry({ title: '日本語'.repeat(80) });
    const text = formatTemplatePost(entry);

    expect(text).toBe(`${'日本語'.repeat(42)}日… https://example.com/posts/1`);
    expect(weightedLength(text)).toBe(MAX_POST_LENGTH);
  });

  it('fits an emoji title by its doubled weight', () => {
    const entry = makeEntry({ title: '🎉'.repeat(150) });
    const text = formatTemplatePost(entry);

    expect(text).toBe(`${'🎉'.repeat(127)}… https://example.com/posts/1`);
    expect(weightedLength(text)).toBe(MAX_POST_LENGTH);
  });

  it('does not count a long link at its real length', () => {
    const link = `https://example.com/${'p'.repeat(200)}`;
    expect(fitToLimit('Short note', link)).toBe(`Short note ${link}`);
  });
});

describe('TemplateComposer', () => {
  it('reports the template composer', async () => {
    const result = await new TemplateComposer().compose(makeEntry());
    expect(result).toEqual({ text: 'Test Article https://example.com/posts/1', composer: 'template' });
  });
});

describe('buildPromptMessages', () => {
  it('gives the model title, summary and link', () => {
    const [, user] = buildPromptMessages(makeEntry());
    expect(user.content).toBe(
      'Write a post about this article.\n\nTitle: Test Article\nSummary: Article summary text.\nURL: https://example.com/posts/1',
    );
  });
});

describe('XaiComposer', () => {
  it('uses the completion, without wrapping quotes, plus the link', async () => {
    const fetchMock = stubFetch({
      [DEFAULT_XAI_API_URL]: () => jsonResponse({
        model: 'grok-3-mini',
        choices: [{ message: { content: '"Big news: widgets are back."' } }],
      }),
    });

    const result = await new XaiComposer(XAI, 5000).compose(makeEntry());

    expect(result).toEqual({
      text: 'Big news: widgets are back. https://example.com/posts/1',
      composer: 'xai',
    });
    const init = fetchMock.mock.calls[0][1];
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: 'grok-3-mini', temperature: 0.7 });
  });

  it('fills a [URL] placeholder in the completion', async () => {
    stubFetch({
      [DEFAULT_XAI_API_URL]: () => jsonResponse({ choices: [{ message: { content: 'Widgets return [URL] #news' } }] }),
    });

    const result = await new XaiComposer(XAI, 5000).compose(makeEntry());
    expect(result.text).toBe('Widgets return https://example.com/posts/1 #news');
  });

  it('falls back to the template when xAI rejects the key', async () => {
    stubFetch({ [DEFAULT_XAI_API_URL]: () => jsonResponse({ error: 'bad key' }, 401) });

    const result = await new XaiComposer(XAI, 5000).compose(makeEntry());

    expect(result).toEqual({
      text: 'Test Article https://example.com/posts/1',
      composer: 'template',
      fallbackReason: 'xAI auth failed (401): check XAI_API_KEY (bad key)',
    });
  });

  it('falls back on an empty completion', async () => {
    stubFetch({ [DEFAULT_XAI_API_URL]: () => jsonResponse({ choices: [{ message: { content: '  ' } }] }) });

    const result = await new XaiComposer(XAI, 5000).compose(makeEntry());
    expect(result.fallbackReason).toBe('xAI returned an empty completion');
  });

  it('falls back when xAI is unreachable', async () => {
    stubFetch({});

    const result = await new XaiComposer(XAI, 5000).compose(makeEntry());
    expect(result.composer).toBe('template');
    expect(result.fallbackReason).toBe(`fetch failed: getaddrinfo ENOTFOUND ${DEFAULT_XAI_API_URL}`);
  });
});
