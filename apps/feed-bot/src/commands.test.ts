import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_POST_API_URL } from './config.js';
import { TEST_ENV, jsonResponse, rssXml, stubFetch, xmlResponse } from './test-helpers.js';
import { USAGE, main } from './commands.js';

const FEED_A = 'https://feeds.test/a.xml';
const FEED_B = 'https://feeds.test/b.xml';

let dir: string;
let feedsFile: string;
let logsDir: string;

function stubNetwork() {
  return stubFetch({
    [FEED_A]: () => xmlResponse(rssXml([
      { title: 'A1', link: 'https://example.com/a1' },
      { title: 'A2', link: 'https://example.com/a2' },
    ])),
    [FEED_B]: () => xmlResponse('Internal Server Error', 500),
    [DEFAULT_POST_API_URL]: () => jsonResponse({ data: { id: '1890', text: 'A1' } }, 201),
  });
}

function runArgs(...extra: string[]): string[] {
  return ['run', '--feeds-file', feedsFile, '--logs-dir', logsDir, ...extra];
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'feed-bot-'));
  feedsFile = join(dir, 'rss_feeds.txt');
  logsDir = join(dir, 'logs');
  writeFileSync(feedsFile, `# Tech\n${FEED_A} ! main feed\n${FEED_B}\nnot-a-url\n`);
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('main', () => {
  it('prints usage for --help', async () => {
    expect(await main(['--help'], {})).toEqual({ output: USAGE, exitCode: 0 });
  });

  it('exits 2 for an unknown command', async () => {
    const result = await main(['publish'], {});
    expect(result.exitCode).toBe(2);
    expect(result.output).toBe(`Unknown command: publish\n\n${USAGE}`);
  });
});

describe('run', () => {
  it('fails before any network call when credentials are missing', async () => {
    const fetchMock = stubNetwork();

    const result = await main(runArgs(), {});

    expect(result).toEqual({
      output: 'Configuration error: Missing posting credentials: OAUTH_CONSUMER_KEY, OAUTH_CONSUMER_SECRET, '
        + 'OAUTH_ACCESS_TOKEN, OAUTH_ACCESS_TOKEN_SECRET',
      exitCode: 1,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('records a configuration error in the run log and the log file', async () => {
    stubNetwork();

    await main(runArgs(), {});

    const missing = 'Missing posting credentials: OAUTH_CONSUMER_KEY, OAUTH_CONSUMER_SECRET, '
      + 'OAUTH_ACCESS_TOKEN, OAUTH_ACCESS_TOKEN_SECRET';
    const runs = readFileSync(join(logsDir, 'runs.jsonl'), 'utf-8').trimEnd().split('\n').map((l) => JSON.parse(l));
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ fatalError: missing, summary: `run aborted: ${missing}`, posted: [] });

    const logLines = readFileSync(join(logsDir, 'feed_bot.log'), 'utf-8').trimEnd().split('\n');
    expect(logLines.map((line) => line.replace(/^\S+ - /, ''))).toEqual([`ERROR - Configuration error: ${missing}`]);
  });

  it('fails when the feed list is missing', async () => {
    const missing = join(dir, 'missing.txt');
    const result = await main(['run', '--feeds-file', missing, '--logs-dir', logsDir], TEST_ENV);

    expect(result).toEqual({ output: `Configuration error: Feed list not found: ${missing}`, exitCode: 1 });
    const [entry] = readFileSync(join(logsDir, 'runs.jsonl'), 'utf-8').trimEnd().split('\n').map((l) => JSON.parse(l));
    expect(entry.fatalError).toBe(`Feed list not found: ${missing}`);
  });

  it('posts one entry, records it and writes every log file', async () => {
    const fetchMock = stubNetwork();

    const result = await main(runArgs('--json'), TEST_ENV);

    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.output)).toMatchObject({
      summary: 'posted 1 of 2 new entries; 1 feed failed',
      posted: [{ id: 'https://example.com/a1', postId: '1890' }],
    });
    expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([FEED_A, FEED_B, DEFAULT_POST_API_URL]);

    const history = JSON.parse(readFileSync(join(logsDir, 'posted_articles.json'), 'utf-8'));
    expect(history).toMatchObject([{ url: 'https://example.com/a1', postId: '1890', feedUrl: FEED_A }]);
    expect(readFileSync(join(logsDir, 'runs.jsonl'), 'utf-8').trimEnd().split('\n')).toHaveLength(1);

    const logLines = readFileSync(join(logsDir, 'feed_bot.log'), 'utf-8').trimEnd().split('\n');
    expect(logLines.map((line) => line.replace(/^\S+ - /, ''))).toContain(
      'WARNING - Skipping feed list line 4 (invalid-url): not-a-url',
    );
    expect(logLines.map((line) => line.replace(/^\S+ - /, ''))).toContain('INFO - Found entry: A1');
  });

  it('posts the next entry on the following run and nothing after that', async () => {
    stubNetwork();

    await main(runArgs(), TEST_ENV);
    const second = await main(runArgs('--json'), TEST_ENV);
    const third = await main(runArgs('--json'), TEST_ENV);

    expect(JSON.parse(second.output).posted).toMatchObject([{ id: 'https://example.com/a2' }]);
    expect(JSON.parse(third.output)).toMatchObject({ posted: [], summary: 'no new entries; 1 feed failed' });
    expect(third.exitCode).toBe(0);
  });

  it('does not post or record on a dry run', async () => {
    const fetchMock = stubNetwork();

    const result = await main(runArgs('--dry-run', '--json'), {});

    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.output)).toMatchObject({ dryRun: true, posted: [{ postId: 'dry-run' }] });
    expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([FEED_A, FEED_B]);
    expect(() => readFileSync(join(logsDir, 'posted_articles.json'))).toThrow();
  });

  it('exits 1 and logs the run when the dedup store is corrupt', async () => {
    const fetchMock = stubNetwork();
    mkdirSync(logsDir);
    writeFileSync(join(logsDir, 'posted_articles.json'), '{"not":"a list"}');

    const result = await main(runArgs(), TEST_ENV);

    expect(result.exitCode).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
    const [entry] = readFileSync(join(logsDir, 'runs.jsonl'), 'utf-8').trimEnd().split('\n').map((l) => JSON.parse(l));
    expect(entry.fatalError).toMatch(/^Dedup store .* is corrupt at root: /);
  });
});

describe('feeds', () => {
  it('lists feeds and skipped lines without needing credentials', async () => {
    const result = await main(['feeds', '--feeds-file', feedsFile, '--ci'], {});

    expect(result).toEqual({
      output: [
        `2 feeds in ${feedsFile}`,
        `  ${FEED_A}`,
        `  ${FEED_B}`,
        '',
        'Skipped lines:',
        '     4  invalid-url not-a-url',
      ].join('\n'),
      exitCode: 0,
    });
  });
});

describe('history', () => {
  it('reports when nothing has run yet', async () => {
    const result = await main(['history', '--logs-dir', logsDir], {});
    expect(result).toEqual({ output: 'No runs recorded yet. 0 entries in history.', exitCode: 0 });
  });

  it('summarises recorded runs', async () => {
    stubNetwork();
    await main(runArgs(), TEST_ENV);

    const result = await main(['history', '--logs-dir', logsDir, '--ci'], {});
    const lines = result.output.split('\n');

    expect(lines[0]).toBe('1 run: 1 post, 0 failed posts, 1 entry in history');
    expect(lines[1]).toBe('');
    expect(lines[2]).toMatch(/^✓ \S+ {2}posted 1 of 2 new entries; 1 feed failed$/);
    expect(lines[3]).toBe('    + A1');
  });

  it('prints JSON with --json', async () => {
    stubNetwork();
    await main(runArgs(), TEST_ENV);

    const result = await main(['history', '1', '--logs-dir', logsDir, '--json'], {});
    const parsed = JSON.parse(result.output);

    expect(parsed.postedTotal).toBe(1);
    expect(parsed.runs).toHaveLength(1);
  });
});
