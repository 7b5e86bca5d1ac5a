/**
 * Dedup Store — the record of entries already posted.
 *
 * Business logic talks to the DedupStore interface only, so the backing
 * storage can change without touching the runner. Two implementations:
 *
 * - JsonFileDedupStore: `logs/posted_articles.json`, a JSON array of
 *   `{ url, date, ... }` records committed back to the repo by CI.
 * - MemoryDedupStore: no persistence.
 *
 * The store is append-only and never evicts.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { StoreError, errorMessage } from './errors.js';
import type { FeedEntry } from './feeds/types.js';

export const PostedRecordSchema = z
  .object({
    url: z.string().min(1),
    date: z.string(),
    title: z.string().optional(),
    feedUrl: z.string().optional(),
    postId: z.string().optional(),
  })
  .passthrough();

export type PostedRecord = z.infer<typeof PostedRecordSchema>;

export interface DedupStore {
  readonly size: number;
  load(): Promise<void>;
  has(id: string): boolean;
  append(record: PostedRecord): void;
  flush(): Promise<void>;
  list(): readonly PostedRecord[];
}

abstract class BaseDedupStore implements DedupStore {
  protected records: PostedRecord[] = [];
  protected ids = new Set<string>();
  protected loaded = false;

  get size(): number {
    return this.ids.size;
  }

  abstract load(): Promise<void>;
  abstract flush(): Promise<void>;

  has(id: string): boolean {
    this.assertLoaded();
    return this.ids.has(id);
  }

  append(record: PostedRecord): void {
    this.assertLoaded();
    this.records.push(record);
    this.ids.add(record.url);
  }

  list(): readonly PostedRecord[] {
    return this.records;
  }

  protected replaceAll(records: PostedRecord[]): void {
    this.records = records;
    this.ids = new Set(records.map((r) => r.url));
    this.loaded = true;
  }

  private assertLoaded(): void {
    if (!this.loaded) throw new Error('Dedup store used before load()');
  }
}

export class JsonFileDedupStore extends BaseDedupStore {
  readonly path: string;

  constructor(path: string) {
    super();
    this.path = path;
  }

  /**
   * Read the history file. A missing file is an empty store.
   * @throws StoreError if the file exists but is not a valid record array.
   */
  async load(): Promise<void> {
    if (!existsSync(this.path)) {
      this.replaceAll([]);
      return;
    }

    let data: unknown;
    try {
      const raw = await readFile(this.path, 'utf-8');
      data = raw.trim() ? JSON.parse(raw) : [];
    } catch (err: unknown) {
      throw new StoreError(this.path, `Cannot read dedup store ${this.path}: ${errorMessage(err)}`);
    }

    const parsed = z.array(PostedRecordSchema).safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StoreError(
        this.path,
        `Dedup store ${this.path} is corrupt at ${issue.path.join('.') || 'root'}: ${issue.message}`,
      );
    }
    this.replaceAll(parsed.data);
  }

  /** Write all records, via a temp file so a crash never leaves half a file. */
  async flush(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(this.records, null, 2) + '\n');
    await rename(tmp, this.path);
  }
}

export class MemoryDedupStore extends BaseDedupStore {
  flushCount = 0;

  constructor(initial: PostedRecord[] = []) {
    super();
    this.records = [...initial];
  }

  async load(): Promise<void> {
    this.replaceAll(this.records);
  }

  async flush(): Promise<void> {
    this.flushCount++;
  }
}

// ── Dedup Filter ────────────────────────────────────────────────────────────

/**
 * Entries whose ids are not in the store. Duplicates within the batch (the
 * same link in two feeds) keep only the first occurrence.
 */
export function filterNewEntries(entries: FeedEntry[], store: DedupStore): FeedEntry[] {
  const batch = new Set<string>();
  const result: FeedEntry[] = [];

  for (const entry of entries) {
    if (store.has(entry.id) || batch.has(entry.id)) continue;
    batch.add(entry.id);
    result.push(entry);
  }

  return result;
}

export function toPostedRecord(entry: FeedEntry, postId: string, now: Date = new Date()): PostedRecord {
  return {
    url: entry.id,
    date: now.toISOString(),
    title: entry.title,
    feedUrl: entry.feedUrl,
    postId,
  };
}
