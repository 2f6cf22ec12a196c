/**
 * Offline Cache
 *
 * Append-only JSON file of documents seen by live providers. It is the terminal
 * fallback of the provider router, so lookup() never throws: a missing or
 * corrupt file reads as empty.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { SearchResult } from '@/types/research';
import { OFFLINE_PROVIDER } from '@/config';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('offline-cache');

const cacheEntrySchema = z.object({
  topic: z.string(),
  title: z.string(),
  url: z.string(),
  text: z.string(),
});

export type OfflineCacheEntry = z.infer<typeof cacheEntrySchema>;

export function normalizeTopic(topic: string): string {
  return topic.toLowerCase().trim();
}

export class OfflineCache {
  // Serialises read-modify-write cycles within the process.
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private async load(): Promise<OfflineCacheEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      log.warn('Offline cache unreadable; treating as empty', { path: this.filePath, error: errorMessage(error) });
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log.warn('Invalid offline cache JSON; treating as empty', { path: this.filePath });
      return [];
    }

    if (!Array.isArray(parsed)) {
      log.warn('Offline cache is not a list; treating as empty', { path: this.filePath });
      return [];
    }

    const entries: OfflineCacheEntry[] = [];
    for (const item of parsed) {
      const entry = cacheEntrySchema.safeParse(item);
      if (entry.success) entries.push(entry.data);
    }
    return entries;
  }

  private async persist(entries: OfflineCacheEntry[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(entries, null, 2), 'utf-8');
    await rename(tmpPath, this.filePath);
  }

  async entries(): Promise<OfflineCacheEntry[]> {
    return this.load();
  }

  /**
   * Cached documents whose stored topic contains the (lower-cased) query topic.
   */
  async lookup(topic: string): Promise<SearchResult[]> {
    const needle = normalizeTopic(topic);
    const cache = await this.load();
    const matches = cache.filter((entry) => entry.topic.toLowerCase().includes(needle));

    log.info(matches.length ? 'Returning cached results' : 'No cached results', {
      topic: needle,
      count: matches.length,
    });

    return matches.map((entry) => ({
      title: entry.title || 'Untitled',
      url: entry.url,
      snippet: entry.text,
      provider: OFFLINE_PROVIDER,
    }));
  }

  /**
   * Append results whose URL is not cached yet. Existing URLs are never
   * overwritten. Returns the number of entries added.
   */
  async save(topic: string, results: readonly SearchResult[]): Promise<number> {
    const run = this.writeChain.then(async () => {
      const cache = await this.load();
      const existingUrls = new Set(cache.map((entry) => entry.url));
      const normalizedTopic = normalizeTopic(topic);

      let added = 0;
      for (const result of results) {
        if (!result.url || existingUrls.has(result.url)) continue;
        existingUrls.add(result.url);
        cache.push({
          topic: normalizedTopic,
          title: result.title || 'Untitled',
          url: result.url,
          text: result.snippet,
        });
        added++;
      }

      if (added > 0) {
        await this.persist(cache);
      }
      log.info(added > 0 ? 'Cached new entries' : 'No new cache entries', { topic: normalizedTopic, added });
      return added;
    });

    // Keep the chain alive after a failed write.
    this.writeChain = run.catch(() => undefined);
    return run;
  }
}
