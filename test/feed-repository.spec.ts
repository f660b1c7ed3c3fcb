import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ArticleRecord } from '../src/models/schemas.js';
import { FeedRepository } from '../src/repositories/feed-repository.js';
import { testClock } from './helpers.js';

const record: ArticleRecord = {
  title: 'Банк снизил ставки',
  url: 'https://rb.ru/news/bank-1/',
  search_term: 'банк',
  description: 'Ставки по вкладам снижены.',
  article_date: '2025-10-27',
  scraped_at: '2025-10-27T12:00:00.000+03:00',
};

describe('FeedRepository', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'feed-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('ignores a URL it already holds', () => {
    const feed = new FeedRepository('rb', testClock(), outputDir);

    expect(feed.add(record)).toBe(true);
    expect(feed.add({ ...record, title: 'Повтор' })).toBe(false);
    expect(feed.size).toBe(1);
    expect(feed.all()[0].title).toBe('Банк снизил ставки');
  });

  it('rejects invalid records', () => {
    const feed = new FeedRepository('rb', testClock(), outputDir);
    expect(() => feed.add({ ...record, article_date: '27.10.2025' })).toThrow();
    expect(feed.size).toBe(0);
  });

  it('names the file after the source and the UTC run time', () => {
    const feed = new FeedRepository('rb', testClock(), outputDir);
    expect(feed.fileName()).toBe('rb_articles_2025-10-27T09-00-00.json');
  });

  it('writes the collected records as JSON', async () => {
    const feed = new FeedRepository('rb', testClock(), join(outputDir, 'nested'));
    feed.add(record);

    const path = await feed.flush();

    expect(path).toBe(join(outputDir, 'nested', 'rb_articles_2025-10-27T09-00-00.json'));
    const written: unknown = JSON.parse(await readFile(join(outputDir, 'nested', feed.fileName()), 'utf8'));
    expect(written).toEqual([record]);
  });

  it('writes nothing for an empty feed', async () => {
    const feed = new FeedRepository('rb', testClock(), outputDir);
    expect(await feed.flush()).toBeNull();
  });
});
