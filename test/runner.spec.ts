import { describe, it, expect } from 'vitest';
import { crawlSources } from '../src/index.js';
import { createCrawlSession } from '../src/services/crawl-session.js';
import type { CrawlOptions } from '../src/services/news-crawler.js';
import { cnews, plusworld, rb } from '../src/sources/index.js';
import type { SourceRunResult } from '../src/types/index.js';
import { Semaphore } from '../src/utils/concurrency.js';
import { testClock } from './helpers.js';

const options: CrawlOptions = {
  downloadDelaySecs: 0,
  downloadTimeoutSecs: 5,
  maxRequestRetries: 0,
  userAgent: 'test-agent',
  outputDir: './unused',
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Semaphore', () => {
  it('never runs more tasks than its limit', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((value) =>
        semaphore.execute(async () => {
          running++;
          peak = Math.max(peak, running);
          await sleep(5);
          running--;
          return value;
        })
      )
    );

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
    expect(semaphore.active).toBe(0);
  });

  it('releases its slot when a task fails', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.execute(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(semaphore.active).toBe(0);
  });

  it('needs a positive limit', () => {
    expect(() => new Semaphore(0)).toThrow('positive integer');
  });
});

describe('crawlSources', () => {
  it('reports a failing source without stopping the others', async () => {
    const session = createCrawlSession({ clock: testClock() });
    const crawled: string[] = [];

    const results = await crawlSources([plusworld, rb, cnews], session, {
      concurrency: 2,
      crawlOptions: options,
      crawl: async (source): Promise<SourceRunResult> => {
        crawled.push(source.name);
        if (source.name === 'rb') {
          throw new Error('blocked');
        }
        return { source: source.name, records: 3, failedRequests: 0, outputPath: null };
      },
    });

    expect(crawled.sort()).toEqual(['cnews', 'plusworld', 'rb']);
    expect(results[0]).toEqual({ source: 'plusworld', records: 3, failedRequests: 0, outputPath: null });
    expect(results[1]).toBeInstanceOf(Error);
    expect(results[1]).toHaveProperty('message', 'blocked');
    expect(results[2]).toEqual({ source: 'cnews', records: 3, failedRequests: 0, outputPath: null });
  });
});
