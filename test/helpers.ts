import * as cheerio from 'cheerio';
import { DateTime } from 'luxon';
import { fixedClock, type Clock, type ParsedDate } from '../src/dates/index.js';
import type { ArticleRecord } from '../src/models/schemas.js';
import type { ArticlePageSpec, CrawlRequest, NewsSource, PageContext } from '../src/types/index.js';

export const ZONE = 'Europe/Moscow';

/** 2025-10-27 12:00 Moscow time; the 30-day threshold is 2025-09-27 */
export function testClock(): Clock {
  return fixedClock('2025-10-27T12:00:00', ZONE);
}

export function moscow(iso: string): ParsedDate {
  const date = DateTime.fromISO(iso, { zone: ZONE });
  if (!date.isValid) {
    throw new Error(`Bad test date: ${iso}`);
  }
  return date;
}

export function articleOf(source: NewsSource): ArticlePageSpec {
  if (!source.article) {
    throw new Error(`${source.name} has no article page spec`);
  }
  return source.article;
}

export function fakePage(userData: unknown, url = 'https://news.example/list', html = '<html></html>') {
  const enqueued: CrawlRequest[] = [];
  const emitted: ArticleRecord[] = [];
  const context: PageContext = {
    $: cheerio.load(html),
    url,
    userData,
    enqueue: async (requests) => {
      enqueued.push(...requests);
    },
    emit: async (record) => {
      emitted.push(record);
    },
  };
  return { context, enqueued, emitted };
}
