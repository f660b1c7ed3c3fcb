/**
 * Listing and article handlers, independent of the crawl engine
 */

import { filterRecent, toArticleDate, type ArticleCandidate } from '../dates/index.js';
import {
  ArticleRequestDataSchema,
  ListingRequestDataSchema,
  safeParseArticleRecord,
  type ArticleRecord,
} from '../models/schemas.js';
import type { CrawlRequest, NewsSource, PageContext, RawCandidate } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { CrawlSession } from './crawl-session.js';
import { DESCRIPTION_FALLBACK, uniqueByUrl } from './html-extract.js';

export const REQUEST_LABELS = {
  listing: 'LISTING',
  article: 'ARTICLE',
} as const;

export interface ListingOutcome {
  found: number;
  accepted: number;
  rejected: number;
  nextPage: string | null;
}

type DatedCandidate = ArticleCandidate & Pick<RawCandidate, 'description'>;

/**
 * Trim a listing to the entries worth looking at on this page
 */
export function selectCandidates(
  source: Pick<NewsSource, 'skipOnFirstPage' | 'perPageLimit' | 'pageLimitScope'>,
  candidates: RawCandidate[],
  page: number
): { remaining: RawCandidate[]; selected: RawCandidate[] } {
  let remaining = uniqueByUrl(candidates);

  const skip = source.skipOnFirstPage ?? 0;
  if (page === 1 && skip > 0 && remaining.length > skip) {
    remaining = remaining.slice(skip);
  }

  const selected =
    source.perPageLimit === undefined || source.pageLimitScope === 'recent'
      ? remaining
      : remaining.slice(0, source.perPageLimit);
  return { remaining, selected };
}

/**
 * Cap the recent articles of a page for sources that limit after filtering
 */
export function limitRecent<T>(
  source: Pick<NewsSource, 'perPageLimit' | 'pageLimitScope'>,
  accepted: T[]
): T[] {
  if (source.pageLimitScope !== 'recent' || source.perPageLimit === undefined) {
    return accepted;
  }
  return accepted.slice(0, source.perPageLimit);
}

function validRecord(
  record: ArticleRecord,
  log: Logger
): ArticleRecord | null {
  const parsed = safeParseArticleRecord(record);
  if (!parsed.success) {
    log.warn({ url: record.url, issues: parsed.error.issues }, 'Dropping invalid article record');
    return null;
  }
  return parsed.data;
}

/**
 * Read a listing page: date-filter its links, queue (or emit) the recent ones
 * and follow pagination
 */
export async function handleListing(
  source: NewsSource,
  session: CrawlSession,
  context: PageContext
): Promise<ListingOutcome> {
  const { searchTerm, page } = ListingRequestDataSchema.parse(context.userData);
  const log = createLogger({ source: source.name, searchTerm, page });

  const { remaining, selected } = selectCandidates(
    source,
    source.extractCandidates(context.$, context.url),
    page
  );
  log.info({ url: context.url, found: remaining.length }, 'Parsed listing page');

  const normalize = session.normalizerFor(source);
  const dated: DatedCandidate[] = selected.map((candidate) => ({
    url: candidate.url,
    title: candidate.title,
    description: candidate.description,
    date: normalize(candidate.dateText),
  }));

  const { accepted: recent, rejected } = filterRecent(dated, session.threshold);
  const accepted = limitRecent(source, recent);
  for (const candidate of rejected) {
    log.info({ url: candidate.url, date: toArticleDate(candidate.date) }, 'Skipping old article');
  }

  if (source.article) {
    const requests: CrawlRequest[] = accepted.map((candidate) => ({
      url: candidate.url,
      label: REQUEST_LABELS.article,
      userData: {
        searchTerm,
        title: candidate.title,
        articleDate: toArticleDate(candidate.date),
      },
    }));
    await context.enqueue(requests);
  } else {
    for (const candidate of accepted) {
      const record = validRecord(
        {
          title: candidate.title ?? '',
          url: candidate.url,
          search_term: searchTerm,
          description: candidate.description || DESCRIPTION_FALLBACK,
          article_date: toArticleDate(candidate.date),
          scraped_at: session.clock.now().toISO(),
        },
        log
      );
      if (record) {
        await context.emit(record);
      }
    }
  }
  log.info({ accepted: accepted.length, rejected: rejected.length }, 'Applied recency filter');

  let nextPage: string | null = null;
  if (page < source.maxPages && remaining.length > 0 && source.findNextPage) {
    nextPage = source.findNextPage(context.$, context.url);
    if (nextPage) {
      log.info({ nextPage }, 'Following next page');
      await context.enqueue([
        { url: nextPage, label: REQUEST_LABELS.listing, userData: { searchTerm, page: page + 1 } },
      ]);
    }
  }

  return {
    found: remaining.length,
    accepted: accepted.length,
    rejected: rejected.length,
    nextPage,
  };
}

/**
 * Read an article page and emit its record
 */
export async function handleArticle(
  source: NewsSource,
  session: CrawlSession,
  context: PageContext
): Promise<ArticleRecord | null> {
  const articlePage = source.article;
  if (!articlePage) {
    throw new Error(`Source ${source.name} does not crawl article pages`);
  }

  const data = ArticleRequestDataSchema.parse(context.userData);
  const log = createLogger({ source: source.name, searchTerm: data.searchTerm });

  let articleDate = data.articleDate;
  if (articleDate === null && articlePage.extractDateText) {
    articleDate = toArticleDate(session.normalizerFor(source)(articlePage.extractDateText(context.$)));
  }

  const record = validRecord(
    {
      title: data.title ?? articlePage.extractTitle(context.$),
      url: context.url,
      search_term: data.searchTerm,
      description: articlePage.extractDescription(context.$),
      article_date: articleDate,
      scraped_at: session.clock.now().toISO(),
    },
    log
  );
  if (!record) return null;

  await context.emit(record);
  log.info({ url: record.url, title: record.title.slice(0, 50) }, 'Scraped article');
  return record;
}
