/**
 * Crawl one news source with crawlee's HttpCrawler
 *
 * The engine owns fetching, the request queue, URL de-duplication, retries
 * and the per-domain delay. Pages are parsed with Cheerio and handed to the
 * engine-independent handlers in page-handlers.ts.
 */

import * as cheerio from 'cheerio';
import {
  Configuration,
  HttpCrawler,
  RequestQueue,
  createHttpRouter,
  type HttpCrawlingContext,
} from 'crawlee';
import { FeedRepository } from '../repositories/feed-repository.js';
import type { CrawlRequest, NewsSource, PageContext, SourceRunResult } from '../types/index.js';
import { appConfig } from '../utils/config.js';
import { createLogger, logError } from '../utils/logger.js';
import type { CrawlSession } from './crawl-session.js';
import { REQUEST_LABELS, handleArticle, handleListing } from './page-handlers.js';

export interface CrawlOptions {
  /** Seconds between two requests to the same domain */
  downloadDelaySecs: number;
  downloadTimeoutSecs: number;
  maxRequestRetries: number;
  userAgent: string;
  outputDir: string;
}

export function defaultCrawlOptions(): CrawlOptions {
  return {
    downloadDelaySecs: appConfig.downloadDelaySecs,
    downloadTimeoutSecs: appConfig.downloadTimeoutSecs,
    maxRequestRetries: appConfig.maxRequestRetries,
    userAgent: appConfig.userAgent,
    outputDir: appConfig.outputDir,
  };
}

function toPageContext(
  { request, body, addRequests }: HttpCrawlingContext,
  feed: FeedRepository
): PageContext {
  const html = typeof body === 'string' ? body : body.toString('utf8');
  return {
    $: cheerio.load(html),
    url: request.loadedUrl ?? request.url,
    userData: request.userData,
    enqueue: (requests: CrawlRequest[]) => addRequests(requests),
    emit: async (record) => {
      feed.add(record);
    },
  };
}

/**
 * Seed requests: page 1 of every listing the source starts from
 */
export function seedRequests(source: NewsSource): CrawlRequest[] {
  return source.seeds.map((seed) => ({
    url: seed.url,
    label: REQUEST_LABELS.listing,
    userData: { searchTerm: seed.searchTerm, page: 1 },
  }));
}

/**
 * Crawl a source end to end and write its feed
 */
export async function crawlSource(
  source: NewsSource,
  session: CrawlSession,
  options: CrawlOptions = defaultCrawlOptions()
): Promise<SourceRunResult> {
  const log = createLogger({ source: source.name });
  const feed = new FeedRepository(source.name, session.clock, options.outputDir);

  // Each source gets its own in-memory storage so parallel crawls never share a queue
  const config = new Configuration({ persistStorage: false });
  const requestQueue = await RequestQueue.open(source.name, { config });

  const router = createHttpRouter();
  router.addHandler(REQUEST_LABELS.listing, async (context) => {
    await handleListing(source, session, toPageContext(context, feed));
  });
  router.addHandler(REQUEST_LABELS.article, async (context) => {
    await handleArticle(source, session, toPageContext(context, feed));
  });

  let failedRequests = 0;

  const crawler = new HttpCrawler(
    {
      requestQueue,
      requestHandler: router,
      // One request in flight per source
      maxConcurrency: 1,
      sameDomainDelaySecs: options.downloadDelaySecs,
      maxRequestRetries: options.maxRequestRetries,
      navigationTimeoutSecs: options.downloadTimeoutSecs,
      requestHandlerTimeoutSecs: options.downloadTimeoutSecs,
      preNavigationHooks: [
        (_context, gotOptions) => {
          gotOptions.headers = { ...gotOptions.headers, 'user-agent': options.userAgent };
        },
      ],
      failedRequestHandler: ({ request }, error) => {
        failedRequests++;
        logError(`[${source.name}] Request failed after retries: ${request.url}`, error);
      },
    },
    config
  );

  log.info({ seeds: source.seeds.length, threshold: session.threshold.date.toISODate() }, 'Starting crawl');
  await crawler.run(seedRequests(source));

  const outputPath = await feed.flush();
  log.info({ records: feed.size, failedRequests }, 'Crawl finished');

  return {
    source: source.name,
    records: feed.size,
    failedRequests,
    outputPath,
  };
}
