#!/usr/bin/env node
/**
 * Main orchestration for the crawl
 */

import { log as crawleeLog, LogLevel } from 'crawlee';
import { pathToFileURL } from 'node:url';
import { systemClock } from './dates/index.js';
import { createCrawlSession, type CrawlSession } from './services/crawl-session.js';
import { crawlSource, defaultCrawlOptions, type CrawlOptions } from './services/news-crawler.js';
import { selectSources } from './sources/index.js';
import type { NewsSource, SourceRunResult } from './types/index.js';
import { Semaphore } from './utils/concurrency.js';
import { appConfig } from './utils/config.js';
import { logError, logInfo, logSuccess, logger } from './utils/logger.js';

export type CrawlOutcome = SourceRunResult | Error;

export type SourceCrawler = (
  source: NewsSource,
  session: CrawlSession,
  options: CrawlOptions
) => Promise<SourceRunResult>;

/**
 * Log crawl results summary
 */
export function logCrawlResults(results: CrawlOutcome[], sources: NewsSource[]): void {
  logInfo('--- Crawl Results ---');

  const succeeded = results.filter((r): r is SourceRunResult => !(r instanceof Error));
  for (const result of succeeded) {
    logInfo(
      `✅ ${result.source}: ${result.records} records, ${result.failedRequests} failed requests` +
        (result.outputPath ? ` -> ${result.outputPath}` : '')
    );
  }

  results.forEach((result, i) => {
    if (result instanceof Error) {
      logger.error({ err: result }, `❌ Crawl failed for source: '${sources[i].name}'`);
    }
  });

  const failureCount = results.length - succeeded.length;
  logInfo(`✨ Crawl summary. Success: ${succeeded.length}, Failure: ${failureCount}.`);
}

/**
 * Crawl the selected sources, a limited number at a time.
 * A failing source is reported and does not stop the others.
 */
export async function crawlSources(
  sources: NewsSource[],
  session: CrawlSession,
  options: { concurrency: number; crawl?: SourceCrawler; crawlOptions?: CrawlOptions }
): Promise<CrawlOutcome[]> {
  const crawl = options.crawl ?? crawlSource;
  const crawlOptions = options.crawlOptions ?? defaultCrawlOptions();
  const semaphore = new Semaphore(options.concurrency);

  const tasks = sources.map((source) =>
    semaphore
      .execute(() => crawl(source, session, crawlOptions))
      .catch((error: unknown) => (error instanceof Error ? error : new Error(String(error))))
  );

  return Promise.all(tasks);
}

/**
 * Main crawl process
 */
export async function run(sourceNames: readonly string[] = appConfig.sources): Promise<CrawlOutcome[]> {
  logInfo('🚀 Starting crawl...');

  try {
    const sources = selectSources(sourceNames);
    const session = createCrawlSession({
      clock: systemClock(appConfig.timezone),
      windowDays: appConfig.recencyWindowDays,
    });
    logInfo(
      `Date threshold: ${session.threshold.date.toISODate()}. Crawling ${sources.length} sources with concurrency ${appConfig.sourceConcurrency}`
    );

    const results = await crawlSources(sources, session, { concurrency: appConfig.sourceConcurrency });
    logCrawlResults(results, sources);

    if (results.every((result) => !(result instanceof Error))) {
      logSuccess('All sources crawled');
    }
    return results;
  } catch (error) {
    logError('❌ Fatal error in run', error);
    throw error;
  } finally {
    logInfo('🔚 Crawl finished.');
  }
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  crawleeLog.setLevel(appConfig.nodeEnv === 'production' ? LogLevel.WARNING : LogLevel.INFO);
  const names = process.argv.slice(2);
  run(names.length > 0 ? names : undefined).catch((error) => {
    logger.fatal({ err: error }, 'Unhandled error in main process');
    process.exit(1);
  });
}
