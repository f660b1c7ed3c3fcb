/**
 * Type definitions and interfaces
 */

import type { CheerioAPI } from 'cheerio';
import type { DateLocale, DateStrategyName } from '../dates/index.js';
import type { ArticleRecord, ArticleRequestData, ListingRequestData } from '../models/schemas.js';

/**
 * Start URL of a crawl and the topic tag its records carry
 */
export interface ListingSeed {
  url: string;
  searchTerm: string;
}

/**
 * Link found on a listing page before its date is interpreted
 */
export interface RawCandidate {
  url: string;
  title: string | null;
  dateText: string | null;
  /** Only set by sources that emit records straight from the listing */
  description?: string;
}

export interface ArticlePageSpec {
  extractTitle($: CheerioAPI): string;
  extractDescription($: CheerioAPI): string;
  /** Date shown on the article page, used when the listing had none */
  extractDateText?($: CheerioAPI): string | null;
}

/**
 * One news portal: where to start, how to read its listings and articles
 */
export interface NewsSource {
  name: string;
  /** Absolute origin every followed URL must stay under */
  domain: string;
  seeds: ListingSeed[];
  maxPages: number;
  perPageLimit?: number;
  /**
   * Where perPageLimit applies: to the listing before dating ('listing', the default)
   * or to the articles that passed the recency filter ('recent')
   */
  pageLimitScope?: 'listing' | 'recent';
  /** Leading listing entries to drop on page 1 (pinned or promo blocks) */
  skipOnFirstPage?: number;
  dateStrategies?: readonly DateStrategyName[];
  locale?: DateLocale;
  extractCandidates($: CheerioAPI, pageUrl: string): RawCandidate[];
  findNextPage?($: CheerioAPI, pageUrl: string): string | null;
  /** Absent for sources whose listing already holds everything a record needs */
  article?: ArticlePageSpec;
}

export type RequestLabel = 'LISTING' | 'ARTICLE';

export type CrawlRequest =
  | { url: string; label: 'LISTING'; userData: ListingRequestData }
  | { url: string; label: 'ARTICLE'; userData: ArticleRequestData };

/**
 * What a page handler needs from the crawl engine
 */
export interface PageContext {
  $: CheerioAPI;
  url: string;
  userData: unknown;
  enqueue(requests: CrawlRequest[]): Promise<void>;
  emit(record: ArticleRecord): Promise<void>;
}

export interface SourceRunResult {
  source: string;
  records: number;
  failedRequests: number;
  outputPath: string | null;
}

// Re-export model types for convenience
export type { ArticleRecord, ArticleRequestData, ListingRequestData } from '../models/schemas.js';
