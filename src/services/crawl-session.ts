/**
 * Per-run state shared by every source: the clock, the recency cutoff and
 * one date normalizer per source
 */

import {
  createDateNormalizer,
  createRecencyThreshold,
  DEFAULT_RECENCY_WINDOW_DAYS,
  type Clock,
  type NormalizeDate,
  type RecencyThreshold,
} from '../dates/index.js';
import type { NewsSource } from '../types/index.js';

export interface CrawlSession {
  readonly clock: Clock;
  readonly threshold: RecencyThreshold;
  normalizerFor(source: Pick<NewsSource, 'name' | 'dateStrategies' | 'locale'>): NormalizeDate;
}

export interface CrawlSessionOptions {
  clock: Clock;
  windowDays?: number;
}

export function createCrawlSession({
  clock,
  windowDays = DEFAULT_RECENCY_WINDOW_DAYS,
}: CrawlSessionOptions): CrawlSession {
  const threshold = createRecencyThreshold(clock, windowDays);
  const normalizers = new Map<string, NormalizeDate>();

  return {
    clock,
    threshold,
    normalizerFor(source) {
      let normalize = normalizers.get(source.name);
      if (!normalize) {
        normalize = createDateNormalizer({
          clock,
          locale: source.locale,
          strategies: source.dateStrategies,
        });
        normalizers.set(source.name, normalize);
      }
      return normalize;
    },
  };
}
