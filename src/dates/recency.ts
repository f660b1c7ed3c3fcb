/**
 * Recency threshold and filter
 */

import type { ArticleCandidate, Clock, ParsedDate, RecencyThreshold } from './types.js';

export const DEFAULT_RECENCY_WINDOW_DAYS = 30;

/**
 * Cutoff at the start of the day `windowDays` before now.
 * Computed once per crawl session.
 */
export function createRecencyThreshold(
  clock: Clock,
  windowDays: number = DEFAULT_RECENCY_WINDOW_DAYS
): RecencyThreshold {
  if (!Number.isInteger(windowDays) || windowDays < 0) {
    throw new Error(`Recency window must be a non-negative whole number of days, got ${windowDays}`);
  }
  return Object.freeze({
    date: clock.now().minus({ days: windowDays }).startOf('day'),
    windowDays,
  });
}

/**
 * Unknown dates count as recent. Comparison is by calendar date and inclusive.
 */
export function isRecent(date: ParsedDate | null, threshold: RecencyThreshold): boolean {
  if (date === null) return true;

  const day = date.setZone(threshold.date.zone).startOf('day');
  return day.toMillis() >= threshold.date.toMillis();
}

export interface RecencySplit<T extends Pick<ArticleCandidate, 'date'>> {
  accepted: T[];
  rejected: T[];
}

export function filterRecent<T extends Pick<ArticleCandidate, 'date'>>(
  candidates: readonly T[],
  threshold: RecencyThreshold
): RecencySplit<T> {
  const split: RecencySplit<T> = { accepted: [], rejected: [] };
  for (const candidate of candidates) {
    (isRecent(candidate.date, threshold) ? split.accepted : split.rejected).push(candidate);
  }
  return split;
}
