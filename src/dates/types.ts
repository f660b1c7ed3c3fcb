/**
 * Date core types
 */

import type { DateTime } from 'luxon';

/** A fully valid point in time in the crawl session's zone. */
export type ParsedDate = DateTime<true>;

export type DateStrategyName = 'absolute-month' | 'relative' | 'numeric';

export type RelativeUnit = 'days' | 'hours' | 'minutes' | 'weeks';

/** Month-name table and relative-unit stems for one language (or a mix). */
export interface DateLocale {
  name: string;
  /** Genitive month names, lower case, mapped to 1..12. */
  months: Readonly<Record<string, number>>;
  /** Substring stems that identify a relative unit ("дн", "час", ...). */
  units: Readonly<Record<RelativeUnit, readonly string[]>>;
}

export interface Clock {
  readonly zone: string;
  now(): ParsedDate;
}

/** Cutoff calendar date; articles dated before it are dropped. */
export interface RecencyThreshold {
  readonly date: ParsedDate;
  readonly windowDays: number;
}

export interface ArticleCandidate {
  url: string;
  title: string | null;
  date: ParsedDate | null;
}
