/**
 * Date parsing strategies
 */

import { DateTime, type DurationLikeObject } from 'luxon';
import { RELATIVE_UNIT_PRECEDENCE } from './locale.js';
import type { Clock, DateLocale, DateStrategyName, ParsedDate } from './types.js';

export interface StrategyContext {
  locale: DateLocale;
  clock: Clock;
}

/** A parser returns a date or null; it never throws for bad input. */
export type DateStrategy = (text: string, context: StrategyContext) => ParsedDate | null;

function calendarDate(year: number, month: number, day: number, zone: string): ParsedDate | null {
  // Luxon rejects out-of-range components instead of rolling them over
  const date = DateTime.fromObject({ year, month, day }, { zone });
  return date.isValid ? date : null;
}

const ABSOLUTE_MONTH_RE = /(\d{1,2})\s+([а-яё]+)\s+(\d{4})/iu;

/**
 * "27 октября 2025"
 */
export const parseAbsoluteMonth: DateStrategy = (text, { locale, clock }) => {
  const match = ABSOLUTE_MONTH_RE.exec(text);
  if (!match) return null;

  const [, day, monthName, year] = match;
  const month = locale.months[monthName.toLowerCase()];
  if (month === undefined) return null;

  return calendarDate(Number(year), month, Number(day), clock.zone);
};

/**
 * "3 дня назад", "2 часа назад", "1 week ago"
 */
export const parseRelative: DateStrategy = (text, { locale, clock }) => {
  const match = /\d+/.exec(text);
  if (!match) return null;

  const amount = Number(match[0]);
  if (!Number.isSafeInteger(amount)) return null;

  const lowered = text.toLowerCase();
  const unit = RELATIVE_UNIT_PRECEDENCE.find((candidate) =>
    locale.units[candidate].some((stem) => lowered.includes(stem))
  );
  if (!unit) return null;

  const duration: DurationLikeObject = {};
  duration[unit] = amount;

  const date = clock.now().minus(duration);
  return date.isValid ? date : null;
};

const NUMERIC_PATTERNS: ReadonlyArray<{
  re: RegExp;
  parts: (match: RegExpExecArray) => { year: number; month: number; day: number };
}> = [
  {
    // DD.MM.YYYY
    re: /(\d{1,2})\.(\d{1,2})\.(\d{4})/,
    parts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) }),
  },
  {
    // YYYY-MM-DD
    re: /(\d{4})-(\d{1,2})-(\d{1,2})/,
    parts: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
  },
];

/**
 * "27.10.2025", "2025-10-27"
 */
export const parseNumeric: DateStrategy = (text, { clock }) => {
  for (const { re, parts } of NUMERIC_PATTERNS) {
    const match = re.exec(text);
    if (!match) continue;

    const { year, month, day } = parts(match);
    const date = calendarDate(year, month, day, clock.zone);
    if (date) return date;
  }
  return null;
};

export const DATE_STRATEGIES: Readonly<Record<DateStrategyName, DateStrategy>> = {
  'absolute-month': parseAbsoluteMonth,
  relative: parseRelative,
  numeric: parseNumeric,
};
