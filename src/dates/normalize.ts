/**
 * Date normalizer: sanitize, validate, then try each strategy in order
 */

import { createLogger } from '../utils/logger.js';
import { ruLocale } from './locale.js';
import { sanitizeDateText } from './sanitize.js';
import { DATE_STRATEGIES, type StrategyContext } from './strategies.js';
import type { Clock, DateLocale, DateStrategyName, ParsedDate } from './types.js';
import { looksLikeDate } from './validator.js';

const log = createLogger({ module: 'dates' });

export const DEFAULT_STRATEGY_ORDER: readonly DateStrategyName[] = ['absolute-month', 'relative', 'numeric'];

export interface DateNormalizerOptions {
  clock: Clock;
  locale?: DateLocale;
  strategies?: readonly DateStrategyName[];
}

export type NormalizeDate = (raw?: string | null) => ParsedDate | null;

/**
 * Build the sanitize -> validate -> parse pipeline for one crawl source.
 * The returned function is pure apart from debug logging and reads the clock
 * only for relative dates.
 */
export function createDateNormalizer(options: DateNormalizerOptions): NormalizeDate {
  const strategies = options.strategies ?? DEFAULT_STRATEGY_ORDER;
  if (strategies.length === 0) {
    throw new Error('Date normalizer needs at least one strategy');
  }

  const context: StrategyContext = {
    clock: options.clock,
    locale: options.locale ?? ruLocale,
  };
  const parsers = strategies.map((name) => ({ name, parse: DATE_STRATEGIES[name] }));

  return (raw) => {
    const text = sanitizeDateText(raw);
    if (text === null) return null;

    if (!looksLikeDate(text, context.locale)) {
      log.debug({ text }, 'Text does not look like a date');
      return null;
    }

    for (const { name, parse } of parsers) {
      const date = parse(text, context);
      if (date) {
        log.debug({ text, strategy: name, date: date.toISODate() }, 'Parsed date');
        return date;
      }
    }

    log.debug({ text, strategies }, 'No strategy could parse date text');
    return null;
  };
}

/**
 * One-off normalisation; prefer createDateNormalizer inside a crawl
 */
export function normalizeDate(raw: string | null | undefined, options: DateNormalizerOptions): ParsedDate | null {
  return createDateNormalizer(options)(raw);
}

/**
 * ISO calendar date for the output record
 */
export function toArticleDate(date: ParsedDate | null): string | null {
  return date ? date.toISODate() : null;
}
