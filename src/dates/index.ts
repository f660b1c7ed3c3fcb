export * from './types.js';
export { systemClock, fixedClock, DEFAULT_ZONE } from './clock.js';
export { ruLocale, ruEnLocale, withUnitStems, RELATIVE_UNIT_PRECEDENCE } from './locale.js';
export { sanitizeDateText } from './sanitize.js';
export { looksLikeDate, dateShapes } from './validator.js';
export { parseAbsoluteMonth, parseRelative, parseNumeric, DATE_STRATEGIES } from './strategies.js';
export type { DateStrategy, StrategyContext } from './strategies.js';
export {
  createDateNormalizer,
  normalizeDate,
  toArticleDate,
  DEFAULT_STRATEGY_ORDER,
} from './normalize.js';
export type { DateNormalizerOptions, NormalizeDate } from './normalize.js';
export { createRecencyThreshold, isRecent, filterRecent, DEFAULT_RECENCY_WINDOW_DAYS } from './recency.js';
export type { RecencySplit } from './recency.js';
