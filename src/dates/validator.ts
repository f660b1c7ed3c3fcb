/**
 * Date-likeness gate
 */

import { RELATIVE_UNIT_PRECEDENCE } from './locale.js';
import type { DateLocale } from './types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(words: Iterable<string>): string {
  return Array.from(words, escapeRegExp).join('|');
}

const shapeCache = new WeakMap<DateLocale, readonly RegExp[]>();

/**
 * Recognised date shapes for a locale, in evaluation order
 */
export function dateShapes(locale: DateLocale): readonly RegExp[] {
  const cached = shapeCache.get(locale);
  if (cached) return cached;

  const months = alternation(Object.keys(locale.months));
  const stems = alternation(RELATIVE_UNIT_PRECEDENCE.flatMap((unit) => locale.units[unit]));

  const shapes = [
    new RegExp(`\\d{1,2}\\s+(?:${months})\\s+\\d{4}`, 'iu'), // 27 октября 2025
    /\d{1,2}\.\d{1,2}\.\d{4}/u, // 27.10.2025
    /\d{1,2}\/\d{1,2}\/\d{4}/u, // 27/10/2025
    /\d{4}-\d{1,2}-\d{1,2}/u, // 2025-10-27
    new RegExp(`\\d{1,2}\\s+(?:${months})`, 'iu'), // 27 октября
    new RegExp(`\\d+\\s+(?:${stems})`, 'iu'), // 3 дня назад, 2 hours ago
  ];
  shapeCache.set(locale, shapes);
  return shapes;
}

/**
 * Cheap precision gate run before any parser: does the text look like a date at all?
 */
export function looksLikeDate(text: string, locale: DateLocale): boolean {
  return dateShapes(locale).some((shape) => shape.test(text));
}
