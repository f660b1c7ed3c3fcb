/**
 * HTML extraction helpers shared by the site modules (Cheerio)
 */

import type { CheerioAPI } from 'cheerio';
import type { RawCandidate } from '../types/index.js';
import { logDebug } from '../utils/logger.js';

export const DESCRIPTION_FALLBACK = 'Description not available';

/** Paragraphs containing any of these are boilerplate, not article text */
export const BOILERPLATE_PATTERNS: readonly string[] = [
  'Подпишитесь',
  'читайте также',
  'реклама',
  'advertisement',
  'Фото:',
  'Фотография:',
  'Источник:',
  'По материалам',
];

export const NEXT_PAGE_SELECTORS: readonly string[] = [
  'a.next',
  'a[rel="next"]',
  '.pagination a:contains("Далее")',
  '.pagination a:contains("Next")',
  'a:contains("›")',
  'a:contains("»")',
];

/**
 * Resolve a scraped href against the site origin and keep it only when it stays on that origin
 */
export function cleanUrl(href: string | null | undefined, domain: string): string | null {
  if (!href) return null;

  let resolved: string;
  try {
    resolved = new URL(href.trim(), `${domain}/`).href;
  } catch (error) {
    logDebug(`Ignoring unparseable link "${href}"`, error);
    return null;
  }

  return resolved.startsWith(`${domain}/`) ? resolved : null;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalised paragraph text, or '' when it is boilerplate
 */
export function cleanParagraph(
  text: string | null | undefined,
  unwanted: readonly string[] = BOILERPLATE_PATTERNS
): string {
  if (!text) return '';

  const clean = collapseWhitespace(text);
  const lower = clean.toLowerCase();
  if (unwanted.some((pattern) => lower.includes(pattern.toLowerCase()))) {
    return '';
  }
  return clean;
}

/**
 * First paragraph under the given containers that reads like article text,
 * then the first paragraph on the page
 */
export function firstMeaningfulParagraph(
  $: CheerioAPI,
  selectors: readonly string[],
  minLength = 30
): string {
  for (const selector of selectors) {
    for (const el of $(selector).toArray()) {
      const text = cleanParagraph($(el).text());
      if (text.length > minLength) {
        return text;
      }
    }
  }

  const first = cleanParagraph($('p').first().text());
  return first || DESCRIPTION_FALLBACK;
}

/**
 * First non-empty text among the selectors
 */
export function firstText($: CheerioAPI, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const text = collapseWhitespace($(selector).first().text());
    if (text) return text;
  }
  return '';
}

export function stripTitleSuffix(title: string, suffix: string): string {
  const index = title.indexOf(suffix);
  return index === -1 ? title : title.slice(0, index).trim();
}

/**
 * Follow the first pagination link any selector finds
 */
export function findNextPageUrl(
  $: CheerioAPI,
  domain: string,
  selectors: readonly string[] = NEXT_PAGE_SELECTORS
): string | null {
  for (const selector of selectors) {
    const href = $(selector).first().attr('href');
    if (href) {
      return cleanUrl(href, domain);
    }
  }
  return null;
}

/**
 * Keep the first candidate seen for each URL
 */
export function uniqueByUrl<T extends Pick<RawCandidate, 'url'>>(candidates: readonly T[]): T[] {
  const seen = new Map<string, T>();
  for (const candidate of candidates) {
    if (!seen.has(candidate.url)) {
      seen.set(candidate.url, candidate);
    }
  }
  return [...seen.values()];
}
