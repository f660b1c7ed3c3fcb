/**
 * plusworld.ru: three topic sections with card listings
 */

import type { CheerioAPI } from 'cheerio';
import { looksLikeDate, ruEnLocale, sanitizeDateText } from '../dates/index.js';
import {
  cleanUrl,
  collapseWhitespace,
  findNextPageUrl,
  firstMeaningfulParagraph,
  firstText,
  stripTitleSuffix,
} from '../services/html-extract.js';
import type { NewsSource, RawCandidate } from '../types/index.js';

const DOMAIN = 'https://plusworld.ru';
const TITLE_SUFFIX = ' | Plusworld.ru';

const SECTIONS = [
  { path: '/digital-banking/', searchTerm: 'digital-banking' },
  { path: '/finteh/', searchTerm: 'fintech' },
  { path: '/iskusstvennyy-intellekt-i-big-data/', searchTerm: 'ai-big-data' },
];

/**
 * First text that reads as a date, in lookup order
 */
export function firstDateLike(texts: readonly string[]): string | null {
  for (const raw of texts) {
    const text = sanitizeDateText(raw);
    if (text && looksLikeDate(text, ruEnLocale)) {
      return text;
    }
  }
  return null;
}

function fromCards($: CheerioAPI): RawCandidate[] {
  const candidates: RawCandidate[] = [];
  for (const el of $('.card, .pw-wide .card, .section .card').toArray()) {
    const $card = $(el);
    const url = cleanUrl($card.find('a').first().attr('href'), DOMAIN);
    const title = collapseWhitespace($card.find('.card__title, .card-title, h3, h4').first().text());
    if (!url || !title || !url.includes('/articles/')) continue;

    const dateText = $card.find('.meta span, .date, time').first().text();
    candidates.push({ url, title, dateText: dateText || null });
  }
  return candidates;
}

function fromArticleLinks($: CheerioAPI): RawCandidate[] {
  const candidates: RawCandidate[] = [];
  for (const el of $('a[href*="/articles/"]').toArray()) {
    const $link = $(el);
    const title = collapseWhitespace($link.text());
    const url = cleanUrl($link.attr('href'), DOMAIN);
    if (!url || title.length <= 10) continue;

    // Spans beside the link, then one or two levels up, then meta blocks
    const nearby = [
      $link.nextAll('span'),
      $link.prevAll('span'),
      $link.parent().find('span'),
      $link.parent().parent().find('span'),
      $link.parent().children('div[class*="meta"]'),
      $link.parent().parent().children('div[class*="meta"]'),
    ].flatMap((found) => found.toArray().map((node) => $(node).text()));

    candidates.push({ url, title, dateText: firstDateLike(nearby) });
  }
  return candidates;
}

function fromPopularBlocks($: CheerioAPI): RawCandidate[] {
  const candidates: RawCandidate[] = [];
  for (const el of $('.popular-embed, .popular-line, .box-news').toArray()) {
    const $block = $(el);
    const url = cleanUrl($block.find('a[href*="/articles/"]').first().attr('href'), DOMAIN);
    const title = collapseWhitespace($block.find('a').first().text());
    if (!url || !title) continue;

    const dateText = $block.find('.date, .meta').first().text();
    candidates.push({ url, title, dateText: dateText || null });
  }
  return candidates;
}

/**
 * Cards first; bare article links and popular blocks only when the layout has no cards
 */
function extractCandidates($: CheerioAPI): RawCandidate[] {
  for (const strategy of [fromCards, fromArticleLinks, fromPopularBlocks]) {
    const candidates = strategy($);
    if (candidates.length > 0) return candidates;
  }
  return [];
}

export const plusworld: NewsSource = {
  name: 'plusworld',
  domain: DOMAIN,
  seeds: SECTIONS.map(({ path, searchTerm }) => ({ url: `${DOMAIN}${path}`, searchTerm })),
  maxPages: 3,
  perPageLimit: 15,
  // Page 1 opens with pinned articles shared by every section
  skipOnFirstPage: 7,
  dateStrategies: ['absolute-month', 'relative'],
  locale: ruEnLocale,
  extractCandidates,
  findNextPage: ($) => findNextPageUrl($, DOMAIN),
  article: {
    extractTitle: ($) => stripTitleSuffix(firstText($, ['h1', '.article-title', 'title']), TITLE_SUFFIX),
    extractDescription: ($) =>
      firstMeaningfulParagraph($, [
        '.article-content p',
        '.post-content p',
        '.content p',
        '.entry-content p',
        '.text p',
        'article p',
        '.pw-detail .content p',
      ]),
  },
};
