/**
 * rb.ru: keyword search results
 */

import type { CheerioAPI } from 'cheerio';
import {
  cleanUrl,
  collapseWhitespace,
  findNextPageUrl,
  firstMeaningfulParagraph,
  firstText,
  stripTitleSuffix,
} from '../services/html-extract.js';
import type { NewsSource, RawCandidate } from '../types/index.js';

const DOMAIN = 'https://rb.ru';
const SEARCH_TERMS = ['банк', 'финансы', 'кредит', 'банки', 'финтех'];
const DATE_SELECTOR = 'time.news-item__date, .news-item__date, time';
const TITLE_SUFFIX = ' | RB.RU';

/**
 * Result items that carry a date; bare title links when none do
 */
function extractCandidates($: CheerioAPI): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  for (const el of $('.news-item, .search-result-item, [class*="item"]').toArray()) {
    const $item = $(el);
    const dateText = collapseWhitespace($item.find(DATE_SELECTOR).first().text());
    if (!dateText) continue;

    const href =
      $item.find('a.news-item__title').first().attr('href') ??
      $item.find('a[href*="/news/"], a[href*="/article/"]').first().attr('href');
    const url = cleanUrl(href, DOMAIN);
    if (!url) continue;

    const title = collapseWhitespace($item.find('a.news-item__title').first().text());
    candidates.push({ url, title: title || null, dateText });
  }

  if (candidates.length > 0) return candidates;

  for (const el of $('a.news-item__title').toArray()) {
    const $link = $(el);
    const url = cleanUrl($link.attr('href'), DOMAIN);
    if (!url) continue;

    const title = collapseWhitespace($link.text());
    candidates.push({ url, title: title || null, dateText: null });
  }
  return candidates;
}

export const rb: NewsSource = {
  name: 'rb',
  domain: DOMAIN,
  seeds: SEARCH_TERMS.map((term) => ({
    url: `${DOMAIN}/search/?query=${encodeURIComponent(term)}`,
    searchTerm: term,
  })),
  maxPages: 3,
  perPageLimit: 15,
  pageLimitScope: 'recent',
  dateStrategies: ['absolute-month'],
  extractCandidates,
  findNextPage: ($) => findNextPageUrl($, DOMAIN, ['a.pagination__next', 'a[rel="next"]']),
  article: {
    extractTitle: ($) =>
      stripTitleSuffix(
        firstText($, ['h1.news-item__title', 'h1.article__title', 'h1', 'title']),
        TITLE_SUFFIX
      ),
    extractDateText: ($) => collapseWhitespace($(DATE_SELECTOR).first().text()) || null,
    extractDescription: ($) =>
      firstMeaningfulParagraph($, [
        '.news-item__content p',
        '.article__content p',
        '.post-content p',
        '.content p',
        '.text p',
      ]),
  },
};
