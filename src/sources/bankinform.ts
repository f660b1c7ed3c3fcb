/**
 * bankinform.ru: fintech tag listing
 */

import type { CheerioAPI } from 'cheerio';
import {
  NEXT_PAGE_SELECTORS,
  cleanUrl,
  collapseWhitespace,
  findNextPageUrl,
  firstMeaningfulParagraph,
  firstText,
} from '../services/html-extract.js';
import type { NewsSource, RawCandidate } from '../types/index.js';

const DOMAIN = 'https://bankinform.ru';
const DATE_SELECTOR = 'time[class*="date"]';

function extractCandidates($: CheerioAPI): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  for (const el of $('a.text-decoration-none').toArray()) {
    const $link = $(el);
    const title = collapseWhitespace($link.text());
    const url = cleanUrl($link.attr('href'), DOMAIN);
    if (!title || !url) continue;

    // The date sits next to the link, or one or two levels up
    const dateEl = [
      $link.nextAll(DATE_SELECTOR),
      $link.parent().children(DATE_SELECTOR),
      $link.parent().parent().children(DATE_SELECTOR),
    ].find((found) => found.length > 0);

    candidates.push({
      url,
      title,
      dateText: dateEl ? dateEl.first().text() : null,
    });
  }

  return candidates;
}

export const bankinform: NewsSource = {
  name: 'bankinform',
  domain: DOMAIN,
  seeds: [{ url: `${DOMAIN}/news/tag/2149`, searchTerm: 'bankinform-fintech' }],
  maxPages: 3,
  extractCandidates,
  findNextPage: ($) => findNextPageUrl($, DOMAIN, [...NEXT_PAGE_SELECTORS, '.pager-next a']),
  article: {
    extractTitle: ($) => firstText($, ['h1', '.article-title', 'title']),
    extractDescription: ($) =>
      firstMeaningfulParagraph($, [
        'article p',
        '.article-content p',
        '.post-content p',
        '.content p',
        '.entry-content p',
        '.news-detail p',
        '.text p',
      ]),
  },
};
