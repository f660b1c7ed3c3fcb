/**
 * cnews.ru: keyword search results; article URLs embed their publication date
 */

import type { CheerioAPI } from 'cheerio';
import {
  DESCRIPTION_FALLBACK,
  cleanUrl,
  collapseWhitespace,
  firstText,
  stripTitleSuffix,
} from '../services/html-extract.js';
import type { NewsSource, RawCandidate } from '../types/index.js';

const DOMAIN = 'https://www.cnews.ru';
const SEARCH_TERMS = ['банк', 'финансы', 'кредит', 'банки'];
const ARTICLE_SECTIONS = ['/news/', '/articles/', '/line/'];
const TITLE_SUFFIX = ' - CNews.ru';

// /news/2025-10-27_slug, also present in pages where links are built by scripts
const ARTICLE_HREF_RE = /href=["'](\/(?:news|articles|line)\/\d{4}-\d{2}-\d{2}_[^"'\s>]+)["']/g;
const URL_DATE_RE = /\/(\d{4}-\d{2}-\d{2})_/;

const DESCRIPTION_NOISE = ['реклама', 'advertisement', 'читать также'];

/**
 * Drop half-encoded anchor markup that the search page leaks into hrefs
 */
export function cleanCnewsUrl(href: string | null | undefined): string | null {
  if (!href) return null;

  const stripped = href
    .replace(/%3Ca.*?href=%22/g, '')
    .replace(/%22.*%3E.*%3C\/a%3E/g, '')
    .replace(/&amp;/g, '&');

  const url = cleanUrl(stripped, DOMAIN);
  if (!url || url.includes('%3C') || url.includes('%22')) {
    return null;
  }
  return url;
}

export function isArticleUrl(url: string): boolean {
  return url.startsWith(`${DOMAIN}/`) && ARTICLE_SECTIONS.some((section) => url.includes(section));
}

function toCandidate(url: string): RawCandidate {
  const dateInUrl = URL_DATE_RE.exec(url);
  return { url, title: null, dateText: dateInUrl ? dateInUrl[1] : null };
}

function extractCandidates($: CheerioAPI): RawCandidate[] {
  const urls: string[] = [];

  const selector = '.search-results a, .news-item a, .article-item a, a[href*="/news/"], a[href*="/articles/"]';
  for (const el of $(selector).toArray()) {
    const url = cleanCnewsUrl($(el).attr('href'));
    if (url && isArticleUrl(url)) {
      urls.push(url);
    }
  }

  for (const match of $.html().matchAll(ARTICLE_HREF_RE)) {
    const url = cleanCnewsUrl(match[1]);
    if (url) {
      urls.push(url);
    }
  }

  return urls.map(toCandidate);
}

function findNextPage($: CheerioAPI): string | null {
  const href =
    $('a[rel="next"]').first().attr('href') ??
    $('a:contains("Далее"), a:contains("Next")').first().attr('href');
  return cleanCnewsUrl(href);
}

/**
 * Meta description, then og:description, then the first two substantial paragraphs
 */
function extractDescription($: CheerioAPI): string {
  for (const selector of ['meta[name="description"]', 'meta[property="og:description"]']) {
    const content = $(selector).attr('content')?.trim();
    if (content && content.length > 20) {
      return content;
    }
  }

  const parts: string[] = [];
  for (const el of $('.news_container p, article p, .article-content p').toArray()) {
    const text = collapseWhitespace($(el).text());
    const lower = text.toLowerCase();
    if (text.length > 50 && !DESCRIPTION_NOISE.some((word) => lower.includes(word))) {
      parts.push(text);
      if (parts.length >= 2) break;
    }
  }

  return parts.length > 0 ? parts.join(' ') : DESCRIPTION_FALLBACK;
}

export const cnews: NewsSource = {
  name: 'cnews',
  domain: DOMAIN,
  seeds: SEARCH_TERMS.map((term) => ({
    url: `${DOMAIN}/search?search=${encodeURIComponent(term)}`,
    searchTerm: term,
  })),
  maxPages: 2,
  perPageLimit: 10,
  dateStrategies: ['numeric'],
  extractCandidates,
  findNextPage,
  article: {
    extractTitle: ($) => stripTitleSuffix(firstText($, ['h1', '.article-title', 'title']), TITLE_SUFFIX),
    extractDescription,
  },
};
