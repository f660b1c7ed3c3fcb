/**
 * mckinsey.com: one search page, records are built from the result list
 */

import type { CheerioAPI } from 'cheerio';
import { collapseWhitespace } from '../services/html-extract.js';
import type { NewsSource, RawCandidate } from '../types/index.js';
import { logDebug, logWarn } from '../utils/logger.js';

const DOMAIN = 'https://www.mckinsey.com';
const ALTERNATIVE_DESCRIPTION_LENGTH = 100;

function absolute(href: string | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, pageUrl).href;
  } catch (error) {
    logDebug(`Ignoring unparseable link "${href}"`, error);
    return null;
  }
}

function fromResultTemplate($: CheerioAPI, pageUrl: string): RawCandidate[] {
  const candidates: RawCandidate[] = [];
  for (const el of $('.item.result-template').toArray()) {
    const $item = $(el);
    const title = collapseWhitespace($item.find('h3.headline').first().text());
    const url = absolute($item.find('a.item-title-link').first().attr('href'), pageUrl);
    if (!title || !url) continue;

    candidates.push({
      url,
      title,
      dateText: null,
      description: collapseWhitespace($item.find('p.description').first().text()),
    });
  }
  return candidates;
}

/**
 * Generic article-like blocks, for when the result markup changes
 */
function fromAlternativeSelectors($: CheerioAPI, pageUrl: string): RawCandidate[] {
  logWarn('No result-template items found, trying alternative selectors');

  const candidates: RawCandidate[] = [];
  for (const el of $('[class*="article"], [class*="result"], [class*="item"]').toArray()) {
    const $block = $(el);
    const title = collapseWhitespace($block.find('h1, h2, h3, h4').first().text());
    const url = absolute($block.find('a').first().attr('href'), pageUrl);
    if (!title || !url) continue;

    candidates.push({
      url,
      title,
      dateText: null,
      description: collapseWhitespace($block.find('p').first().text()).slice(0, ALTERNATIVE_DESCRIPTION_LENGTH),
    });
  }
  return candidates;
}

function extractCandidates($: CheerioAPI, pageUrl: string): RawCandidate[] {
  const results = fromResultTemplate($, pageUrl);
  return results.length > 0 ? results : fromAlternativeSelectors($, pageUrl);
}

export const mckinsey: NewsSource = {
  name: 'mckinsey',
  domain: DOMAIN,
  seeds: [{ url: `${DOMAIN}/search?q=bank+ai`, searchTerm: 'bank ai' }],
  maxPages: 1,
  extractCandidates,
};
