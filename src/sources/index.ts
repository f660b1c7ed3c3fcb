/**
 * Registered news sources
 */

import type { NewsSource } from '../types/index.js';
import { bankinform } from './bankinform.js';
import { cnews } from './cnews.js';
import { mckinsey } from './mckinsey.js';
import { plusworld } from './plusworld.js';
import { rb } from './rb.js';

export const SOURCES: readonly NewsSource[] = [bankinform, plusworld, rb, cnews, mckinsey];

/**
 * Sources by name, in registry order; no names means all of them
 */
export function selectSources(names: readonly string[] = []): NewsSource[] {
  if (names.length === 0) return [...SOURCES];

  const unknown = names.filter((name) => !SOURCES.some((source) => source.name === name));
  if (unknown.length > 0) {
    const known = SOURCES.map((source) => source.name).join(', ');
    throw new Error(`Unknown source(s): ${unknown.join(', ')}. Known sources: ${known}`);
  }
  return SOURCES.filter((source) => names.includes(source.name));
}

export { bankinform, cnews, mckinsey, plusworld, rb };
