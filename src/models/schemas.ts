/**
 * Data models with Zod validation schemas
 */

import { z } from 'zod';

const IsoCalendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be an ISO calendar date (YYYY-MM-DD)');

/**
 * Record emitted for every accepted article
 */
export const ArticleRecordSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  search_term: z.string().min(1),
  description: z.string(),
  article_date: IsoCalendarDate.nullable(),
  scraped_at: z.string().datetime({ offset: true }),
});

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

/**
 * Metadata carried on a listing-page request
 */
export const ListingRequestDataSchema = z.object({
  searchTerm: z.string().min(1),
  page: z.number().int().positive(),
});

export type ListingRequestData = z.infer<typeof ListingRequestDataSchema>;

/**
 * Metadata carried from a listing page to an article request
 */
export const ArticleRequestDataSchema = z.object({
  searchTerm: z.string().min(1),
  title: z.string().nullable(),
  articleDate: IsoCalendarDate.nullable(),
});

export type ArticleRequestData = z.infer<typeof ArticleRequestDataSchema>;

/**
 * Validation helpers
 */
export function validateArticleRecord(data: unknown): ArticleRecord {
  return ArticleRecordSchema.parse(data);
}

/**
 * Safe parsing with error handling
 */
export function safeParseArticleRecord(
  data: unknown
): { success: true; data: ArticleRecord } | { success: false; error: z.ZodError } {
  const result = ArticleRecordSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
