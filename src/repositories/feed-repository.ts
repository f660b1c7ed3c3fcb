/**
 * Feed repository: collects a source's records and writes them as one JSON file
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Clock } from '../dates/index.js';
import { validateArticleRecord, type ArticleRecord } from '../models/schemas.js';
import { appConfig } from '../utils/config.js';
import { logInfo } from '../utils/logger.js';

export class FeedRepository {
  private readonly records: ArticleRecord[] = [];
  private readonly seenUrls = new Set<string>();

  constructor(
    private readonly sourceName: string,
    private readonly clock: Clock,
    private readonly outputDir: string = appConfig.outputDir
  ) {}

  /**
   * Add a record; a URL already in the feed is ignored
   */
  add(record: ArticleRecord): boolean {
    const valid = validateArticleRecord(record);
    if (this.seenUrls.has(valid.url)) {
      return false;
    }
    this.seenUrls.add(valid.url);
    this.records.push(valid);
    return true;
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly ArticleRecord[] {
    return this.records;
  }

  /**
   * File name of the feed, e.g. bankinform_articles_2025-10-27T12-00-00.json
   */
  fileName(): string {
    const stamp = this.clock.now().toUTC().toFormat("yyyy-MM-dd'T'HH-mm-ss");
    return `${this.sourceName}_articles_${stamp}.json`;
  }

  /**
   * Write all collected records; returns the file path, or null when there was nothing to write
   */
  async flush(): Promise<string | null> {
    if (this.records.length === 0) {
      logInfo(`No records collected for ${this.sourceName}, feed not written`);
      return null;
    }

    await mkdir(this.outputDir, { recursive: true });
    const path = join(this.outputDir, this.fileName());
    await writeFile(path, `${JSON.stringify(this.records, null, 2)}\n`, 'utf8');

    logInfo(`Wrote ${this.records.length} records for ${this.sourceName} to ${path}`);
    return path;
  }
}
