/**
 * Failure Log
 * Jurisdiction-scoped JSONL of nodes that could not be processed, kept for recovery runs
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describeError } from '../scraping/errors';
import { FailureLogEntry } from '../crawling/crawling.types';

export function failureLogPath(outputDir: string, jurisdiction: string): string {
  return path.join(outputDir, `failed_${jurisdiction}.jsonl`);
}

export class FailureLog {
  private entries = 0;

  constructor(readonly filePath: string) {}

  /**
   * Append one entry. The file is created on first use; a write error is
   * reported and does not interrupt the crawl.
   */
  async append(entry: Omit<FailureLogEntry, 'timestamp'>, now: Date = new Date()): Promise<void> {
    const line: FailureLogEntry = { ...entry, timestamp: now.toISOString() };

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${JSON.stringify(line)}\n`, 'utf-8');
      this.entries++;
    } catch (error) {
      console.error(`ERROR: Could not log failed URL ${entry.url}: ${describeError(error)}`);
    }
  }

  get count(): number {
    return this.entries;
  }
}
