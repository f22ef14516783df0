/**
 * Section Validator
 * Completeness and order checks for one top-level section
 */

import { CrawlRecord } from '../crawling/crawling.types';
import { compareLexPaths } from '../crawling/lex-path';
import { CompletenessResult, OrderResult, OrderIssue } from './verification.types';

/**
 * Missing and extra URLs, each sorted. Complete when nothing is missing;
 * extra records are reported but do not make a section incomplete.
 */
export function validateCompleteness(expected: Iterable<string>, actual: Iterable<string>): CompletenessResult {
  const expectedSet = new Set(expected);
  const actualSet = new Set(actual);

  const missing = [...expectedSet].filter((url) => !actualSet.has(url)).sort();
  const extra = [...actualSet].filter((url) => !expectedSet.has(url)).sort();

  return { complete: missing.length === 0, missing, extra };
}

/**
 * One issue for every record whose lex_path sorts before its predecessor's
 */
export function validateOrder(records: Pick<CrawlRecord, 'lex_path'>[]): OrderResult {
  const issues: OrderIssue[] = [];

  for (let i = 1; i < records.length; i++) {
    const previous = records[i - 1].lex_path;
    const current = records[i].lex_path;
    if (compareLexPaths(previous, current) > 0) {
      issues.push({ index: i, previous, current });
    }
  }

  return { ordered: issues.length === 0, issues };
}

/**
 * Records grouped by top-level section index, file order kept within each group
 */
export function groupBySection<T extends Pick<CrawlRecord, 'lex_path'>>(records: T[]): Map<number, T[]> {
  const groups = new Map<number, T[]>();

  for (const record of records) {
    if (record.lex_path.length === 0) continue;
    const section = record.lex_path[0];
    const group = groups.get(section);
    if (group) {
      group.push(record);
    } else {
      groups.set(section, [record]);
    }
  }

  return groups;
}

export function describeOrderIssue(issue: OrderIssue): string {
  return `Out of order at record ${issue.index}: [${issue.previous.join(', ')}] > [${issue.current.join(', ')}]`;
}
