/**
 * Console reports for crawl and verification runs
 */

import { describeOrderIssue, SectionReport, VerificationReport } from '../../lib/validation';
import { ICrawlSummary } from './regulations.types';

const RULE = '='.repeat(80);
const MAX_LISTED = 10;
const MAX_ORDER_ISSUES = 3;

export function formatCrawlSummary(summary: ICrawlSummary): string[] {
  const lines = [`Crawl completed for ${summary.jurisdiction} in ${(summary.elapsedMs / 1000).toFixed(1)}s`];

  if (summary.rootFailed) {
    lines.push(`Could not fetch ${summary.rootUrl}; nothing was crawled`);
  }
  if (summary.resumeCursor) {
    lines.push(`Resumed after lex_path [${summary.resumeCursor.join(', ')}]`);
  }

  lines.push(
    `Sections: ${summary.sectionsProcessed}/${summary.sectionsQueued} processed, ${summary.sectionsSkipped} skipped`,
    `Records written: ${summary.recordsWritten}`,
    `Pages fetched: ${summary.pagesFetched}`,
    `Excluded nodes: ${summary.excludedNodes}, malformed links: ${summary.malformedLinks}, duplicates: ${summary.duplicatesSuppressed}`
  );

  if (summary.depthLimitHits > 0) {
    lines.push(`Depth limit reached ${summary.depthLimitHits} times`);
  }

  lines.push(`Output saved to: ${summary.outputPath}`);
  lines.push(
    summary.failuresLogged > 0
      ? `${summary.failuresLogged} failures logged to ${summary.failureLogPath}`
      : 'No failed URLs!'
  );

  return lines;
}

function formatSection(report: SectionReport): string[] {
  const lines = [report.section.name, '-'.repeat(76)];
  const { completeness, order, spotCheck } = report;

  if (completeness.complete) {
    lines.push(`  Completeness: all ${report.expectedCount} records present`);
  } else {
    lines.push(`  INCOMPLETE: missing ${completeness.missing.length}, extra ${completeness.extra.length}`);
    const listed = completeness.missing.length <= MAX_LISTED ? completeness.missing : completeness.missing.slice(0, 1);
    for (const url of listed) {
      lines.push(`    MISSING: ${url}`);
    }
    if (listed.length < completeness.missing.length) {
      lines.push(`    ... and ${completeness.missing.length - listed.length} more`);
    }
  }
  if (completeness.extra.length > 0) {
    lines.push(`  WARNING: ${completeness.extra.length} extra records not in navigation`);
  }
  if (report.walkFailures > 0) {
    lines.push(`  WARNING: ${report.walkFailures} pages could not be fetched while walking`);
  }

  if (order.ordered) {
    lines.push(`  Order: all ${report.recordCount} records in order`);
  } else {
    lines.push(`  Order: ${order.issues.length} issues found`);
    for (const issue of order.issues.slice(0, MAX_ORDER_ISSUES)) {
      lines.push(`    ${describeOrderIssue(issue)}`);
    }
    if (order.issues.length > MAX_ORDER_ISSUES) {
      lines.push(`    ... and ${order.issues.length - MAX_ORDER_ISSUES} more`);
    }
  }

  if (spotCheck.checked > 0) {
    if (spotCheck.failed === 0) {
      lines.push(`  Spot check: all ${spotCheck.passed} passed`);
    } else {
      lines.push(`  Spot check: ${spotCheck.passed} passed, ${spotCheck.failed} failed`);
      for (const failure of spotCheck.failures) {
        lines.push(`    ${failure.url} - ${failure.reason}`);
      }
    }
  }

  return lines;
}

export function formatVerificationReport(report: VerificationReport): string[] {
  const { totals } = report;
  const lines = [RULE, `Validating ${report.jurisdiction} regulations`, RULE];

  for (const section of report.sections) {
    lines.push('', ...formatSection(section));
  }

  lines.push('', RULE, 'FINAL SUMMARY', RULE);

  if (report.rootFailed) {
    lines.push(`Could not fetch ${report.rootUrl}`);
  }

  lines.push(
    report.valid
      ? `${report.jurisdiction}.jsonl is VALID - all sections complete and ordered`
      : `${report.jurisdiction}.jsonl VALIDATION FAILED`
  );
  lines.push(
    `Sections: ${totals.sections} total, ${totals.complete} complete, ${totals.incomplete} incomplete, ` +
      `${totals.ordered} ordered, ${totals.unordered} unordered`
  );

  if (totals.missing > 0 || totals.extra > 0) {
    lines.push(`Records: ${totals.missing} missing, ${totals.extra} extra`);
  }
  lines.push(`Spot checks: ${totals.spotChecksPassed} passed, ${totals.spotChecksFailed} failed`);

  return lines;
}
