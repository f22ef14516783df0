/**
 * Dataset Verifier
 * Cross-checks persisted records against a fresh walk of the live hierarchy,
 * section by section
 */

import { CrawlRecord, TraversalConfig } from '../crawling/crawling.types';
import { LinkDiscoverer } from '../crawling/link-discoverer';
import { NodeClassifier } from '../crawling/node-classifier';
import { normalizeUrl } from '../crawling/url-normalizer';
import { SiteLayout } from '../markup/markup.types';
import { PageFetcher } from '../scraping/scraping.types';
import { ContentSpotChecker } from './content-spot-check';
import { SectionWalker } from './section-walker';
import { groupBySection, validateCompleteness, validateOrder } from './section-validator';
import {
  ContentMatchThresholds,
  SectionRef,
  SectionReport,
  VerificationReport,
  VerificationTotals,
} from './verification.types';

export interface VerifierOptions {
  rootUrl: string;
  config: TraversalConfig;
  layout: SiteLayout;
  fetcher: PageFetcher;
  thresholds: ContentMatchThresholds;

  /**
   * Records spot-checked per section
   */
  samples: number;

  /**
   * Attempts for spot-check refetches
   */
  spotCheckAttempts: number;
  random?: () => number;
}

export class Verifier {
  private readonly classifier: NodeClassifier;
  private readonly walker: SectionWalker;
  private readonly spotChecker: ContentSpotChecker;

  constructor(private readonly options: VerifierOptions) {
    const { config, layout, fetcher } = options;
    this.classifier = new NodeClassifier(fetcher, layout, config);
    this.walker = new SectionWalker(config, layout, fetcher, options.rootUrl);
    this.spotChecker = new ContentSpotChecker({
      fetcher,
      layout,
      thresholds: options.thresholds,
      maxAttempts: options.spotCheckAttempts,
      baseDelayMs: config.baseDelayMs,
      random: options.random,
    });
  }

  async verify(jurisdiction: string, records: CrawlRecord[]): Promise<VerificationReport> {
    const { rootUrl } = this.options;
    const sections = await this.listSections();
    const bySection = groupBySection(records);
    const reports: SectionReport[] = [];

    for (const section of sections ?? []) {
      reports.push(await this.verifySection(section, bySection.get(section.index) ?? []));
    }

    const totals = summarize(reports);
    const rootFailed = sections === null;

    return {
      jurisdiction,
      rootUrl,
      recordsLoaded: records.length,
      rootFailed,
      sections: reports,
      totals,
      valid: !rootFailed && totals.incomplete === 0 && totals.unordered === 0,
    };
  }

  /**
   * Top-level sections of the live root, excluded and malformed ones left out.
   * Null when the root page cannot be fetched.
   */
  async listSections(): Promise<SectionRef[] | null> {
    const { rootUrl, config } = this.options;
    const root = await this.classifier.fetchAndClassify(rootUrl);

    if (root.kind === 'failed') {
      console.error(`Failed to fetch base URL ${rootUrl}: ${root.failure.message}`);
      return null;
    }

    if (root.kind !== 'branch') {
      console.warn(`No navigation found at ${rootUrl}`);
      return [];
    }

    const discoverer = new LinkDiscoverer({ siteBaseUrl: config.siteBaseUrl, isExcluded: config.isExcluded });
    return discoverer
      .followable(root.links)
      .map((child) => ({ name: child.text, url: child.url, index: child.index }));
  }

  private async verifySection(section: SectionRef, records: CrawlRecord[]): Promise<SectionReport> {
    console.log(`Walking section ${section.name}...`);
    const walk = await this.walker.walk(section);

    const completeness = validateCompleteness(
      walk.urls.map(normalizeUrl),
      records.map((record) => normalizeUrl(record.url))
    );
    const order = validateOrder(records);
    const spotCheck =
      records.length > 0
        ? await this.spotChecker.check(records, this.options.samples)
        : { checked: 0, passed: 0, failed: 0, failures: [] };

    return {
      section,
      expectedCount: new Set(walk.urls).size,
      recordCount: records.length,
      walkFailures: walk.failures,
      completeness,
      order,
      spotCheck,
      valid: completeness.complete && order.ordered,
    };
  }
}

function summarize(reports: SectionReport[]): VerificationTotals {
  const totals: VerificationTotals = {
    sections: reports.length,
    complete: 0,
    incomplete: 0,
    ordered: 0,
    unordered: 0,
    missing: 0,
    extra: 0,
    spotChecksPassed: 0,
    spotChecksFailed: 0,
  };

  for (const report of reports) {
    if (report.completeness.complete) {
      totals.complete++;
    } else {
      totals.incomplete++;
    }
    if (report.order.ordered) {
      totals.ordered++;
    } else {
      totals.unordered++;
    }
    totals.missing += report.completeness.missing.length;
    totals.extra += report.completeness.extra.length;
    totals.spotChecksPassed += report.spotCheck.passed;
    totals.spotChecksFailed += report.spotCheck.failed;
  }

  return totals;
}
