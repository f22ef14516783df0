/**
 * Jurisdictions
 * Supported codes and the crawl root of each
 */

import { CrawlSetupError } from '../../lib/scraping/errors';
import slugs from './jurisdictions.json';

export interface Jurisdiction {
  /**
   * Two-letter code, upper case
   */
  code: string;

  /**
   * Path segment under /states/ on the regulations site
   */
  slug: string;
}

const JURISDICTION_SLUGS: ReadonlyMap<string, string> = new Map(Object.entries(slugs));

export function listJurisdictions(): Jurisdiction[] {
  return [...JURISDICTION_SLUGS].map(([code, slug]) => ({ code, slug }));
}

export function isKnownJurisdiction(code: string): boolean {
  return JURISDICTION_SLUGS.has(code.trim().toUpperCase());
}

/**
 * Case-insensitive lookup; an unknown code aborts the run
 */
export function resolveJurisdiction(code: string): Jurisdiction {
  const normalized = code.trim().toUpperCase();
  const slug = JURISDICTION_SLUGS.get(normalized);

  if (!slug) {
    throw new CrawlSetupError(`Jurisdiction '${code}' is not supported`);
  }

  return { code: normalized, slug };
}

export function jurisdictionRootUrl(jurisdiction: Jurisdiction, baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/states/${jurisdiction.slug}/`;
}
