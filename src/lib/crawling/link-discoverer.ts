/**
 * Link Discoverer
 * Turns a branch page's navigation links into indexed child candidates
 */

import { NodeLink } from '../markup/markup.types';
import { isMalformedHref, isSameDomain, resolveNodeUrl } from './url-normalizer';

export type ChildDisposition = 'follow' | 'excluded' | 'malformed' | 'offsite';

export interface ChildCandidate {
  /**
   * Position among all navigation links, before any filtering
   */
  index: number;
  text: string;
  href: string;

  /**
   * Absolute URL; empty unless the child is followed
   */
  url: string;
  disposition: ChildDisposition;
}

export interface LinkDiscoveryOptions {
  siteBaseUrl: string;
  isExcluded: (text: string) => boolean;
}

export class LinkDiscoverer {
  constructor(private readonly options: LinkDiscoveryOptions) {}

  /**
   * Classify every link. Indices are document positions, so filtering a
   * link never shifts the path of its later siblings.
   */
  discoverChildren(links: NodeLink[]): ChildCandidate[] {
    return links.map((link, index) => this.classify(link, index));
  }

  /**
   * Children to descend into, in document order
   */
  followable(links: NodeLink[]): ChildCandidate[] {
    return this.discoverChildren(links).filter((child) => child.disposition === 'follow');
  }

  private classify(link: NodeLink, index: number): ChildCandidate {
    const base = { index, text: link.text, href: link.href, url: '' };

    if (this.options.isExcluded(link.text)) {
      return { ...base, disposition: 'excluded' };
    }

    if (isMalformedHref(link.href)) {
      return { ...base, disposition: 'malformed' };
    }

    let url: string;
    try {
      url = resolveNodeUrl(link.href, this.options.siteBaseUrl);
    } catch {
      return { ...base, disposition: 'malformed' };
    }

    if (!isSameDomain(url, this.options.siteBaseUrl)) {
      return { ...base, disposition: 'offsite' };
    }

    return { ...base, url, disposition: 'follow' };
  }
}
