/**
 * Content Extractor
 * Site-specific heuristics for breadcrumbs, titles, citations and regulation text.
 * Layout changes on the site are absorbed here and in the SiteLayout.
 */

import { StructuralParseError } from '../scraping/errors';
import { MarkupDocument, MarkupElement, normalizeLines } from './markup-document';
import { LeafContent, MarkupRole } from './markup.types';

export class ContentExtractor {
  /**
   * Everything a leaf record needs. Strips page chrome from the document,
   * so it runs after any other lookup on the same document.
   */
  extractLeaf(doc: MarkupDocument): LeafContent {
    const breadcrumb = this.extractBreadcrumb(doc);
    const title = this.extractTitle(doc);
    if (title === null) {
      throw new StructuralParseError(doc.url, doc.layout.selectors[MarkupRole.TITLE]);
    }
    const { universalCitation, citation } = this.extractCitation(doc);
    const body = this.extractBody(doc);

    return { breadcrumb, title, universalCitation, citation, body };
  }

  /**
   * Breadcrumb trail from the state's rules code onwards
   */
  extractBreadcrumb(doc: MarkupDocument): string {
    const layout = doc.layout;
    const trail = doc.findByRole(MarkupRole.BREADCRUMB);
    if (!trail) {
      throw new StructuralParseError(doc.url, layout.selectors[MarkupRole.BREADCRUMB]);
    }

    const separatorElement = doc.findByRole(MarkupRole.BREADCRUMB_SEPARATOR);
    const separator = separatorElement ? doc.joinText(separatorElement, '') : '';
    if (!separator) {
      throw new StructuralParseError(doc.url, layout.selectors[MarkupRole.BREADCRUMB_SEPARATOR]);
    }

    const segments = doc.joinText(trail, '').split(separator);
    const kept: string[] = [];
    let collecting = false;

    for (const raw of segments) {
      const segment = raw.trim();
      if (
        !collecting &&
        segment !== layout.breadcrumbIgnoredSegment &&
        layout.breadcrumbStartKeywords.some((keyword) => segment.includes(keyword))
      ) {
        collecting = true;
      }
      if (collecting) {
        kept.push(segment);
      }
    }

    return kept.join(separator);
  }

  /**
   * Heading text nodes joined with " › ", or null when the page has no heading
   */
  extractTitle(doc: MarkupDocument): string | null {
    const heading = doc.findByRole(MarkupRole.TITLE);
    return heading ? doc.joinText(heading, ' › ') : null;
  }

  extractCitation(doc: MarkupDocument): { universalCitation: boolean; citation: string | null } {
    let universalCitation = false;
    const banner = doc.findByRole(MarkupRole.CITATION_BANNER);
    if (banner) {
      const label = doc.select('b', banner).first();
      universalCitation = label.length > 0 && doc.joinText(label, '') === doc.layout.universalCitationLabel;
    }

    const citationElement = doc.findByRole(MarkupRole.CITATION);
    const citation = citationElement ? doc.joinText(citationElement, '') : null;

    return { universalCitation, citation };
  }

  /**
   * Regulation text: the content region minus promotional junk, plus the
   * continuation divs the site scatters after it
   */
  extractBody(doc: MarkupDocument): string {
    const layout = doc.layout;
    doc.remove(layout.chromeSelectors);

    const main = doc.findByRole(MarkupRole.CONTENT);
    if (!main) {
      return '';
    }

    doc.remove(layout.junkSelectors, main);

    doc.select('div', main).each((_, el) => {
      const div = doc.wrap(el);
      const text = doc.joinText(div, '');
      if (text.length < layout.junkMaxLength && layout.junkKeywords.some((keyword) => text.includes(keyword))) {
        div.remove();
      }
    });

    doc
      .select('div[id]', main)
      .filter((_, el) => (el.attribs.id ?? '').toLowerCase().includes('notification'))
      .remove();

    const collected = this.collectContentRegion(doc, main, layout.continuation.keywords);
    for (const element of collected) {
      doc.remove(layout.residueSelectors, element);
    }

    return normalizeLines(doc.textNodes(collected).join('\n'));
  }

  /**
   * Unfiltered text of the content region and its continuation divs, for
   * comparison against stored records. Null when the page has no content region.
   */
  extractComparableText(doc: MarkupDocument): string | null {
    const main = doc.findByRole(MarkupRole.CONTENT);
    if (!main) {
      return null;
    }

    return doc
      .textNodes(this.collectContentRegion(doc, main, doc.layout.continuation.comparisonKeywords))
      .join('\n');
  }

  /**
   * The content region followed by its continuation siblings. `keywords`
   * admit an unclassed div as regulation text.
   */
  collectContentRegion(doc: MarkupDocument, main: MarkupElement, keywords: string[]): MarkupElement[] {
    const rules = doc.layout.continuation;
    const collected: MarkupElement[] = [main];
    let current = main;

    while (true) {
      const next = current.next();
      if (next.length === 0) {
        break;
      }

      if (!next.is('div')) {
        current = next;
        continue;
      }

      const classes = (next.attr('class') ?? '').split(/\s+/).filter((name) => name.length > 0);
      const classList = classes.join(' ').toLowerCase();
      const preview = doc.joinText(next, '').slice(0, 100);

      if (preview.includes(rules.stopText) || rules.stopClassFragments.some((fragment) => classList.includes(fragment))) {
        break;
      }

      if (classes.includes(rules.collectClass) || keywords.some((keyword) => preview.includes(keyword))) {
        collected.push(next);
        current = next;
      } else {
        break;
      }
    }

    return collected;
  }
}
