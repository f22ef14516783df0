/**
 * Markup Document
 * Role-based element lookup, link and text extraction over cheerio
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { MarkupRole, NodeLink, SiteLayout } from './markup.types';

export type MarkupElement = Cheerio<Element>;

const NON_TEXT_TAGS = new Set(['script', 'style', 'noscript', 'template']);

/**
 * Trim every line, drop leading and trailing blank lines and
 * collapse runs of blank lines to one
 */
export function normalizeLines(text: string): string {
  const cleaned: string[] = [];

  for (const line of text.split('\n')) {
    const stripped = line.trim();
    if (stripped) {
      cleaned.push(stripped);
    } else if (cleaned.length > 0 && cleaned[cleaned.length - 1] !== '') {
      cleaned.push('');
    }
  }

  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') {
    cleaned.pop();
  }

  return cleaned.join('\n');
}

export class MarkupDocument {
  private constructor(
    readonly $: CheerioAPI,
    readonly url: string,
    readonly layout: SiteLayout
  ) {}

  static load(html: string, url: string, layout: SiteLayout): MarkupDocument {
    return new MarkupDocument(cheerio.load(html), url, layout);
  }

  /**
   * First element playing the role, or null
   */
  findByRole(role: MarkupRole, scope?: MarkupElement): MarkupElement | null {
    const selector = this.layout.selectors[role];
    const found = this.select(selector, scope).first();
    return found.length > 0 ? found : null;
  }

  /**
   * Anchors with an href inside the element, in document order
   */
  extractLinks(element: MarkupElement): NodeLink[] {
    const links: NodeLink[] = [];

    element.find('a[href]').each((_, el) => {
      const anchor = this.$(el);
      const href = anchor.attr('href');
      if (href === undefined) return;

      links.push({
        text: this.extractText(anchor, false),
        href,
      });
    });

    return links;
  }

  /**
   * Text of the element. With line breaks preserved every text node
   * becomes its own line; otherwise whitespace collapses to single spaces.
   */
  extractText(element: MarkupElement, preserveLineBreaks: boolean): string {
    const strings = this.textNodes(element);

    if (preserveLineBreaks) {
      return normalizeLines(strings.join('\n'));
    }

    return strings.join('').replace(/\s+/g, ' ').trim();
  }

  /**
   * Trimmed, non-empty text nodes joined by the separator
   */
  joinText(element: MarkupElement, separator: string): string {
    return this.textNodes(element)
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
      .join(separator);
  }

  /**
   * Raw text nodes of one or more elements, in document order
   */
  textNodes(element: MarkupElement | MarkupElement[]): string[] {
    const out: string[] = [];
    const roots = Array.isArray(element) ? element.flatMap((el) => el.toArray()) : element.toArray();
    this.collectText(roots, out);
    return out;
  }

  select(selector: string, scope?: MarkupElement): MarkupElement {
    if (scope) {
      return scope.find(selector);
    }
    return this.$.root().find(selector);
  }

  wrap(node: Element): MarkupElement {
    return this.$(node);
  }

  remove(selectors: string[], scope?: MarkupElement): void {
    if (selectors.length === 0) return;
    this.select(selectors.join(', '), scope).remove();
  }

  private collectText(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
      if (isText(node)) {
        out.push(node.data);
      } else if (isTag(node) && NON_TEXT_TAGS.has(node.name)) {
        continue;
      } else if (hasChildren(node)) {
        this.collectText(node.children, out);
      }
    }
  }
}
