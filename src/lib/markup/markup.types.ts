/**
 * Markup Types
 * Roles, links and layout rules for the regulation site's pages
 */

/**
 * Structural roles a page region can play
 */
export enum MarkupRole {
  NAVIGATION = 'navigation',
  CONTENT = 'content',
  BREADCRUMB = 'breadcrumb',
  BREADCRUMB_SEPARATOR = 'breadcrumb_separator',
  TITLE = 'title',
  CITATION = 'citation',
  CITATION_BANNER = 'citation_banner',
}

/**
 * An anchor from a branch page's navigation region, in document order
 */
export interface NodeLink {
  text: string;
  href: string;
}

/**
 * Rules for the content divs that follow the main content region
 */
export interface ContinuationRules {
  /**
   * Class marking a continuation div
   */
  collectClass: string;

  /**
   * Text (first 100 chars) that marks an unclassed div as regulation text
   * when a record body is extracted
   */
  keywords: string[];

  /**
   * The same marker list for the page text that stored records are compared against
   */
  comparisonKeywords: string[];

  /**
   * Class fragments (lowercase) that end the content
   */
  stopClassFragments: string[];

  /**
   * Text that ends the content
   */
  stopText: string;
}

export interface SiteLayout {
  selectors: Record<MarkupRole, string>;

  /**
   * Page chrome stripped before content extraction
   */
  chromeSelectors: string[];

  /**
   * The trail is kept from the first segment containing one of these
   */
  breadcrumbStartKeywords: string[];

  /**
   * Segment that never starts the kept trail
   */
  breadcrumbIgnoredSegment: string;

  universalCitationLabel: string;

  /**
   * Short divs inside the content region containing any of these are dropped
   */
  junkKeywords: string[];
  junkMaxLength: number;
  junkSelectors: string[];

  /**
   * Removed from the collected content before its text is taken
   */
  residueSelectors: string[];

  continuation: ContinuationRules;
}

export interface LeafContent {
  breadcrumb: string;
  title: string;
  universalCitation: boolean;
  citation: string | null;
  body: string;
}
