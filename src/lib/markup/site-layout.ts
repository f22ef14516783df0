/**
 * Default layout of the regulation pages
 */

import { MarkupRole, SiteLayout } from './markup.types';

export const DEFAULT_SITE_LAYOUT: SiteLayout = {
  selectors: {
    [MarkupRole.NAVIGATION]: '.codes-listing',
    [MarkupRole.CONTENT]: '#main-content',
    [MarkupRole.BREADCRUMB]: 'nav.breadcrumbs',
    [MarkupRole.BREADCRUMB_SEPARATOR]: 'span.breadcrumb-sep',
    [MarkupRole.TITLE]: 'h1',
    [MarkupRole.CITATION]: '[href="/citations.html"]',
    [MarkupRole.CITATION_BANNER]: 'div.has-margin-bottom-20',
  },
  chromeSelectors: ['header', 'footer', 'nav', 'script', 'style', 'noscript'],
  breadcrumbStartKeywords: ['Rules', 'Code'],
  breadcrumbIgnoredSegment: 'U.S. Regulations',
  universalCitationLabel: 'Universal Citation:',
  junkKeywords: [
    'Disclaimer',
    'reCAPTCHA',
    'Free Daily Summaries',
    'Newsletter',
    'Sign Up',
    'Enter Your Email',
    'Ask a Lawyer',
    'Find a Lawyer',
    'Get Listed',
    'Justia Legal Resources',
    'Justia Connect',
    'Privacy Policy',
    'Terms of Service',
    'Google',
    'CLE Credits',
    'Webinars',
    'Toggle button',
    'Lawyers - Get Listed',
    'Get free summaries',
    'Free Answers',
    'Our Suggestions',
  ],
  junkMaxLength: 2000,
  junkSelectors: ['div.disclaimer'],
  residueSelectors: ['h1', 'div.has-margin-bottom-20', '.breadcrumbs'],
  continuation: {
    collectClass: 'content-indent',
    keywords: ['Section', 'subsection', 'State Treasurer', 'taxpayer'],
    comparisonKeywords: ['Section', 'subsection', 'Rule', 'Chapter'],
    stopClassFragments: ['disclaimer', 'notification', 'footer'],
    stopText: 'Disclaimer',
  },
};

/**
 * Default layout with a different navigation region selector
 */
export function createSiteLayout(navigationSelector?: string): SiteLayout {
  if (!navigationSelector) {
    return DEFAULT_SITE_LAYOUT;
  }

  return {
    ...DEFAULT_SITE_LAYOUT,
    selectors: {
      ...DEFAULT_SITE_LAYOUT.selectors,
      [MarkupRole.NAVIGATION]: navigationSelector,
    },
  };
}
