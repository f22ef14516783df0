/**
 * Content Extractor Tests
 * Breadcrumb, title, citation and body heuristics
 */

import { leafHtml } from '../../../__tests__/helpers/fake-site';
import { StructuralParseError } from '../../scraping/errors';
import { ContentExtractor } from '../content-extractor';
import { MarkupDocument } from '../markup-document';
import { DEFAULT_SITE_LAYOUT } from '../site-layout';

const URL = 'https://regs.test/rule/';

function load(html: string): MarkupDocument {
  return MarkupDocument.load(html, URL, DEFAULT_SITE_LAYOUT);
}

describe('ContentExtractor', () => {
  const extractor = new ContentExtractor();

  describe('extractLeaf', () => {
    it('should extract every field of a regulation page', () => {
      const doc = load(
        leafHtml({
          title: 'Rule 2.1.4 Fees',
          body: ['(1) The fee is ten dollars.', '(2) Fees are not refundable.'],
          breadcrumb: ['Administrative Rules of Testland', 'Title 2', 'Chapter 1'],
          citation: 'Test Admin. R. 2.1.4',
        })
      );

      expect(extractor.extractLeaf(doc)).toEqual({
        breadcrumb: 'Administrative Rules of Testland›Title 2›Chapter 1',
        title: 'Rule 2.1.4 Fees',
        universalCitation: true,
        citation: 'Test Admin. R. 2.1.4',
        body: '(1) The fee is ten dollars.\n(2) Fees are not refundable.',
      });
    });

    it('should require a heading', () => {
      const html = leafHtml({ title: 'x', body: ['Text'] }).replace('<h1>x</h1>', '');
      expect(() => extractor.extractLeaf(load(html))).toThrow(new StructuralParseError(URL, 'h1'));
    });
  });

  describe('extractBreadcrumb', () => {
    it('should start at the first segment naming a code or rules', () => {
      const doc = load(
        leafHtml({ title: 't', body: [], breadcrumb: ['Code of Testland Rules', 'Agency 5'] })
      );
      expect(extractor.extractBreadcrumb(doc)).toBe('Code of Testland Rules›Agency 5');
    });

    it('should throw when the trail is missing', () => {
      expect(() => extractor.extractBreadcrumb(load('<h1>Rule</h1>'))).toThrow(StructuralParseError);
    });

    it('should throw when the separator is missing', () => {
      expect(() => extractor.extractBreadcrumb(load('<nav class="breadcrumbs">Code</nav>'))).toThrow(
        'Missing expected element "span.breadcrumb-sep" on https://regs.test/rule/'
      );
    });
  });

  describe('extractCitation', () => {
    it('should report no citation when the page has none', () => {
      expect(extractor.extractCitation(load('<p>Plain</p>'))).toEqual({ universalCitation: false, citation: null });
    });

    it('should keep the citation without the universal label', () => {
      const doc = load(leafHtml({ title: 't', body: [], citation: 'T.A.R. 1', universalCitation: false }));
      expect(extractor.extractCitation(doc)).toEqual({ universalCitation: false, citation: 'T.A.R. 1' });
    });
  });

  describe('extractBody', () => {
    it('should drop junk and collect continuation divs up to the disclaimer', () => {
      const doc = load(
        '<body>' +
          '<div id="main-content"><p>Rule text.</p><div class="promo">Sign Up for updates</div>' +
          '<div id="Notification-bar">Alert</div></div>' +
          '<div class="content-indent"><p>(a) First item.</p></div>' +
          '<span>between</span>' +
          '<div><p>Section 2 continues here.</p></div>' +
          '<div class="legal">Disclaimer: not legal advice.</div>' +
          '<div class="content-indent"><p>After the disclaimer.</p></div>' +
          '</body>'
      );

      expect(extractor.extractBody(doc)).toBe('Rule text.\n(a) First item.\nSection 2 continues here.');
    });

    it('should stop at a div that is neither continuation nor regulation text', () => {
      const doc = load(
        '<div id="main-content"><p>Body.</p></div><div class="related">More links</div>' +
          '<div class="content-indent"><p>Unreached.</p></div>'
      );
      expect(extractor.extractBody(doc)).toBe('Body.');
    });

    it('should admit unclassed divs by different markers for the body and the comparable text', () => {
      const html =
        '<div id="main-content"><p>Body.</p></div>' +
        '<div><p>Chapter 4 applies.</p></div>' +
        '<div><p>The State Treasurer shall publish rates.</p></div>';

      expect(extractor.extractBody(load(html))).toBe('Body.');
      expect(extractor.extractComparableText(load(html))).toBe('Body.\nChapter 4 applies.');
    });

    it('should collect treasury and taxpayer notes into the body', () => {
      const doc = load(
        '<div id="main-content"><p>Body.</p></div><div><p>Each taxpayer must file.</p></div>' +
          '<div><p>Chapter 4 applies.</p></div>'
      );
      expect(extractor.extractBody(doc)).toBe('Body.\nEach taxpayer must file.');
    });

    it('should strip page chrome and residue from the content', () => {
      const doc = load(
        '<header>Site header</header><div id="main-content"><h1>Heading</h1><p>Body.</p>' +
          '<script>track()</script></div><footer>Footer</footer>'
      );
      expect(extractor.extractBody(doc)).toBe('Body.');
    });

    it('should return an empty body without a content region', () => {
      expect(extractor.extractBody(load('<p>Nothing here</p>'))).toBe('');
    });
  });

  describe('extractComparableText', () => {
    it('should keep the unfiltered region text', () => {
      const doc = load('<div id="main-content"><p>Alpha</p><div>Sign Up</div></div>');
      expect(extractor.extractComparableText(doc)).toBe('Alpha\nSign Up');
    });

    it('should be null without a content region', () => {
      expect(extractor.extractComparableText(load('<p>x</p>'))).toBeNull();
    });
  });
});
