import { describe, it, expect } from 'vitest';
import { findSelectedColorway, htmlToText } from './page-content.js';

const SWATCHES = ['button[data-testid^="swatch-"]', '.product-swatch'];

describe('htmlToText', () => {
  it('should keep headings and list items as markdown and drop hidden content', () => {
    const html =
      '<html><head><title>Shop</title><style>.a{}</style></head><body>' +
      '<nav><a href="/">Home</a></nav>' +
      '<h1>Essential Hoodie</h1>' +
      '<p>Was <span>$70.00</span>, now $56.00</p>' +
      '<ul><li>S</li><li>M</li></ul>' +
      '<script>var tracking = 1;</script>' +
      '</body></html>';

    expect(htmlToText(html)).toBe(
      'Home\n\n# Essential Hoodie\nWas $70.00, now $56.00\n- S\n- M'
    );
  });

  it('should turn line breaks into newlines', () => {
    expect(htmlToText('<p>Line one<br>Line two</p>')).toBe('Line one\nLine two');
  });

  it('should collapse runs of whitespace', () => {
    expect(htmlToText('<p>  Price:\t\t $20.00  </p>')).toBe('Price: $20.00');
  });

  it('should prefix second-level headings with two hashes', () => {
    expect(htmlToText('<h2>Details</h2>')).toBe('## Details');
  });
});

describe('findSelectedColorway', () => {
  it('should read the label of the pressed swatch', () => {
    const html =
      '<div>' +
      '<button data-testid="swatch-1" aria-label="Select color Sage" aria-pressed="false"></button>' +
      '<button data-testid="swatch-2" aria-label="Select color Navy" aria-pressed="true"></button>' +
      '</div>';

    expect(findSelectedColorway(html, SWATCHES)).toBe('Navy');
  });

  it('should accept a selected class and fall back to the title', () => {
    const html = '<span class="product-swatch selected" title="Heather Grey"></span>';

    expect(findSelectedColorway(html, SWATCHES)).toBe('Heather Grey');
  });

  it('should return null when no swatch is selected', () => {
    const html = '<span class="product-swatch" title="Heather Grey"></span>';

    expect(findSelectedColorway(html, SWATCHES)).toBeNull();
  });

  it('should return null without selectors', () => {
    expect(findSelectedColorway('<span class="selected">Red</span>', [])).toBeNull();
  });
});
