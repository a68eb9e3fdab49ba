/**
 * HTML to prompt text.
 * Keeps headings as markdown (`#`, `##`) and list items as `- ` so the content
 * selector can find the product title, and drops everything that is not visible text.
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

const HIDDEN = 'head, script, style, noscript, svg, template, iframe';
const BLOCKS =
  'p, div, section, article, header, footer, nav, main, aside, ul, ol, li, table, tr, form, fieldset, dl, dt, dd, h1, h2, h3, h4, h5, h6';

const COLORWAY_PREFIX = /^(?:select(?:ed)?\s+)?colou?r\s*:?\s*/i;

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);

  $(HIDDEN).remove();

  for (let level = 1; level <= 6; level++) {
    $(`h${level}`).prepend(`\n${'#'.repeat(level)} `);
  }
  $('li').prepend('- ');
  $('br').replaceWith('\n');
  $(BLOCKS).append('\n');

  const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();

  return root
    .text()
    .split('\n')
    .map(line => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Label of the selected colour swatch, if the page marks one as selected
 */
export function findSelectedColorway(html: string, selectors: string[]): string | null {
  if (selectors.length === 0) return null;

  const $ = cheerio.load(html);

  for (const selector of selectors) {
    for (const element of $(selector).toArray()) {
      const swatch = $(element);
      const selected =
        swatch.attr('aria-pressed') === 'true' ||
        swatch.attr('aria-checked') === 'true' ||
        swatch.attr('aria-selected') === 'true' ||
        swatch.hasClass('selected') ||
        swatch.hasClass('active');

      if (!selected) continue;

      const label = (
        swatch.attr('aria-label') ??
        swatch.attr('title') ??
        swatch.attr('data-color') ??
        swatch.text()
      )
        .replace(COLORWAY_PREFIX, '')
        .trim();

      if (label) return label;
    }
  }

  return null;
}
