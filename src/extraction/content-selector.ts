/**
 * Content windowing for the extraction prompt.
 *
 * Rendered product pages are mostly navigation, footers and recommendations.
 * The selector keeps a bounded window around the product/price region so the
 * prompt stays small. Pure and deterministic: same text and maxChars, same window.
 */

export const DEFAULT_MAX_CHARS = 20000;

/** Characters kept before the first accepted price */
export const PRICE_LOOKBEHIND = 3000;
/** Characters kept after the first accepted price */
export const PRICE_LOOKAHEAD = 15000;
/** Price windows at or below this length sit too close to an edge of the document */
export const MIN_PRICE_WINDOW = 5000;
/** Characters kept before the first top-level heading */
export const HEADING_LOOKBEHIND = 1000;

const PRICE_PATTERN = /[$€£¥]\s*\d+(?:[.,]\d{2})?/g;
const HEADING_PATTERN = /^#{1,2}\s+[A-Z].*$/m;

function priceWindow(text: string): string | null {
  for (const match of text.matchAll(PRICE_PATTERN)) {
    const pos = match.index ?? 0;
    const start = Math.max(0, pos - PRICE_LOOKBEHIND);
    const end = Math.min(text.length, pos + PRICE_LOOKAHEAD);

    if (end - start > MIN_PRICE_WINDOW) {
      return text.slice(start, end);
    }
  }
  return null;
}

function bodyWindow(text: string, maxChars: number): string {
  const skip = Math.floor(text.length / 5);
  return text.slice(skip, skip + maxChars);
}

function headingWindow(text: string, maxChars: number): string | null {
  const match = HEADING_PATTERN.exec(text);
  if (!match) return null;

  const start = Math.max(0, match.index - HEADING_LOOKBEHIND);
  return text.slice(start, start + maxChars);
}

/**
 * Narrow full page text to the window sent to the model.
 *
 * 1. First currency amount with a window longer than MIN_PRICE_WINDOW.
 * 2. First `#`/`##` heading starting with a capital letter.
 * 3. Skip the first fifth of the page (navigation) and take maxChars.
 */
export function selectContent(fullText: string, maxChars: number = DEFAULT_MAX_CHARS): string {
  return (
    priceWindow(fullText) ??
    headingWindow(fullText, maxChars) ??
    bodyWindow(fullText, maxChars)
  );
}
