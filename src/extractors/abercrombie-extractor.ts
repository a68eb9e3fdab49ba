import { BaseExtractor, JSON_OUTPUT_CONTRACT } from './base-extractor.js';

/**
 * Abercrombie & Fitch product pages, e.g. /shop/us/p/essential-popover-hoodie-61791319
 */
export class AbercrombieExtractor extends BaseExtractor {
  readonly name = 'abercrombie';
  protected readonly productPattern = /abercrombie\.com\/shop\/[a-z]{2}\/p\//;

  buildPrompt(): string {
    return `Extract product information from this e-commerce product page.

Look for:
1. Product name/title (usually in headers or near the top)
2. Brand name (often in logo, header, navigation, or product details)
3. Category (from breadcrumbs, URL path, or product type - e.g., "Hoodies", "Jackets", "Shoes")
4. Prices - look for patterns like "Was $X, now $Y" or "$X" or "Price: $X"
   - "Was" price = listed_price (original price)
   - "now" price or current price = sale_price
   - If item is not on sale, listed_price and sale_price are the same
5. Color/colorway currently selected
6. Available sizes (look for size selectors, buttons, or lists)
- For brand: look for the company/brand name (not the product line)
- For category: be specific but general (e.g., "Hoodies" not "Men's Essential Hoodies")

${JSON_OUTPUT_CONTRACT}`;
  }

  colorwaySelectors(): string[] {
    return [
      'button[data-testid^="swatch-"]',
      '.product-swatch',
      '[class*="ColorSwatch"]',
      'button[aria-label*="color"]',
    ];
  }
}
