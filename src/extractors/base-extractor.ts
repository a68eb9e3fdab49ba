import type { NormalizedFields, RawFields } from '../types/index.js';
import { normalizeFields, parseRawFields } from '../extraction/response-normalizer.js';

/**
 * Capability set of a site-specific extraction strategy.
 * The pipeline only talks to strategies through this interface.
 */
export interface ExtractionStrategy {
  readonly name: string;
  matches(url: string): boolean;
  buildPrompt(): string;
  parseResponse(rawResponse: string): RawFields;
  normalize(raw: RawFields): NormalizedFields;
  colorwaySelectors(): string[];
}

export const SYSTEM_INSTRUCTION =
  'You are a helpful assistant that extracts structured product information from ' +
  'e-commerce websites. Always respond with valid JSON only.';

/**
 * Output contract shared by every site prompt
 */
export const JSON_OUTPUT_CONTRACT = `Return ONLY a JSON object in this exact format:
{
    "name": "Product name as string",
    "brand": "Brand name as string",
    "category": "Category as string (e.g., Hoodies, Jackets, Shoes)",
    "listed_price": 70.00,
    "sale_price": 56.00,
    "colorway_name": "Color name as string or null",
    "sizes_available": ["XS", "S", "M", "L", "XL"]
}

Rules:
- Prices must be numbers (e.g., 56.00, not "$56" or "56")
- Only include sizes that are in stock (ignore "Sold Out" or unavailable sizes)
- If you cannot find a field, use null (except sizes_available which should be [])

JSON output:`;

/**
 * Base class for site extractors.
 *
 * Subclasses provide the URL pattern and site hints; response recovery and
 * field coercion are shared. Override normalize() to add site rules on top.
 */
export abstract class BaseExtractor implements ExtractionStrategy {
  abstract readonly name: string;

  /** Matched against the full URL, case-sensitive */
  protected abstract readonly productPattern: RegExp;

  matches(url: string): boolean {
    return this.productPattern.test(url);
  }

  abstract buildPrompt(): string;

  parseResponse(rawResponse: string): RawFields {
    return parseRawFields(rawResponse);
  }

  normalize(raw: RawFields): NormalizedFields {
    return normalizeFields(raw);
  }

  colorwaySelectors(): string[] {
    return [];
  }
}
