import type { NormalizedFields, RawFields } from '../types/index.js';
import { MalformedResponseError } from '../utils/errors.js';

const LEADING_FENCE = /^\s*```(?:json)?\s*/i;
const TRAILING_FENCE = /\s*```\s*$/;
const CURRENCY_NOISE = /[$€£¥,\s]/g;
const DECIMAL = /^\d+(?:\.\d+)?$|^\.\d+$/;

function isRecord(value: unknown): value is RawFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): RawFields | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Remove markdown code fences the model sometimes wraps around its JSON
 */
export function stripCodeFences(text: string): string {
  return text.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/**
 * Recover a JSON object from raw model output.
 * Tries the fence-stripped text first, then the span from the first `{` to the last `}`.
 */
export function parseRawFields(rawResponse: string): RawFields {
  const cleaned = stripCodeFences(rawResponse);

  const direct = tryParseObject(cleaned);
  if (direct) return direct;

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const embedded = tryParseObject(cleaned.slice(start, end + 1));
    if (embedded) return embedded;
  }

  throw new MalformedResponseError(
    `Could not parse LLM response as JSON: ${rawResponse.slice(0, 200)}`
  );
}

/**
 * Parse a price string such as "$1,299.00" or "€ 12,345.00".
 * Returns null for anything that is not a plain decimal once symbols are removed.
 */
export function parsePrice(value: string): number | null {
  const cleaned = value.replace(CURRENCY_NOISE, '');
  if (!DECIMAL.test(cleaned)) return null;

  const price = Number(cleaned);
  return Number.isFinite(price) ? price : null;
}

function toPrice(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string') {
    return parsePrice(value);
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Coerce sizes to a deduplicated, order-preserving list of labels.
 * A single truthy value becomes a one-element list; anything falsy becomes [].
 */
export function toSizeList(value: unknown): string[] {
  if (!value) return [];

  const entries = Array.isArray(value) ? value : [value];
  const sizes: string[] = [];

  for (const entry of entries) {
    const label = toText(entry);
    if (label !== null && !sizes.includes(label)) {
      sizes.push(label);
    }
  }

  return sizes;
}

/**
 * Shared field coercion. Invalid prices become null without failing the record.
 */
export function normalizeFields(raw: RawFields): NormalizedFields {
  return {
    name: toText(raw.name),
    brand: toText(raw.brand),
    category: toText(raw.category),
    listedPrice: toPrice(raw.listed_price),
    salePrice: toPrice(raw.sale_price),
    colorwayName: toText(raw.colorway_name),
    sizesAvailable: toSizeList(raw.sizes_available),
  };
}

/**
 * Raw model text to normalized fields. Throws MalformedResponseError when no
 * JSON object can be recovered.
 */
export function parseResponse(rawResponse: string): NormalizedFields {
  return normalizeFields(parseRawFields(rawResponse));
}
