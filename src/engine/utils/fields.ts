/**
 * Tolerant field extraction for form-shaped records.
 *
 * Intake values arrive as strings from HTML forms or as numbers from JSON.
 * Missing, blank or non-numeric values read as 0 (numbers) or '' (text).
 */

/** Any record-like value: a raw form mapping or an already-typed intake. */
export type FieldSource = object;

function readField(source: FieldSource, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

/** Coerce a raw value to a finite number; anything else reads as 0. */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return 0;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/** Coerce a raw value to text; null/undefined read as ''. Whitespace is kept. */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

export function readNumber(source: FieldSource, key: string): number {
  return toNumber(readField(source, key));
}

/** Number of `keywords` found as case-insensitive substrings of `text`. */
export function countKeywordMatches(text: string, keywords: readonly string[]): number {
  const haystack = text.toLowerCase();
  return keywords.filter(kw => haystack.includes(kw)).length;
}

/**
 * Round to 2 decimal places. An exact half-cent tie (only possible when `n`
 * is an odd multiple of 1/8) goes to the even digit.
 */
export function round2(n: number): number {
  if (Number.isInteger(n * 8) && !Number.isInteger(n * 4)) {
    const floor = Math.floor(n * 100);
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return parseFloat(n.toFixed(2));
}
