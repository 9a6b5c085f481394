import type { CellValue } from '../services/report/types';

export type QuantityCell = CellValue | undefined;

export type CanonicalQuantity =
  | { kind: 'number'; value: number }
  | { kind: 'missing' }
  | { kind: 'unparsed'; raw: Exclude<CellValue, null> };

/**
 * Unit-of-measure markers stripped from quantity cells, in removal order.
 * Cyrillic spellings first (as exported by the source system), then their Latin look-alikes.
 */
export const QUANTITY_UNIT_TOKENS: readonly string[] = [
  'М3', 'КГ', 'Т', 'шт', 'кг', 'т', 'м3',
  'M3', 'KG', 'T', 'pcs', 'kg', 't', 'm3',
];

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function stripQuantityUnits(text: string): string {
  let value = text.replace(/,/g, '.');
  for (const unit of QUANTITY_UNIT_TOKENS) {
    // Substring removal: "80М3" and "80 М3" both lose the unit.
    value = value.replaceAll(unit, '').trim();
  }
  return value;
}

export function parseDecimal(text: string): number | null {
  if (!DECIMAL_RE.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/**
 * normalizeQuantity
 *
 * - Missing cells stay missing.
 * - Decimal commas become dots and unit markers are removed before parsing.
 * - Text that still does not parse is returned as-is (`unparsed`) so the table-wide
 *   integrity check can reject it later.
 */
export function normalizeQuantity(input: QuantityCell): CanonicalQuantity {
  if (input === null || input === undefined) return { kind: 'missing' };

  if (typeof input === 'number') {
    if (Number.isNaN(input)) return { kind: 'missing' };
    return Number.isFinite(input) ? { kind: 'number', value: input } : { kind: 'unparsed', raw: input };
  }

  const text = input instanceof Date ? input.toISOString() : String(input);
  const n = parseDecimal(stripQuantityUnits(text));
  if (n === null) return { kind: 'unparsed', raw: input };
  return { kind: 'number', value: n };
}

/** Numeric view of a canonical quantity; anything but a parsed number becomes NaN. */
export function toNumericOrNaN(q: CanonicalQuantity): number {
  return q.kind === 'number' ? q.value : Number.NaN;
}
