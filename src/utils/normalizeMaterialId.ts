import type { CellValue } from '../services/report/types';

// Material IDs are typed or OCR'd by hand upstream; a capital "I" in them is always a misread "1".
export function normalizeMaterialId(value: CellValue): string | null {
  if (value === null) return null;
  const text = value instanceof Date ? value.toISOString() : String(value);
  return text.replace(/I/g, '1');
}
