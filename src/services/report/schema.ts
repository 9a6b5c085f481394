import { EmptyInputError, MissingColumnsError } from './errors';
import type { ReportTable } from './types';

export function findMissingColumns(table: ReportTable, requiredColumns: readonly string[]): string[] {
  const present = new Set(table.columns);
  return requiredColumns.filter((col) => !present.has(col));
}

/**
 * Throws on the first structural problem: no rows at all, then any absent required column.
 * Every missing column is reported, not just the first one.
 */
export function validateReportSchema(table: ReportTable, requiredColumns: readonly string[]): void {
  if (table.rows.length === 0) {
    throw new EmptyInputError();
  }

  const missing = findMissingColumns(table, requiredColumns);
  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }
}
