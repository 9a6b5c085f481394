import { DEFAULT_REPORT_LAYOUT, type ReportLayout, requiredColumns } from '../../config/reportLayout';
import { normalizeMaterialId } from '../../utils/normalizeMaterialId';
import { normalizeQuantity, toNumericOrNaN } from '../../utils/quantityParsing';
import { InvalidNumericDataError } from './errors';
import { validateReportSchema } from './schema';
import type { InvalidNumericCell, ReportRow, ReportTable } from './types';

// Tables built in memory have no sheet positions: header on row 1, data from row 2.
const FIRST_DATA_ROW = 2;

type CoercedRow = {
  rowNumber: number;
  source: ReportRow;
  row: ReportRow;
  requested: number;
  received: number;
};

function coerceRows(table: ReportTable, layout: ReportLayout): CoercedRow[] {
  return table.rows.map((source, index) => {
    const requested = toNumericOrNaN(normalizeQuantity(source[layout.requestedQty]));
    const received = toNumericOrNaN(normalizeQuantity(source[layout.receivedQty]));

    const row: ReportRow = {
      ...source,
      [layout.materialId]: normalizeMaterialId(source[layout.materialId] ?? null),
      [layout.requestedQty]: requested,
      [layout.receivedQty]: received,
    };
    const rowNumber = table.rowNumbers?.[index] ?? index + FIRST_DATA_ROW;
    return { rowNumber, source, row, requested, received };
  });
}

function collectInvalidCells(coerced: CoercedRow[], layout: ReportLayout): InvalidNumericCell[] {
  const invalid: InvalidNumericCell[] = [];
  for (const entry of coerced) {
    const checks: Array<[string, number]> = [
      [layout.requestedQty, entry.requested],
      [layout.receivedQty, entry.received],
    ];
    for (const [column, value] of checks) {
      if (Number.isNaN(value)) {
        invalid.push({ row: entry.rowNumber, column, value: entry.source[column] ?? null });
      }
    }
  }
  return invalid;
}

/**
 * Runs the discrepancy report over a parsed table.
 *
 * Order matters: schema check, material ID correction and quantity normalization, then a
 * table-wide integrity gate (one unparseable quantity rejects the whole report), then the
 * `requested > received` filter, and only then the discrepancy column is appended.
 *
 * The input table is not modified. An empty result is a valid outcome.
 */
export function runDiscrepancyPipeline(table: ReportTable, layout: ReportLayout = DEFAULT_REPORT_LAYOUT): ReportTable {
  validateReportSchema(table, requiredColumns(layout));

  const coerced = coerceRows(table, layout);

  const invalidCells = collectInvalidCells(coerced, layout);
  if (invalidCells.length > 0) {
    throw new InvalidNumericDataError(invalidCells);
  }

  const rows = coerced
    .filter((entry) => entry.requested > entry.received)
    .map((entry) => ({ ...entry.row, [layout.discrepancy]: entry.requested - entry.received }));

  const columns = table.columns.includes(layout.discrepancy)
    ? [...table.columns]
    : [...table.columns, layout.discrepancy];

  return { columns, rows };
}
