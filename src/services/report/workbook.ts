import * as XLSX from 'xlsx';
import { UnsupportedFormatError } from './errors';
import type { CellValue, ReportRow, ReportTable } from './types';

export const OUTPUT_SHEET_NAME = 'Sheet1';

// .xlsx files are zip packages
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

function isZipPackage(buffer: Buffer): boolean {
  return buffer.length >= ZIP_SIGNATURE.length && ZIP_SIGNATURE.every((byte, i) => buffer[i] === byte);
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

/**
 * Header labels as they will key each row: blank headers become "Unnamed: <index>",
 * repeated labels get ".1", ".2", ... skipping any suffix another header already uses,
 * so no column silently overwrites another.
 */
export function headerLabels(headerRow: readonly unknown[]): string[] {
  const taken = new Set<string>();
  const lastSuffix = new Map<string, number>();
  return headerRow.map((cell, index) => {
    const text = cell === null || cell === undefined ? '' : String(cell).trim();
    const base = text === '' ? `Unnamed: ${index}` : text;

    let suffix = lastSuffix.get(base) ?? 0;
    let label = base;
    while (taken.has(label)) {
      suffix += 1;
      label = `${base}.${suffix}`;
    }
    lastSuffix.set(base, suffix);
    taken.add(label);
    return label;
  });
}

function isBlankRow(cells: readonly unknown[]): boolean {
  return cells.every((cell) => cell === null || cell === undefined);
}

function readWorkbook(buffer: Buffer): XLSX.WorkBook {
  if (!isZipPackage(buffer)) {
    throw new UnsupportedFormatError('File is not a valid .xlsx workbook');
  }
  try {
    return XLSX.read(buffer, { type: 'buffer', cellDates: false });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UnsupportedFormatError(`File is not a valid .xlsx workbook: ${reason}`);
  }
}

/** Parses the first worksheet; its first row is the header. */
export function readReportTable(buffer: Buffer): ReportTable {
  const workbook = readWorkbook(buffer);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new UnsupportedFormatError('Workbook has no worksheets');
  }

  // Blank rows are kept here so that matrix index i maps to sheet row range.s.r + i.
  const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1');
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });

  const numbered = matrix
    .map((cells, i) => ({ cells, rowNumber: range.s.r + i + 1 }))
    .filter(({ cells }) => !isBlankRow(cells));

  const [header, ...data] = numbered;
  if (!header) {
    return { columns: [], rows: [], rowNumbers: [] };
  }

  const columns = headerLabels(header.cells);
  const rows = data.map(({ cells }) => {
    const row: ReportRow = {};
    columns.forEach((column, i) => {
      row[column] = toCellValue(cells[i]);
    });
    return row;
  });

  return { columns, rows, rowNumbers: data.map(({ rowNumber }) => rowNumber) };
}

/** Serializes a table into a single-sheet .xlsx workbook: header row then data, no index column. */
export function writeReportTable(table: ReportTable): Buffer {
  const aoa: CellValue[][] = [
    table.columns,
    ...table.rows.map((row) => table.columns.map((column) => row[column] ?? null)),
  ];

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(aoa), OUTPUT_SHEET_NAME);

  const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', compression: true });
  if (!Buffer.isBuffer(out)) {
    throw new Error('xlsx writer did not return a Buffer');
  }
  return out;
}
