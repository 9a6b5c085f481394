export type CellValue = string | number | boolean | Date | null;

export type ReportRow = Record<string, CellValue>;

/**
 * In-memory form of one worksheet: the header labels in sheet order and the data rows
 * in sheet order, each keyed by header label.
 */
export type ReportTable = {
  columns: string[];
  rows: ReportRow[];
  /** 1-based sheet row of each entry in `rows`, present when the table was read from a workbook. */
  rowNumbers?: number[];
};

export type InvalidNumericCell = {
  /** 1-based spreadsheet row. */
  row: number;
  column: string;
  value: CellValue;
};
