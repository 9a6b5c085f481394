/**
 * Header labels of the procurement report.
 *
 * The source reports are exported with Russian column headers; the keys here are the
 * semantic names used throughout the code.
 */
export type ReportLayout = {
  materialId: string;
  requestedQty: string;
  receivedQty: string;
  /** Appended to the output, never expected in the input. */
  discrepancy: string;
};

export const DEFAULT_REPORT_LAYOUT: ReportLayout = {
  materialId: 'ID Материала',
  requestedQty: 'Кол-во по заявке',
  receivedQty: 'Поступило всего',
  discrepancy: 'Расхождение заявка-приход',
};

export function requiredColumns(layout: ReportLayout): string[] {
  return [layout.materialId, layout.requestedQty, layout.receivedQty];
}

export const REPORT_FILE_EXTENSION = '.xlsx';
export const REPORT_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
