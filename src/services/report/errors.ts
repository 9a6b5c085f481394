import type { InvalidNumericCell } from './types';

/**
 * Base class for everything that makes an uploaded report unusable.
 * `code` is surfaced to API clients, `statusCode` is used when the error reaches the HTTP layer.
 */
export class ReportError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 422, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReportError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class EmptyInputError extends ReportError {
  constructor() {
    super('Report contains no data rows', 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class MissingColumnsError extends ReportError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(`Missing required columns: ${missingColumns.join(', ')}`, 'MISSING_COLUMNS');
    this.name = 'MissingColumnsError';
    this.missingColumns = missingColumns;
  }
}

export class InvalidNumericDataError extends ReportError {
  readonly invalidCells: InvalidNumericCell[];

  constructor(invalidCells: InvalidNumericCell[]) {
    const first = invalidCells[0];
    const where = first ? ` (first at row ${first.row}, column "${first.column}")` : '';
    super(
      `Numeric columns contain invalid data: ${invalidCells.length} cell(s)${where}`,
      'INVALID_NUMERIC_DATA'
    );
    this.name = 'InvalidNumericDataError';
    this.invalidCells = invalidCells;
  }
}

export class UnsupportedFormatError extends ReportError {
  constructor(message = 'An .xlsx file is required') {
    super(message, 'UNSUPPORTED_FORMAT', 400);
    this.name = 'UnsupportedFormatError';
  }
}

/** Wraps the first specific cause that aborted a run. */
export class ReportProcessingError extends ReportError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Report processing failed: ${reason}`, 'PROCESSING_FAILED', 422, { cause });
    this.name = 'ReportProcessingError';
  }
}

export class MissingUploadError extends ReportError {
  constructor() {
    super('No file uploaded', 'NO_FILE', 400);
    this.name = 'MissingUploadError';
  }
}
