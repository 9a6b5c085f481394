import { DEFAULT_REPORT_LAYOUT, requiredColumns } from '../../../src/config/reportLayout';
import { EmptyInputError, MissingColumnsError } from '../../../src/services/report/errors';
import { findMissingColumns, validateReportSchema } from '../../../src/services/report/schema';
import { procurementReport } from '../../fixtures/procurementReport';
import { thrownBy } from '../../helpers';

const REQUIRED = requiredColumns(DEFAULT_REPORT_LAYOUT);

describe('validateReportSchema', () => {
  it('accepts a table with every required column', () => {
    expect(() => validateReportSchema(procurementReport(), REQUIRED)).not.toThrow();
  });

  it('rejects a table without rows', () => {
    const table = { columns: [...REQUIRED], rows: [] };
    expect(() => validateReportSchema(table, REQUIRED)).toThrow(EmptyInputError);
  });

  it('checks for rows before columns', () => {
    expect(() => validateReportSchema({ columns: [], rows: [] }, REQUIRED)).toThrow(EmptyInputError);
  });

  it('names every missing column, in required order', () => {
    const table = { columns: ['Other'], rows: [{ Other: 1 }] };
    const err = thrownBy(() => validateReportSchema(table, REQUIRED));

    expect(err).toBeInstanceOf(MissingColumnsError);
    if (!(err instanceof MissingColumnsError)) return;
    expect(err.missingColumns).toEqual(['ID Материала', 'Кол-во по заявке', 'Поступило всего']);
    expect(err.message).toBe('Missing required columns: ID Материала, Кол-во по заявке, Поступило всего');
    expect(err.code).toBe('MISSING_COLUMNS');
  });
});

describe('findMissingColumns', () => {
  it('returns only the absent names', () => {
    const table = { columns: ['ID Материала', 'Поступило всего'], rows: [] };
    expect(findMissingColumns(table, REQUIRED)).toEqual(['Кол-во по заявке']);
  });
});
