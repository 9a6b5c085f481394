import { existsSync } from 'fs';
import { mkdtemp, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULT_REPORT_LAYOUT } from '../../../src/config/reportLayout';
import { UnsupportedFormatError } from '../../../src/services/report/errors';
import { readReportTable, writeReportTable } from '../../../src/services/report/workbook';
import {
  ReportProcessingService,
  ResultNotFoundError,
  TaskNotFoundError,
  TaskNotReadyError,
} from '../../../src/services/ReportProcessingService';
import { procurementReport, sampleTable } from '../../fixtures/procurementReport';

const L = DEFAULT_REPORT_LAYOUT;
const RETENTION_MS = 60_000;

describe('ReportProcessingService', () => {
  let tempDir: string;
  let service: ReportProcessingService;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'report-service-'));
    service = new ReportProcessingService({ tempDir, retentionMs: RETENTION_MS });
  });

  afterEach(async () => {
    await service.waitForIdle();
    await rm(tempDir, { recursive: true, force: true });
  });

  function upload(content: Buffer, fileName = 'report.xlsx') {
    return service.submitForProcessing({ fileName, content });
  }

  it('processes an uploaded report in the background', async () => {
    const { taskId } = await upload(writeReportTable(procurementReport()));

    expect(service.getStatus(taskId)).toEqual({ taskId, status: 'pending', error: null });

    await service.waitForIdle();

    expect(service.getStatus(taskId)).toEqual({ taskId, status: 'success', error: null });
    expect(existsSync(service.inputPath(taskId))).toBe(false);
    expect(existsSync(service.outputPath(taskId))).toBe(true);

    const result = await service.getResult(taskId);
    expect(result.fileName).toBe(`result_${taskId}.xlsx`);

    const table = readReportTable(result.content);
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]?.[L.materialId]).toBe('727698');
    expect(table.rows[0]?.[L.discrepancy]).toBe(211);
  });

  it('produces an empty report when nothing is under-delivered', async () => {
    const { taskId } = await upload(writeReportTable(sampleTable([{ materialId: '1', requested: 1, received: 2 }])));
    await service.waitForIdle();

    const table = readReportTable((await service.getResult(taskId)).content);
    expect(table.rows).toEqual([]);
    expect(table.columns).toContain(L.discrepancy);
  });

  it('records a failed run and removes the input', async () => {
    const content = writeReportTable({ columns: [L.materialId], rows: [{ [L.materialId]: 'I1' }] });
    const { taskId } = await upload(content);
    await service.waitForIdle();

    expect(service.getStatus(taskId)).toEqual({
      taskId,
      status: 'failed',
      error: 'Report processing failed: Missing required columns: Кол-во по заявке, Поступило всего',
    });
    expect(existsSync(service.inputPath(taskId))).toBe(false);
    expect(existsSync(service.outputPath(taskId))).toBe(false);
    await expect(service.getResult(taskId)).rejects.toBeInstanceOf(TaskNotReadyError);
  });

  it('fails the run when a quantity cannot be parsed', async () => {
    const table = sampleTable([
      { materialId: '1', requested: '10 М3', received: 1 },
      { materialId: '2', requested: 'ten', received: 1 },
    ]);
    const { taskId } = await upload(writeReportTable(table));
    await service.waitForIdle();

    expect(service.getStatus(taskId).error).toBe(
      `Report processing failed: Numeric columns contain invalid data: 1 cell(s) (first at row 3, column "${L.requestedQty}")`
    );
    expect(existsSync(service.outputPath(taskId))).toBe(false);
  });

  it('fails the run for a report without data rows', async () => {
    const { taskId } = await upload(writeReportTable({ columns: [L.materialId, L.requestedQty, L.receivedQty], rows: [] }));
    await service.waitForIdle();

    expect(service.getStatus(taskId)).toMatchObject({
      status: 'failed',
      error: 'Report processing failed: Report contains no data rows',
    });
  });

  it('rejects files without the .xlsx extension before registering anything', async () => {
    await expect(upload(writeReportTable(procurementReport()), 'report.csv')).rejects.toBeInstanceOf(UnsupportedFormatError);

    expect(service.registry.size).toBe(0);
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('rejects .xlsx files that are not workbooks', async () => {
    await expect(upload(Buffer.from('This is not an XLSX file'))).rejects.toThrow('File is not a valid .xlsx workbook');

    expect(service.registry.size).toBe(0);
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('keeps concurrent runs isolated', async () => {
    const good = writeReportTable(procurementReport());
    const bad = writeReportTable(sampleTable([{ materialId: '1', requested: '?', received: 1 }]));

    const [a, b, c] = await Promise.all([upload(good), upload(bad), upload(good)]);
    await service.waitForIdle();

    expect(service.getStatus(a.taskId).status).toBe('success');
    expect(service.getStatus(b.taskId).status).toBe('failed');
    expect(service.getStatus(c.taskId).status).toBe('success');
    expect(service.activeRuns).toBe(0);
  });

  it('gives identical results for identical uploads', async () => {
    const content = writeReportTable(procurementReport());
    const first = await upload(content);
    const second = await upload(content);
    await service.waitForIdle();

    const a = readReportTable((await service.getResult(first.taskId)).content);
    const b = readReportTable((await service.getResult(second.taskId)).content);
    expect(b).toEqual(a);
  });

  it('throws TaskNotFoundError for unknown handles', async () => {
    expect(() => service.getStatus('missing')).toThrow(TaskNotFoundError);
    await expect(service.getResult('missing')).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  it('reports a purged result as not found', async () => {
    const { taskId } = await upload(writeReportTable(procurementReport()));
    await service.waitForIdle();
    await rm(service.outputPath(taskId));

    await expect(service.getResult(taskId)).rejects.toBeInstanceOf(ResultNotFoundError);
  });

  it('sweeps expired outputs and forgets their tasks', async () => {
    const { taskId } = await upload(writeReportTable(procurementReport()));
    await service.waitForIdle();

    const fresh = await service.sweepExpiredArtifacts();
    expect(fresh).toEqual({ removedFiles: [], prunedTasks: [] });

    const later = await service.sweepExpiredArtifacts(Date.now() + 2 * RETENTION_MS);
    expect(later).toEqual({ removedFiles: [`${taskId}_output.xlsx`], prunedTasks: [taskId] });
    expect(() => service.getStatus(taskId)).toThrow(TaskNotFoundError);
  });
});
