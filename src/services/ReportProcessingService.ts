import { randomUUID } from 'crypto';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { config } from '../config/env';
import { DEFAULT_REPORT_LAYOUT, REPORT_FILE_EXTENSION, type ReportLayout } from '../config/reportLayout';
import { cleanupExpiredArtifacts } from '../utils/cleanup';
import {
  ReportProcessingError,
  UnsupportedFormatError,
  readReportTable,
  runDiscrepancyPipeline,
  writeReportTable,
} from './report';
import { TaskRegistry, type TaskStatus } from './TaskRegistry';

export class TaskNotFoundError extends Error {
  readonly code = 'TASK_NOT_FOUND';
  readonly statusCode = 404;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskNotReadyError extends Error {
  readonly code = 'TASK_NOT_READY';
  readonly statusCode = 404;

  constructor(taskId: string, status: TaskStatus) {
    super(
      status === 'failed'
        ? `Task ${taskId} failed; no result is available`
        : `Task ${taskId} has not finished yet`
    );
    this.name = 'TaskNotReadyError';
  }
}

export class ResultNotFoundError extends Error {
  readonly code = 'RESULT_NOT_FOUND';
  readonly statusCode = 404;

  constructor(taskId: string) {
    super(`Result for task ${taskId} not found`);
    this.name = 'ResultNotFoundError';
  }
}

export type ReportUpload = {
  fileName: string;
  content: Buffer;
};

export type TaskStatusView = {
  taskId: string;
  status: TaskStatus;
  error: string | null;
};

export type ReportResult = {
  fileName: string;
  content: Buffer;
};

export type ReportProcessingOptions = {
  tempDir: string;
  retentionMs: number;
  layout?: ReportLayout;
  registry?: TaskRegistry;
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function hasReportExtension(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === REPORT_FILE_EXTENSION;
}

export class ReportProcessingService {
  readonly registry: TaskRegistry;
  private readonly tempDir: string;
  private readonly retentionMs: number;
  private readonly layout: ReportLayout;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(opts: ReportProcessingOptions) {
    this.tempDir = opts.tempDir;
    this.retentionMs = opts.retentionMs;
    this.layout = opts.layout ?? DEFAULT_REPORT_LAYOUT;
    this.registry = opts.registry ?? new TaskRegistry();
  }

  inputPath(taskId: string): string {
    return path.join(this.tempDir, `${taskId}_input${REPORT_FILE_EXTENSION}`);
  }

  outputPath(taskId: string): string {
    return path.join(this.tempDir, `${taskId}_output${REPORT_FILE_EXTENSION}`);
  }

  /**
   * Accepts an uploaded report, registers a pending task and starts the run in the background.
   * Files that are not readable .xlsx workbooks are rejected here and never reach the pipeline.
   */
  async submitForProcessing(upload: ReportUpload): Promise<{ taskId: string }> {
    if (!hasReportExtension(upload.fileName)) {
      throw new UnsupportedFormatError(`A file with the ${REPORT_FILE_EXTENSION} extension is required`);
    }
    readReportTable(upload.content);

    const taskId = randomUUID();
    const inputPath = this.inputPath(taskId);
    const outputPath = this.outputPath(taskId);

    await mkdir(this.tempDir, { recursive: true });
    await writeFile(inputPath, upload.content);

    this.registry.register({ taskId, fileName: upload.fileName, outputPath });

    const run = this.runTask(taskId, inputPath, outputPath)
      .catch((err) => {
        console.error(`[ReportPipeline] task=${taskId} bookkeeping failed`, err);
      })
      .finally(() => {
        this.inFlight.delete(taskId);
      });
    this.inFlight.set(taskId, run);

    console.log(`[ReportPipeline] task=${taskId} submitted file="${upload.fileName}" bytes=${upload.content.length}`);
    return { taskId };
  }

  getStatus(taskId: string): TaskStatusView {
    const task = this.registry.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return { taskId: task.taskId, status: task.status, error: task.error };
  }

  async getResult(taskId: string): Promise<ReportResult> {
    const task = this.registry.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (task.status !== 'success') {
      throw new TaskNotReadyError(taskId, task.status);
    }

    try {
      const content = await readFile(task.outputPath);
      return { fileName: `result_${taskId}${REPORT_FILE_EXTENSION}`, content };
    } catch (err) {
      if (isNotFound(err)) {
        throw new ResultNotFoundError(taskId);
      }
      throw err;
    }
  }

  /** Resolves once every run started so far has settled. */
  async waitForIdle(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  /** Removes temp files older than the retention window and forgets tasks that finished before it. */
  async sweepExpiredArtifacts(now: number = Date.now()): Promise<{ removedFiles: string[]; prunedTasks: string[] }> {
    const removedFiles = await cleanupExpiredArtifacts({ dir: this.tempDir, maxAgeMs: this.retentionMs, now });
    const prunedTasks = this.registry.pruneFinishedBefore(new Date(now - this.retentionMs));
    return { removedFiles, prunedTasks };
  }

  private async runTask(taskId: string, inputPath: string, outputPath: string): Promise<void> {
    const start = Date.now();
    try {
      const table = readReportTable(await readFile(inputPath));
      const result = runDiscrepancyPipeline(table, this.layout);
      await this.writeOutput(outputPath, writeReportTable(result));

      this.registry.markSucceeded(taskId);
      console.log(
        `[ReportPipeline] task=${taskId} status=success rowsIn=${table.rows.length} rowsOut=${result.rows.length} durationMs=${Date.now() - start}`
      );
    } catch (err) {
      const failure = new ReportProcessingError(err);
      this.registry.markFailed(taskId, failure.message);
      console.warn(`[ReportPipeline] task=${taskId} status=failed durationMs=${Date.now() - start} reason="${failure.message}"`);
    } finally {
      await rm(inputPath, { force: true }).catch((err) => {
        console.error(`[ReportPipeline] task=${taskId} failed to remove input ${inputPath}`, err);
      });
    }
  }

  // A run that fails mid-write must not leave a partial result behind.
  private async writeOutput(outputPath: string, content: Buffer): Promise<void> {
    try {
      await writeFile(outputPath, content);
    } catch (err) {
      await rm(outputPath, { force: true });
      throw err;
    }
  }
}

export const reportProcessingService = new ReportProcessingService({
  tempDir: config.REPORTS_TEMP_DIR,
  retentionMs: config.RESULT_RETENTION_SECONDS * 1000,
});
