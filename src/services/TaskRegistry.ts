export type TaskStatus = 'pending' | 'success' | 'failed';

export type TaskRecord = {
  taskId: string;
  status: TaskStatus;
  error: string | null;
  fileName: string;
  outputPath: string;
  createdAt: Date;
  finishedAt: Date | null;
};

export class TaskAlreadyRegisteredError extends Error {
  constructor(taskId: string) {
    super(`Task ${taskId} is already registered`);
    this.name = 'TaskAlreadyRegisteredError';
  }
}

export class TaskStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskStateError';
  }
}

/**
 * Process-wide handle -> status map.
 *
 * Each task has exactly one writer: the run that owns it moves it out of `pending` once,
 * and pollers only ever read copies. Handles are independent, so no cross-task ordering exists.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();

  register(input: { taskId: string; fileName: string; outputPath: string }): TaskRecord {
    if (this.tasks.has(input.taskId)) {
      throw new TaskAlreadyRegisteredError(input.taskId);
    }
    const record: TaskRecord = {
      ...input,
      status: 'pending',
      error: null,
      createdAt: new Date(),
      finishedAt: null,
    };
    this.tasks.set(input.taskId, record);
    return { ...record };
  }

  get(taskId: string): TaskRecord | undefined {
    const record = this.tasks.get(taskId);
    return record ? { ...record } : undefined;
  }

  markSucceeded(taskId: string): TaskRecord {
    return this.finish(taskId, 'success', null);
  }

  markFailed(taskId: string, error: string): TaskRecord {
    return this.finish(taskId, 'failed', error);
  }

  /** Drops finished tasks whose completion predates `cutoff`; pending tasks are never pruned. */
  pruneFinishedBefore(cutoff: Date): string[] {
    const pruned: string[] = [];
    for (const [taskId, record] of this.tasks) {
      if (record.finishedAt && record.finishedAt < cutoff) {
        this.tasks.delete(taskId);
        pruned.push(taskId);
      }
    }
    return pruned;
  }

  get size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
  }

  private finish(taskId: string, status: Exclude<TaskStatus, 'pending'>, error: string | null): TaskRecord {
    const record = this.tasks.get(taskId);
    if (!record) {
      throw new TaskStateError(`Task ${taskId} is not registered`);
    }
    if (record.status !== 'pending') {
      throw new TaskStateError(`Task ${taskId} already finished with status ${record.status}`);
    }
    const next: TaskRecord = { ...record, status, error, finishedAt: new Date() };
    this.tasks.set(taskId, next);
    return { ...next };
  }
}
