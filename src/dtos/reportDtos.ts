import z from 'zod';

export const TaskIdParams = z.object({
  taskId: z.string().uuid(),
});

export type TaskIdParamsType = z.infer<typeof TaskIdParams>;

export const UploadReportResponse = z.object({
  taskId: z.string().uuid(),
});

export const TaskStatusResponse = z.object({
  taskId: z.string().uuid(),
  status: z.enum(['pending', 'success', 'failed']),
  error: z.string().nullable(),
});

export type TaskStatusResponseType = z.infer<typeof TaskStatusResponse>;
