import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { reportController } from '../controllers/reportController';
import { TaskIdParams, TaskStatusResponse, UploadReportResponse } from '../dtos/reportDtos';

export default async function reportRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // POST /reports/upload (multipart, field "file")
  app.post(
    '/upload',
    {
      schema: {
        response: {
          202: UploadReportResponse,
        },
      },
    },
    reportController.upload
  );

  // GET /reports/:taskId/status
  app.get(
    '/:taskId/status',
    {
      schema: {
        params: TaskIdParams,
        response: {
          200: TaskStatusResponse,
        },
      },
    },
    reportController.getStatus
  );

  // GET /reports/:taskId/result
  app.get(
    '/:taskId/result',
    {
      schema: {
        params: TaskIdParams,
      },
    },
    reportController.getResult
  );
}
