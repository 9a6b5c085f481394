import { FastifyReply, FastifyRequest } from 'fastify';
import { REPORT_MIME_TYPE } from '../config/reportLayout';
import type { TaskIdParamsType, TaskStatusResponseType } from '../dtos/reportDtos';
import { MissingUploadError, UnsupportedFormatError } from '../services/report';
import { reportProcessingService } from '../services/ReportProcessingService';

// Domain errors carry `code` and `statusCode`; the global error handler renders them.
export const reportController = {
  async upload(req: FastifyRequest, reply: FastifyReply) {
    const data = await req.file();
    if (!data) {
      throw new MissingUploadError();
    }

    req.log.info({
      msg: 'Incoming report upload',
      fileName: data.filename,
      mimeType: data.mimetype,
    });

    // Throws a 413 once the multipart fileSize limit is exceeded
    const content = await data.toBuffer();

    try {
      const result = await reportProcessingService.submitForProcessing({ fileName: data.filename, content });
      reply.status(202);
      return result;
    } catch (e) {
      if (e instanceof UnsupportedFormatError) {
        req.log.warn({ msg: 'Rejected report upload', fileName: data.filename, reason: e.message });
      }
      throw e;
    }
  },

  async getStatus(req: FastifyRequest<{ Params: TaskIdParamsType }>): Promise<TaskStatusResponseType> {
    return reportProcessingService.getStatus(req.params.taskId);
  },

  async getResult(req: FastifyRequest<{ Params: TaskIdParamsType }>, reply: FastifyReply) {
    const result = await reportProcessingService.getResult(req.params.taskId);
    return reply
      .header('Content-Disposition', `attachment; filename="${result.fileName}"`)
      .type(REPORT_MIME_TYPE)
      .send(result.content);
  },
};
