import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import reportRoutes from './routes/reportRoutes';
import { config } from './config/env';

const MB = 1024 * 1024;

export function buildApp(): FastifyInstance {
  const app = Fastify({
    trustProxy: true,
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  // Rate Limiting (in-memory; clients poll status, so the window is generous)
  if (config.ENABLE_RATE_LIMIT === 'true') {
    app.register(rateLimit, {
      max: 300,
      timeWindow: '1 minute',
    });
  }

  // One report per request
  app.register(multipart, {
    limits: {
      fileSize: config.MAX_UPLOAD_SIZE_MB * MB,
      files: 1,
    },
  });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register CORS
  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
      exposedHeaders: ['Content-Disposition'],
    });
  } else {
    app.register(cors, {
      origin: config.FRONTEND_URL ? [config.FRONTEND_URL] : false,
      exposedHeaders: ['Content-Disposition'],
    });
  }

  app.register(reportRoutes, { prefix: '/reports' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode >= 500) {
      request.log.error(error);
      Sentry.withScope((scope) => {
        scope.setContext('request', {
          method: request.method,
          url: request.url,
        });
        scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ msg: 'Request failed', code: error.code, statusCode, message: error.message });
    }

    if (error.validation) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
        },
      });
    }

    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: statusCode >= 500 ? 'Something went wrong' : error.message,
      },
    });
  });

  return app;
}
