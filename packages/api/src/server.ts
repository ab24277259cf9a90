import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { InsufficientInputError, ModelLoadError, ValidationError } from '@semdiff/core';
import type { AppConfig } from './config.js';
import { registerHealthRoutes } from './routes/health.route.js';
import { registerDiffRoutes } from './routes/diff.route.js';
import { registerMergeRoutes } from './routes/merge.route.js';
import { registerAnalysisRoutes } from './routes/analysis.route.js';

export interface ServerDeps {
  config: AppConfig;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const { config } = deps;
  const app = Fastify({
    logger: { level: config.server.log_level },
    bodyLimit: config.limits.body_limit_bytes,
    genReqId: () => randomUUID(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request, reply) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
    reply.header('x-correlation-id', correlationId);
  });

  registerHealthRoutes(app);
  registerDiffRoutes(app);
  registerMergeRoutes(app, config.merge.default_strategy);
  registerAnalysisRoutes(app, config.analysis.similarity_threshold);

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: error.message,
        field: error.field,
      });
    }

    if (error instanceof InsufficientInputError) {
      return reply.status(422).send({
        error: 'Insufficient Input',
        message: error.message,
        required: error.required,
        received: error.received,
      });
    }

    if (error instanceof ModelLoadError) {
      return reply.status(400).send({
        error: 'Model Load Error',
        message: error.message,
      });
    }

    // Request schema failures from fastify's own validator
    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: error.message,
      });
    }

    // Malformed JSON, oversized bodies and other client errors raised by fastify
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: 'Bad Request',
        message: error.message,
      });
    }

    request.log.error(error);
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
