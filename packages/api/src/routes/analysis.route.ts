import type { FastifyInstance } from 'fastify';
import { analyze, renderDebtMarkdown } from '@semdiff/core';
import type { Model } from '@semdiff/core';
import { parseBodyModel } from './parse-body.js';

interface AnalyzeBody {
  models: Record<string, unknown>;
  similarity_threshold?: number;
}

const analyzeBodySchema = {
  type: 'object',
  required: ['models'],
  properties: {
    models: { type: 'object', additionalProperties: { type: 'object' } },
    similarity_threshold: { type: 'number', minimum: 0, maximum: 1 },
  },
} as const;

export function registerAnalysisRoutes(app: FastifyInstance, defaultThreshold: number): void {
  // POST /analyze: semantic debt across a named collection of models
  app.post<{ Body: AnalyzeBody }>(
    '/analyze',
    { schema: { body: analyzeBodySchema } },
    async (request, reply) => {
      const models: Record<string, Model> = {};
      for (const [name, doc] of Object.entries(request.body.models)) {
        models[name] = parseBodyModel(doc, `models/${name}`);
      }

      const report = analyze(models, {
        similarityThreshold: request.body.similarity_threshold ?? defaultThreshold,
      });
      request.log.info(
        {
          models: report.models_analyzed.length,
          conflicts: report.summary.total_conflicts,
          critical: report.summary.critical,
        },
        'semantic debt analyzed',
      );

      return reply.send({
        report,
        markdown: renderDebtMarkdown(report),
      });
    },
  );
}
