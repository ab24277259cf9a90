import type { FastifyInstance } from 'fastify';
import { diff, diffReportToJSON, hasChanges, renderChangelog, renderUnifiedDiff } from '@semdiff/core';
import { parseBodyModel } from './parse-body.js';

interface DiffBody {
  source: unknown;
  target: unknown;
}

const diffBodySchema = {
  type: 'object',
  required: ['source', 'target'],
  properties: {
    source: { type: 'object' },
    target: { type: 'object' },
  },
} as const;

export function registerDiffRoutes(app: FastifyInstance): void {
  // POST /diff: structural changes from source to target
  app.post<{ Body: DiffBody }>(
    '/diff',
    { schema: { body: diffBodySchema } },
    async (request, reply) => {
      const source = parseBodyModel(request.body.source, 'source');
      const target = parseBodyModel(request.body.target, 'target');

      const report = diff(source, target);
      request.log.info(
        {
          source: `${source.name}@${source.version}`,
          target: `${target.name}@${target.version}`,
          changes: report.summary.total_changes,
        },
        'diff computed',
      );

      return reply.send({
        has_changes: hasChanges(report),
        report: diffReportToJSON(report),
        changelog: renderChangelog(report),
        unified_diff: renderUnifiedDiff(report),
      });
    },
  );
}
