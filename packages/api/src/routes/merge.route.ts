import type { FastifyInstance } from 'fastify';
import { MERGE_STRATEGIES, merge, serializeModel } from '@semdiff/core';
import type { MergeStrategy } from '@semdiff/core';
import { parseBodyModel } from './parse-body.js';

interface MergeBody {
  base: unknown;
  ours: unknown;
  theirs: unknown;
  strategy?: MergeStrategy;
}

const mergeBodySchema = {
  type: 'object',
  required: ['base', 'ours', 'theirs'],
  properties: {
    base: { type: 'object' },
    ours: { type: 'object' },
    theirs: { type: 'object' },
    strategy: { type: 'string', enum: MERGE_STRATEGIES },
  },
} as const;

export function registerMergeRoutes(app: FastifyInstance, defaultStrategy: MergeStrategy): void {
  // POST /merge: three-way merge of ours and theirs against base
  app.post<{ Body: MergeBody }>(
    '/merge',
    { schema: { body: mergeBodySchema } },
    async (request, reply) => {
      const base = parseBodyModel(request.body.base, 'base');
      const ours = parseBodyModel(request.body.ours, 'ours');
      const theirs = parseBodyModel(request.body.theirs, 'theirs');
      const strategy = request.body.strategy ?? defaultStrategy;

      const { merged, conflicts } = merge(base, ours, theirs, strategy);
      request.log.info(
        { ours: ours.name, theirs: theirs.name, strategy, conflicts: conflicts.length },
        'merge completed',
      );

      return reply.send({
        merged: serializeModel(merged),
        conflicts,
        conflicts_count: conflicts.length,
        new_version: merged.version,
      });
    },
  );
}
