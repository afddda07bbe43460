import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../domain/index.js';
import type { ErrorRule } from '../../domain/index.js';
import {
  analyzeContent,
  analyzeRequestSchema,
  composeRules,
  deriveStatus,
  DmesgAnalyzer,
  dmesgAnalyzerArgsSchema,
  dmesgRequestSchema,
} from '../../application/index.js';
import type { DmesgAnalyzerArgs } from '../../application/index.js';

export interface AnalysisRoutesOptions {
  /** Configured dmesg defaults; request `args` are merged on top. */
  dmesgDefaults: DmesgAnalyzerArgs;
}

/**
 * Analysis routes.
 *
 * GET  /api/v1/health         — liveness
 * POST /api/v1/analyze        — run caller-supplied rules over content
 * POST /api/v1/analyze/dmesg  — run the dmesg analyzer over content
 */
async function analysisRoutes(fastify: FastifyInstance, opts: AnalysisRoutesOptions): Promise<void> {

  // ── GET /api/v1/health ───────────────────────────────────
  fastify.get('/api/v1/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // ── POST /api/v1/analyze ─────────────────────────────────
  fastify.post(
    '/api/v1/analyze',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = analyzeRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const body = parsed.data;
      let rules: ErrorRule[];
      try {
        rules = composeRules(body.rules, []);
      } catch (err: unknown) {
        if (err instanceof ValidationError) {
          return reply.status(400).send({ error: err.message, issues: err.issues });
        }
        throw err;
      }

      const events = analyzeContent(body.content, body.source, rules, {
        group: body.group,
        numTimestamps: body.num_timestamps,
        collapseIntervalSeconds: body.collapse_interval_seconds,
        log: request.log,
      });

      return reply.status(200).send({
        source: body.source,
        status: deriveStatus(events),
        count: events.length,
        events,
      });
    },
  );

  // ── POST /api/v1/analyze/dmesg ───────────────────────────
  fastify.post(
    '/api/v1/analyze/dmesg',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = dmesgRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const args = dmesgAnalyzerArgsSchema.safeParse({ ...opts.dmesgDefaults, ...parsed.data.args });
      if (!args.success) {
        return reply.status(400).send({
          error: 'Invalid dmesg analyzer args',
          issues: args.error.issues,
        });
      }

      const analyzer = new DmesgAnalyzer(request.log);
      const result = analyzer.analyze(parsed.data.content, args.data);

      request.log.debug(
        { status: result.status, eventCount: result.events.length },
        'Dmesg analysis finished',
      );

      return reply.status(200).send(result);
    },
  );
}

export default fp(analysisRoutes, {
  name: 'analysis-routes',
  fastify: '5.x',
});
