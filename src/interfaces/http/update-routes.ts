import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { applyUpdateSchema, updateIdSchema } from '../../application/index.js';

/**
 * Lifecycle routes.
 *
 * POST /api/v1/updates                apply an update
 * POST /api/v1/updates/:id/rollback   roll an update back
 * POST /api/v1/recovery               repair records left pending by a crash
 */
async function updateRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/updates ─────────────────────────────────
  fastify.post(
    '/api/v1/updates',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = applyUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await fastify.machine.apply(parsed.data.name, parsed.data.version ?? null);

      if (result.outcome === 'applied') {
        return reply.status(201).send({
          outcome: result.outcome,
          record: result.record,
          events: result.events,
        });
      }

      // The attempt itself was recorded; the failure is the Applier's.
      return reply.status(200).send({
        outcome: result.outcome,
        record: result.record,
        events: result.events,
        error: result.error.message,
      });
    },
  );

  // ── POST /api/v1/updates/:id/rollback ────────────────────
  fastify.post(
    '/api/v1/updates/:id/rollback',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = updateIdSchema.safeParse(request.params.id);
      if (!id.success) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const result = await fastify.machine.rollback(id.data);

      return reply.status(200).send({
        record: result.record,
        inverse: result.inverse.ok
          ? { ok: true }
          : { ok: false, error: result.inverse.error.message },
        events: result.events,
      });
    },
  );

  // ── POST /api/v1/recovery ────────────────────────────────
  fastify.post(
    '/api/v1/recovery',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const report = await fastify.recover();
      return reply.status(200).send(report);
    },
  );
}

export default fp(updateRoutes, {
  name: 'update-routes',
  dependencies: ['ledger'],
  fastify: '5.x',
});
