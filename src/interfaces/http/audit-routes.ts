import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getUpdate,
  listEvents,
  listEventsQuerySchema,
  listUpdateEvents,
  listUpdates,
  listUpdatesQuerySchema,
  updateIdSchema,
  verifyLedger,
} from '../../application/index.js';

/**
 * Read-only audit routes.
 *
 * GET /api/v1/updates                 paginated records, newest first
 * GET /api/v1/updates/:id             single record
 * GET /api/v1/updates/:id/events      a record's history and its projection
 * GET /api/v1/events                  the whole log in append order
 * GET /api/v1/verify                  compare every record with its history
 * GET /api/v1/health                  ledger reachability
 */
async function auditRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/updates ──────────────────────────────────
  fastify.get(
    '/api/v1/updates',
    async (
      request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>,
      reply: FastifyReply,
    ) => {
      const parsed = listUpdatesQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = await listUpdates(fastify.ledger, parsed.data);
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/updates/:id ──────────────────────────────
  fastify.get(
    '/api/v1/updates/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = updateIdSchema.safeParse(request.params.id);
      if (!id.success) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const record = await getUpdate(fastify.ledger, id.data);
      return reply.status(200).send(record);
    },
  );

  // ── GET /api/v1/updates/:id/events ───────────────────────
  fastify.get(
    '/api/v1/updates/:id/events',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const id = updateIdSchema.safeParse(request.params.id);
      if (!id.success) {
        return reply.status(400).send({ error: 'id must be a positive integer' });
      }

      const result = await listUpdateEvents(fastify.ledger, id.data);
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/events ───────────────────────────────────
  fastify.get(
    '/api/v1/events',
    async (
      request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>,
      reply: FastifyReply,
    ) => {
      const parsed = listEventsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = await listEvents(fastify.ledger, parsed.data);
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/verify ───────────────────────────────────
  fastify.get(
    '/api/v1/verify',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const report = await verifyLedger(fastify.ledger);
      return reply.status(200).send(report);
    },
  );

  // ── GET /api/v1/health ───────────────────────────────────
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        await fastify.pingLedger();
        return reply.status(200).send({ status: 'ok' });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Ledger health check failed');
        return reply.status(503).send({ status: 'degraded', ledger: 'unreachable' });
      }
    },
  );
}

export default fp(auditRoutes, {
  name: 'audit-routes',
  dependencies: ['ledger'],
  fastify: '5.x',
});
