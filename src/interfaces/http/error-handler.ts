import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { isLedgerError } from '../../domain/index.js';
import type { LedgerErrorCode } from '../../domain/index.js';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  CONFLICT: 409,
  INVALID_TRANSITION: 409,
  NOT_FOUND: 404,
  STORAGE: 503,
  APPLIER: 502,
  PROJECTION: 500,
};

export function statusForCode(code: LedgerErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Maps thrown errors to JSON responses.
 *
 * Ledger errors carry their `code`; Fastify's own client errors (bad JSON,
 * oversized body) keep their status; everything else is a 500 whose
 * details stay in the log.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (isLedgerError(error)) {
      const status = statusForCode(error.code);
      if (status >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.status(status).send({ error: error.message, code: error.code });
    }

    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      return reply.status(status).send({ error: error.message, code: error.code });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal Server Error', code: 'INTERNAL' });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
