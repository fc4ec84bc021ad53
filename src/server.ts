import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import {
  auditRoutes,
  errorHandler,
  ledgerPlugin,
  updateRoutes,
} from './interfaces/http/index.js';
import type { LedgerPluginOptions } from './interfaces/http/index.js';

/**
 * Builds the HTTP server around an existing ledger and state machine.
 *
 * Order:
 * 1) Error handler
 * 2) Ledger decorations
 * 3) HTTP routes
 *
 * Does not listen; the caller decides (`serve`, or `inject` in tests).
 */
export async function buildServer(options: LedgerPluginOptions): Promise<FastifyInstance> {
  // Fastify logs through the same pino instance as the rest of the process
  const loggerInstance: FastifyBaseLogger = options.log;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(errorHandler);
  await fastify.register(ledgerPlugin, options);
  await fastify.register(updateRoutes);
  await fastify.register(auditRoutes);

  return fastify;
}
