import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { Ledger } from '../../domain/index.js';
import { runRecovery } from '../../application/index.js';
import type { EventListener, RecoveryReport, UpdateStateMachine } from '../../application/index.js';

export interface LedgerPluginOptions {
  ledger: Ledger;
  machine: UpdateStateMachine;
  log: Logger;
  onEvent?: EventListener | undefined;
}

/**
 * Exposes the ledger and the state machine to routes.
 *
 * The composition root owns both (Postgres in `serve`, in-memory in
 * tests); this plugin only decorates. `recover` runs recovery alongside
 * the live machine, skipping ids it is working on.
 */
async function ledgerPlugin(fastify: FastifyInstance, opts: LedgerPluginOptions): Promise<void> {
  const { ledger, machine, log, onEvent } = opts;

  fastify.decorate('ledger', ledger);
  fastify.decorate('machine', machine);
  fastify.decorate('recover', () =>
    runRecovery(ledger, { log, onEvent, isBusy: (id) => machine.isBusy(id) }),
  );
  fastify.decorate('pingLedger', async () => {
    await ledger.updates.list({}, { limit: 1, offset: 0 });
  });
}

export default fp(ledgerPlugin, {
  name: 'ledger',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    ledger: Ledger;
    machine: UpdateStateMachine;
    recover: () => Promise<RecoveryReport>;
    pingLedger: () => Promise<void>;
  }
}
