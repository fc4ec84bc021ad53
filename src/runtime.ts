import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Sql } from 'postgres';
import type { Ledger } from './domain/index.js';
import { UpdateStateMachine } from './application/index.js';
import type { EventListener } from './application/index.js';
import type { AppConfig } from './infrastructure/config/index.js';
import { createApplier } from './infrastructure/appliers/index.js';
import { PgLedger, createDbClient } from './infrastructure/db/index.js';
import { connectRedis, publishLedgerEvent } from './infrastructure/redis/index.js';

export interface Runtime {
  config: AppConfig;
  log: Logger;
  ledger: Ledger;
  machine: UpdateStateMachine;
  /** Set when Redis notifications are enabled. */
  onEvent: EventListener | undefined;
  sql: Sql;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Connect to Redis and publish committed events, if enabled in config. */
  notify: boolean;
}

/**
 * Wires the Postgres ledger, the configured Applier and the optional
 * Redis notifier into a state machine.
 */
export async function createRuntime(
  config: AppConfig,
  log: Logger,
  options: RuntimeOptions,
): Promise<Runtime> {
  const { sql, db } = createDbClient(config.database.url, { max: config.database.pool_max });

  let redis: Redis | null = null;
  if (options.notify && config.redis.enabled) {
    try {
      redis = await connectRedis(config.redis.url, log);
    } catch (err: unknown) {
      await sql.end();
      throw err;
    }
  }

  const publisher = redis;
  const onEvent: EventListener | undefined = publisher === null
    ? undefined
    : (event) => publishLedgerEvent(publisher, log, event);

  const ledger = new PgLedger(db);
  const machine = new UpdateStateMachine({
    ledger,
    applier: createApplier(config.applier, log),
    log,
    onEvent,
  });

  return {
    config,
    log,
    ledger,
    machine,
    onEvent,
    sql,
    async close() {
      if (publisher !== null) {
        await publisher.quit().catch((err: unknown) => {
          log.warn({ err }, 'Redis quit failed');
        });
      }
      await sql.end();
      log.debug('Runtime closed');
    },
  };
}
