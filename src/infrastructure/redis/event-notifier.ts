import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EventPayload, LedgerEvent } from '../../domain/index.js';

export const LEDGER_EVENTS_CHANNEL = 'update_events';

export interface LedgerEventMessage {
  id: number;
  kind: string;
  payload: EventPayload | null;
  created_at: string;
}

export function toMessage(event: LedgerEvent): LedgerEventMessage {
  return {
    id: event.id,
    kind: event.kind,
    payload: event.payload,
    created_at: event.created_at.toISOString(),
  };
}

/**
 * Publishes a committed ledger event to the "update_events" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never reach the state
 * machine. The log stays the source of truth.
 */
export async function publishLedgerEvent(redis: Redis, log: Logger, event: LedgerEvent): Promise<void> {
  try {
    await redis.publish(LEDGER_EVENTS_CHANNEL, JSON.stringify(toMessage(event)));
    log.debug({ channel: LEDGER_EVENTS_CHANNEL, event_id: event.id, kind: event.kind }, 'Published ledger event');
  } catch (err: unknown) {
    log.warn({ err, event_id: event.id, kind: event.kind }, 'Failed to publish ledger event');
  }
}

/** Opens the publisher connection. */
export async function connectRedis(url: string, log: Logger): Promise<Redis> {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis connected');
  return redis;
}
