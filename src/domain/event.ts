/**
 * Core types for the append-only event log.
 *
 * Events are immutable facts. The log assigns `id` and `created_at`;
 * callers only choose the `kind` and the `payload`.
 */

/** Lifecycle kinds written by the state machine and recovery. */
export const EVENT_KINDS = [
  'update.started',
  'update.applied',
  'update.failed',
  'update.rollback_started',
  'update.rolled_back',
  'update.interrupted',
  'update.reconciled',
] as const;

export type LifecycleEventKind = (typeof EVENT_KINDS)[number];

/**
 * Any event kind. Lifecycle kinds are enumerated above; domain-specific
 * kinds are stored verbatim and ignored by the projection.
 */
export type EventKind = LifecycleEventKind | (string & {});

/** Free-form structured payload. Lifecycle events always carry `update_id`. */
export type EventPayload = Record<string, unknown>;

export interface LedgerEvent {
  readonly id: number;
  readonly kind: EventKind;
  readonly payload: EventPayload | null;
  readonly created_at: Date;
}

export function isLifecycleKind(kind: string): kind is LifecycleEventKind {
  return (EVENT_KINDS as readonly string[]).includes(kind);
}

/**
 * Returns the update id an event refers to, or null for events that
 * carry no (numeric) `update_id` in their payload.
 */
export function referencedUpdateId(event: Pick<LedgerEvent, 'payload'>): number | null {
  const ref = event.payload?.['update_id'];
  return typeof ref === 'number' && Number.isInteger(ref) ? ref : null;
}
