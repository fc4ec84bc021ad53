import { sql } from 'drizzle-orm';
import { pgTable, integer, text, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { UpdateState } from '../../domain/index.js';

/**
 * Drizzle schema for the append-only `events` table.
 *
 * Rows are insert-only: nothing in the codebase updates or deletes them.
 * `id` is an identity column, so it is the append order. Lifecycle events
 * reference their update through `payload->>'update_id'`.
 */
export const events = pgTable('events', {
  id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
  kind: text('kind').notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().default(sql`clock_timestamp()`),
}, (table) => [
  index('idx_events_kind').on(table.kind),
  index('idx_events_update_ref').on(sql`(${table.payload}->>'update_id')`),
]);

/**
 * Drizzle schema for the `updates` table: the cached projection of each
 * update's event history.
 *
 * The partial unique indexes are the pending-uniqueness guard: at most one
 * `pending` row per `(name, version)`, with a `null` version counted as its
 * own value apart from `''`. A racing insert fails with unique_violation
 * instead of needing a read-then-write.
 */
export const updates = pgTable('updates', {
  id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
  name: text('name').notNull(),
  version: text('version'),
  state: text('state').$type<UpdateState>().notNull(),
  meta: jsonb('meta').$type<Record<string, unknown>>(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_updates_state').on(table.state),
  index('idx_updates_name').on(table.name),
  uniqueIndex('uq_updates_pending_versioned')
    .on(table.name, table.version)
    .where(sql`${table.state} = 'pending' AND ${table.version} IS NOT NULL`),
  uniqueIndex('uq_updates_pending_unversioned')
    .on(table.name)
    .where(sql`${table.state} = 'pending' AND ${table.version} IS NULL`),
]);

export type EventRow = typeof events.$inferSelect;
export type UpdateRow = typeof updates.$inferSelect;
