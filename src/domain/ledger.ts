import type { EventKind, EventPayload, LedgerEvent } from './event.js';
import type { UpdateMeta, UpdateRecord, UpdateState } from './update.js';

/** Largest id either table can hold (Postgres `integer`). */
export const MAX_ID = 2_147_483_647;

export interface ReadAllOptions {
  /** Only events with `id > afterId`. */
  afterId?: number;
  /** Page size used while streaming. */
  batchSize?: number;
}

/**
 * Append-only event store.
 *
 * `readAll` and `readByReference` return restartable sequences: every
 * `for await` starts again from the beginning and pages lazily.
 */
export interface EventLog {
  append(kind: EventKind, payload: EventPayload | null): Promise<LedgerEvent>;
  readAll(options?: ReadAllOptions): AsyncIterable<LedgerEvent>;
  readByReference(updateId: number): AsyncIterable<LedgerEvent>;
}

export interface UpdateListFilters {
  state?: UpdateState;
  name?: string;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Store of cached update records.
 *
 * The store does not know the transition table. `setState` only checks
 * that the record exists, unless `expected` is passed, in which case the
 * write is a compare-and-swap on the current state.
 */
export interface UpdateRecordStore {
  create(name: string, version: string | null): Promise<UpdateRecord>;
  get(id: number): Promise<UpdateRecord>;
  setState(id: number, state: UpdateState, meta: UpdateMeta | null, expected?: UpdateState): Promise<UpdateRecord>;
  listByState(state: UpdateState): Promise<UpdateRecord[]>;
  list(filters: UpdateListFilters, pagination: PaginationParams): Promise<UpdateRecord[]>;
}

export interface LedgerScope {
  readonly events: EventLog;
  readonly updates: UpdateRecordStore;
}

/**
 * Handle on the shared log and record store.
 *
 * Writes made through the scope handed to `transaction` commit together
 * or not at all.
 */
export interface Ledger extends LedgerScope {
  transaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T>;
}
