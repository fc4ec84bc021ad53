import { and, asc, desc, eq, gt, sql, type SQL } from 'drizzle-orm';
import type {
  EventKind,
  EventLog,
  EventPayload,
  Ledger,
  LedgerEvent,
  LedgerScope,
  PaginationParams,
  ReadAllOptions,
  UpdateListFilters,
  UpdateMeta,
  UpdateRecord,
  UpdateRecordStore,
  UpdateState,
} from '../../domain/index.js';
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  StorageError,
  isLedgerError,
} from '../../domain/index.js';
import type { Database, Executor } from './client.js';
import { events, updates } from './schema.js';
import type { EventRow, UpdateRow } from './schema.js';

const DEFAULT_BATCH_SIZE = 100;
const UNIQUE_VIOLATION = '23505';

/**
 * Postgres-backed ledger.
 *
 * Domain errors pass through untouched; every other failure from the
 * driver surfaces as a StorageError. `transaction` maps onto a Drizzle
 * transaction, so a throw inside the work rolls back every write made
 * through the scope.
 */
export class PgLedger implements Ledger {
  readonly events: EventLog;
  readonly updates: UpdateRecordStore;

  constructor(private readonly db: Database) {
    this.events = new PgEventLog(db);
    this.updates = new PgUpdateRecordStore(db);
  }

  async transaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    return guard('transaction', () =>
      this.db.transaction(async (tx) =>
        work({ events: new PgEventLog(tx), updates: new PgUpdateRecordStore(tx) }),
      ),
    );
  }
}

export class PgEventLog implements EventLog {
  constructor(private readonly db: Executor) {}

  async append(kind: EventKind, payload: EventPayload | null): Promise<LedgerEvent> {
    return guard('append', async () => {
      const [row] = await this.db.insert(events).values({ kind, payload }).returning();
      if (row === undefined) {
        throw new Error('insert returned no row');
      }
      return toEvent(row);
    });
  }

  readAll(options: ReadAllOptions = {}): AsyncIterable<LedgerEvent> {
    return this.stream(undefined, options);
  }

  readByReference(updateId: number): AsyncIterable<LedgerEvent> {
    return this.stream(referenceFilter(updateId), {});
  }

  /** Keyset-paged scan by id; each iteration starts a fresh scan. */
  private stream(filter: SQL | undefined, options: ReadAllOptions): AsyncIterable<LedgerEvent> {
    const db = this.db;
    const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
    const startAfter = options.afterId ?? 0;

    return {
      async *[Symbol.asyncIterator]() {
        let cursor = startAfter;
        for (;;) {
          const rows = await guard('read', () =>
            db
              .select()
              .from(events)
              .where(and(gt(events.id, cursor), filter))
              .orderBy(asc(events.id))
              .limit(batchSize),
          );
          for (const row of rows) {
            yield toEvent(row);
          }
          const last = rows.at(-1);
          if (last === undefined || rows.length < batchSize) return;
          cursor = last.id;
        }
      },
    };
  }
}

export class PgUpdateRecordStore implements UpdateRecordStore {
  constructor(private readonly db: Executor) {}

  async create(name: string, version: string | null): Promise<UpdateRecord> {
    try {
      const [row] = await this.db
        .insert(updates)
        .values({ name, version, state: 'pending' })
        .returning();
      if (row === undefined) {
        throw new Error('insert returned no row');
      }
      return toRecord(row);
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(name, version, { cause: err });
      }
      throw new StorageError('create', err);
    }
  }

  async get(id: number): Promise<UpdateRecord> {
    const rows = await guard('get', () =>
      this.db.select().from(updates).where(eq(updates.id, id)).limit(1),
    );
    const row = rows[0];
    if (row === undefined) {
      throw new NotFoundError(id);
    }
    return toRecord(row);
  }

  async setState(
    id: number,
    state: UpdateState,
    meta: UpdateMeta | null,
    expected?: UpdateState,
  ): Promise<UpdateRecord> {
    const where = expected === undefined
      ? eq(updates.id, id)
      : and(eq(updates.id, id), eq(updates.state, expected));

    const rows = await guard('setState', () =>
      this.db.update(updates).set({ state, meta }).where(where).returning(),
    );
    const row = rows[0];
    if (row !== undefined) {
      return toRecord(row);
    }

    // Nothing matched: either the id is unknown or the CAS lost.
    const current = await this.get(id);
    throw new InvalidTransitionError(current.state, state, id);
  }

  async listByState(state: UpdateState): Promise<UpdateRecord[]> {
    const rows = await guard('listByState', () =>
      this.db.select().from(updates).where(eq(updates.state, state)).orderBy(asc(updates.id)),
    );
    return rows.map(toRecord);
  }

  async list(filters: UpdateListFilters, pagination: PaginationParams): Promise<UpdateRecord[]> {
    const conditions: SQL[] = [];
    if (filters.state !== undefined) {
      conditions.push(eq(updates.state, filters.state));
    }
    if (filters.name !== undefined) {
      conditions.push(eq(updates.name, filters.name));
    }

    const rows = await guard('list', () =>
      this.db
        .select()
        .from(updates)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(updates.id))
        .limit(pagination.limit)
        .offset(pagination.offset),
    );
    return rows.map(toRecord);
  }
}

function toEvent(row: EventRow): LedgerEvent {
  return {
    id: row.id,
    kind: row.kind,
    payload: row.payload ?? null,
    created_at: row.created_at,
  };
}

function toRecord(row: UpdateRow): UpdateRecord {
  return {
    id: row.id,
    name: row.name,
    version: row.version,
    state: row.state,
    meta: row.meta ?? null,
    created_at: row.created_at,
  };
}

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err: unknown) {
    if (isLedgerError(err)) throw err;
    throw new StorageError(operation, err);
  }
}

/**
 * Events whose payload references `updateId` as a JSON number; a string
 * `"5"` is not a reference, matching `referencedUpdateId`.
 */
export function referenceFilter(updateId: number): SQL {
  return sql`${events.payload}->>'update_id' = ${String(updateId)} AND jsonb_typeof(${events.payload}->'update_id') = 'number'`;
}

/**
 * postgres.js reports SQLSTATE on `code`; newer Drizzle releases wrap the
 * driver error, so the cause chain is walked as well.
 */
export function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && current.code === UNIQUE_VIOLATION) {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}
