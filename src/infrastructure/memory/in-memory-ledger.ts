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
  identityKey,
  referencedUpdateId,
} from '../../domain/index.js';
import { KeyedMutex } from '../../application/keyed-mutex.js';

const DEFAULT_BATCH_SIZE = 100;
const LOCK = 'ledger';

interface MemoryState {
  events: LedgerEvent[];
  updates: Map<number, UpdateRecord>;
  nextEventId: number;
  nextUpdateId: number;
  lastCreatedAt: number;
}

/** Runs a write either under the ledger lock or inside an open transaction. */
type Exclusive = <T>(write: () => T) => Promise<T>;

export interface InMemoryLedgerOptions {
  /** Clock used for `created_at`. */
  now?: () => Date;
}

/**
 * In-memory ledger.
 *
 * Backs tests and embedded use. Writes outside `transaction` each take the
 * ledger lock; transactions hold it for their whole duration and restore a
 * snapshot if the work throws. Readers never lock, so they can observe a
 * transaction's writes before it commits.
 *
 * Do not call `ledger.events` / `ledger.updates` writes from inside a
 * transaction: use the scope handed to the work function.
 */
export class InMemoryLedger implements Ledger {
  readonly events: EventLog;
  readonly updates: UpdateRecordStore;

  private readonly state: MemoryState = {
    events: [],
    updates: new Map(),
    nextEventId: 1,
    nextUpdateId: 1,
    lastCreatedAt: 0,
  };

  private readonly mutex = new KeyedMutex<string>();
  private readonly scope: LedgerScope;

  constructor(options: InMemoryLedgerOptions = {}) {
    const now = options.now ?? (() => new Date());
    const locked: Exclusive = (write) => this.mutex.run(LOCK, async () => write());
    const direct: Exclusive = async (write) => write();

    this.events = new InMemoryEventLog(this.state, locked, now);
    this.updates = new InMemoryUpdateRecordStore(this.state, locked, now);
    this.scope = {
      events: new InMemoryEventLog(this.state, direct, now),
      updates: new InMemoryUpdateRecordStore(this.state, direct, now),
    };
  }

  async transaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    return this.mutex.run(LOCK, async () => {
      const eventCount = this.state.events.length;
      const updates = new Map(this.state.updates);
      const lastCreatedAt = this.state.lastCreatedAt;

      try {
        return await work(this.scope);
      } catch (err: unknown) {
        this.state.events.length = eventCount;
        this.state.updates = updates;
        this.state.lastCreatedAt = lastCreatedAt;
        throw err;
      }
    });
  }
}

class InMemoryEventLog implements EventLog {
  constructor(
    private readonly state: MemoryState,
    private readonly exclusive: Exclusive,
    private readonly now: () => Date,
  ) {}

  append(kind: EventKind, payload: EventPayload | null): Promise<LedgerEvent> {
    return this.exclusive(() => {
      // created_at never goes backwards, whatever the clock does
      const createdAt = Math.max(this.now().getTime(), this.state.lastCreatedAt);
      const event: LedgerEvent = Object.freeze({
        id: this.state.nextEventId++,
        kind,
        payload: payload === null ? null : structuredClone(payload),
        created_at: new Date(createdAt),
      });
      this.state.lastCreatedAt = createdAt;
      this.state.events.push(event);
      return event;
    });
  }

  readAll(options: ReadAllOptions = {}): AsyncIterable<LedgerEvent> {
    return this.stream(() => true, options);
  }

  readByReference(updateId: number): AsyncIterable<LedgerEvent> {
    return this.stream((event) => referencedUpdateId(event) === updateId, {});
  }

  private stream(
    match: (event: LedgerEvent) => boolean,
    options: ReadAllOptions,
  ): AsyncIterable<LedgerEvent> {
    const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
    const startAfter = options.afterId ?? 0;
    const state = this.state;

    return {
      async *[Symbol.asyncIterator]() {
        let cursor = startAfter;
        for (;;) {
          const page = state.events
            .filter((event) => event.id > cursor && match(event))
            .slice(0, batchSize);
          yield* page;
          const last = page.at(-1);
          if (last === undefined || page.length < batchSize) return;
          cursor = last.id;
        }
      },
    };
  }
}

class InMemoryUpdateRecordStore implements UpdateRecordStore {
  constructor(
    private readonly state: MemoryState,
    private readonly exclusive: Exclusive,
    private readonly now: () => Date,
  ) {}

  create(name: string, version: string | null): Promise<UpdateRecord> {
    return this.exclusive(() => {
      // check and insert run in one synchronous step, so no other
      // create can slip in between them
      const key = identityKey({ name, version });
      for (const record of this.state.updates.values()) {
        if (record.state === 'pending' && identityKey(record) === key) {
          throw new ConflictError(name, version);
        }
      }

      const record: UpdateRecord = {
        id: this.state.nextUpdateId++,
        name,
        version,
        state: 'pending',
        meta: null,
        created_at: this.now(),
      };
      this.state.updates.set(record.id, record);
      return record;
    });
  }

  async get(id: number): Promise<UpdateRecord> {
    const record = this.state.updates.get(id);
    if (record === undefined) {
      throw new NotFoundError(id);
    }
    return record;
  }

  setState(
    id: number,
    state: UpdateState,
    meta: UpdateMeta | null,
    expected?: UpdateState,
  ): Promise<UpdateRecord> {
    return this.exclusive(() => {
      const current = this.state.updates.get(id);
      if (current === undefined) {
        throw new NotFoundError(id);
      }
      if (expected !== undefined && current.state !== expected) {
        throw new InvalidTransitionError(current.state, state, id);
      }

      const next: UpdateRecord = {
        ...current,
        state,
        meta: meta === null ? null : structuredClone(meta),
      };
      this.state.updates.set(id, next);
      return next;
    });
  }

  async listByState(state: UpdateState): Promise<UpdateRecord[]> {
    return [...this.state.updates.values()]
      .filter((record) => record.state === state)
      .sort((a, b) => a.id - b.id);
  }

  async list(filters: UpdateListFilters, pagination: PaginationParams): Promise<UpdateRecord[]> {
    return [...this.state.updates.values()]
      .filter((record) => filters.state === undefined || record.state === filters.state)
      .filter((record) => filters.name === undefined || record.name === filters.name)
      .sort((a, b) => b.id - a.id)
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }
}
