import type { Logger } from 'pino';
import type {
  Applier,
  EventPayload,
  Ledger,
  LedgerEvent,
  LifecycleEventKind,
  UpdateMeta,
  UpdateRecord,
  UpdateState,
  UpdateTarget,
} from '../domain/index.js';
import { ApplierError, assertTransition, describeTarget, errorMessage } from '../domain/index.js';
import { KeyedMutex } from './keyed-mutex.js';

export type EventListener = (event: LedgerEvent) => void | Promise<void>;

export interface StateMachineDeps {
  ledger: Ledger;
  applier: Applier;
  log: Logger;
  /** Called with every event after its transaction commits. */
  onEvent?: EventListener | undefined;
}

export interface TransitionOptions {
  /** Aborting cancels the Applier call; the attempt then resolves as a failure. */
  signal?: AbortSignal | undefined;
}

export type ApplyResult =
  | { outcome: 'applied'; record: UpdateRecord; events: LedgerEvent[] }
  | { outcome: 'failed'; record: UpdateRecord; error: ApplierError; events: LedgerEvent[] };

export type InverseOutcome = { ok: true } | { ok: false; error: ApplierError };

export interface RollbackResult {
  record: UpdateRecord;
  inverse: InverseOutcome;
  events: LedgerEvent[];
}

type ApplierOperation = 'apply' | 'rollback';

/**
 * Drives updates through `pending → applied | failed → rolled_back`.
 *
 * Each step that must be atomic (record creation + `update.started`, and
 * every outcome event + its state change) runs in one ledger transaction.
 * The Applier call itself runs outside any transaction.
 *
 * Transitions for one update id are serialized by a per-id mutex inside
 * this process; `setState` is always a compare-and-swap on the state the
 * machine read, so a transition that lost a race with another process
 * fails with InvalidTransitionError instead of overwriting.
 *
 * ConflictError, InvalidTransitionError, NotFoundError and StorageError
 * are thrown. ApplierError is recorded and returned in the result.
 */
export class UpdateStateMachine {
  private readonly mutex = new KeyedMutex<number>();
  /** Ids created by `apply` whose attempt has not yet taken the mutex. */
  private readonly claimed = new Set<number>();

  constructor(private readonly deps: StateMachineDeps) {}

  /** True while a transition for `updateId` is in flight in this process. */
  isBusy(updateId: number): boolean {
    return this.claimed.has(updateId) || this.mutex.isLocked(updateId);
  }

  async apply(name: string, version: string | null, options: TransitionOptions = {}): Promise<ApplyResult> {
    const { ledger, log } = this.deps;
    const target: UpdateTarget = { name, version };

    const claim: { id?: number } = {};
    let opened: { record: UpdateRecord; started: LedgerEvent };
    try {
      opened = await ledger.transaction(async (tx) => {
        const created = await tx.updates.create(name, version);
        // claimed before commit, so recovery never sees the record unowned
        claim.id = created.id;
        this.claimed.add(created.id);
        const event = await tx.events.append('update.started', lifecyclePayload(created));
        return { record: created, started: event };
      });
    } catch (err: unknown) {
      if (claim.id !== undefined) this.claimed.delete(claim.id);
      throw err;
    }

    const { record, started } = opened;
    const attempt = this.mutex.run(record.id, async (): Promise<ApplyResult> => {
      log.info({ update_id: record.id, name, version }, `Applying ${describeTarget(target)}`);
      await this.publish(started);

      const startedAt = Date.now();
      const failure = await this.invoke('apply', target, options.signal);
      const durationMs = Date.now() - startedAt;

      if (failure === null) {
        const { updated, event } = await this.commit(
          record,
          'applied',
          'update.applied',
          { duration_ms: durationMs },
          { duration_ms: durationMs },
        );
        log.info({ update_id: record.id, duration_ms: durationMs }, `Applied ${describeTarget(target)}`);
        return { outcome: 'applied', record: updated, events: [started, event] };
      }

      const { updated, event } = await this.commit(
        record,
        'failed',
        'update.failed',
        { error: failure.message, cancelled: failure.cancelled },
        { error: failure.message, cancelled: failure.cancelled, duration_ms: durationMs },
      );
      log.warn(
        { update_id: record.id, err: failure, cancelled: failure.cancelled },
        `Failed to apply ${describeTarget(target)}`,
      );
      return { outcome: 'failed', record: updated, error: failure, events: [started, event] };
    });

    // the mutex is held from here on
    this.claimed.delete(record.id);
    return attempt;
  }

  async rollback(updateId: number, options: TransitionOptions = {}): Promise<RollbackResult> {
    const { ledger, log } = this.deps;

    return this.mutex.run(updateId, async (): Promise<RollbackResult> => {
      const record = await ledger.updates.get(updateId);
      try {
        assertTransition(record.state, 'rolled_back', record.id);
      } catch (err: unknown) {
        log.warn({ update_id: record.id, state: record.state }, 'Rollback rejected');
        throw err;
      }

      const started = await ledger.events.append('update.rollback_started', {
        ...lifecyclePayload(record),
        from: record.state,
      });
      await this.publish(started);

      const failure = await this.invoke('rollback', record, options.signal);

      // The record becomes rolled_back whatever the inverse did; the
      // outcome is kept in the event and in meta.
      const rollbackMeta = failure === null ? { ok: true } : { ok: false, error: failure.message };
      const { updated, event } = await this.commit(
        record,
        'rolled_back',
        'update.rolled_back',
        failure === null ? { inverse_ok: true } : { inverse_ok: false, error: failure.message },
        { ...(record.meta ?? {}), rollback: rollbackMeta },
      );

      if (failure === null) {
        log.info({ update_id: record.id }, `Rolled back ${describeTarget(record)}`);
        return { record: updated, inverse: { ok: true }, events: [started, event] };
      }

      log.error(
        { update_id: record.id, err: failure },
        `Inverse failed while rolling back ${describeTarget(record)}; record marked rolled_back`,
      );
      return { record: updated, inverse: { ok: false, error: failure }, events: [started, event] };
    });
  }

  /** Appends the outcome event and moves the record, atomically. */
  private async commit(
    record: UpdateRecord,
    to: UpdateState,
    kind: LifecycleEventKind,
    extra: EventPayload,
    meta: UpdateMeta | null,
  ): Promise<{ updated: UpdateRecord; event: LedgerEvent }> {
    assertTransition(record.state, to, record.id);

    const committed = await this.deps.ledger.transaction(async (tx) => {
      const event = await tx.events.append(kind, { ...lifecyclePayload(record), ...extra });
      const updated = await tx.updates.setState(record.id, to, meta, record.state);
      return { updated, event };
    });

    await this.publish(committed.event);
    return committed;
  }

  /**
   * Calls the Applier and reduces the outcome to `null` (success) or an
   * ApplierError. An abort of `signal`, before or during the call, is a
   * cancelled failure even if the Applier ignores the signal.
   */
  private async invoke(
    operation: ApplierOperation,
    target: UpdateTarget,
    signal: AbortSignal | undefined,
  ): Promise<ApplierError | null> {
    if (signal?.aborted) {
      return cancelled(operation, signal.reason);
    }

    const controller = new AbortController();
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });

    const call = Promise.resolve().then(() => {
      const options = { signal: controller.signal };
      const subject: UpdateTarget = { name: target.name, version: target.version };
      return operation === 'apply'
        ? this.deps.applier.apply(subject, options)
        : this.deps.applier.rollback(subject, options);
    });

    try {
      await Promise.race([call, abortion(controller.signal)]);
      return null;
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        call.catch((late: unknown) => {
          this.deps.log.debug({ err: late, operation }, 'Applier settled after cancellation');
        });
        return cancelled(operation, controller.signal.reason);
      }
      return ApplierError.from(err);
    } finally {
      signal?.removeEventListener('abort', forward);
    }
  }

  private async publish(event: LedgerEvent): Promise<void> {
    const listener = this.deps.onEvent;
    if (listener === undefined) return;

    try {
      await listener(event);
    } catch (err: unknown) {
      this.deps.log.warn({ err, event_id: event.id, kind: event.kind }, 'Event listener failed');
    }
  }
}

export function lifecyclePayload(record: UpdateRecord): EventPayload {
  return { update_id: record.id, name: record.name, version: record.version };
}

function cancelled(operation: ApplierOperation, reason: unknown): ApplierError {
  const detail = reason === undefined ? 'aborted' : errorMessage(reason);
  return new ApplierError(`${operation} cancelled: ${detail}`, true, { cause: reason });
}

function abortion(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
