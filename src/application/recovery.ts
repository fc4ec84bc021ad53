import type { Logger } from 'pino';
import type { Ledger, LedgerEvent, UpdateRecord } from '../domain/index.js';
import { InvalidTransitionError, NotFoundError, describeTarget, replay } from '../domain/index.js';
import { lifecyclePayload } from './update-state-machine.js';

export const INTERRUPTED_REASON = 'interrupted';

export interface RecoveryOptions {
  log: Logger;
  /**
   * Ids with a transition in flight in this process; they are skipped.
   * Pass `machine.isBusy` when recovery runs next to a live state machine.
   */
  isBusy?: ((updateId: number) => boolean) | undefined;
  /** Called with every event recovery appends, after it commits. */
  onEvent?: ((event: LedgerEvent) => void | Promise<void>) | undefined;
  now?: (() => Date) | undefined;
}

export interface RecoveryReport {
  /** Records moved from pending to failed as interrupted. */
  interrupted: number[];
  /** Pending records whose log had already resolved; row brought in line. */
  reconciled: number[];
  /** Skipped because a transition is in flight, here or in another writer. */
  skipped: number[];
  /** History could not be replayed; left untouched. */
  unresolved: number[];
}

/**
 * Repairs records left `pending` by a crash.
 *
 * A pending record that outlives the process that created it is never
 * legitimate progress. If its history holds nothing past `update.started`
 * it is moved to `failed` with an interrupted marker and exactly one
 * `update.interrupted` event. If the history already resolved the attempt
 * the row is set to the projected state and `update.reconciled` is logged.
 *
 * Recovery never calls the Applier: retrying is left to an explicit
 * `apply`.
 */
export async function runRecovery(ledger: Ledger, options: RecoveryOptions): Promise<RecoveryReport> {
  const { log } = options;
  const now = options.now ?? (() => new Date());
  const report: RecoveryReport = { interrupted: [], reconciled: [], skipped: [], unresolved: [] };

  const stale = await ledger.updates.listByState('pending');
  if (stale.length === 0) {
    log.debug('Recovery: no pending updates');
    return report;
  }

  log.info({ count: stale.length }, 'Recovery: inspecting pending updates');

  const isBusy = options.isBusy ?? (() => false);

  for (const record of stale) {
    if (isBusy(record.id)) {
      log.debug({ update_id: record.id }, 'Recovery: update has a transition in flight, skipping');
      report.skipped.push(record.id);
      continue;
    }

    const projected = await replay(ledger.events.readByReference(record.id), record.id).catch((err: unknown) => {
      log.error({ err, update_id: record.id }, 'Recovery: cannot replay update history');
      return null;
    });
    if (projected === null) {
      report.unresolved.push(record.id);
      continue;
    }

    let event: LedgerEvent | null;
    try {
      event = projected.state === 'pending'
        ? await markInterrupted(ledger, record, now(), isBusy)
        : await reconcile(ledger, record, projected.state, isBusy);
    } catch (err: unknown) {
      // another writer moved or discarded the record after we listed it
      if (err instanceof InvalidTransitionError || err instanceof NotFoundError) {
        log.debug({ update_id: record.id }, 'Recovery: update left pending concurrently, skipping');
        report.skipped.push(record.id);
        continue;
      }
      throw err;
    }

    if (event === null) {
      log.debug({ update_id: record.id }, 'Recovery: update has a transition in flight, skipping');
      report.skipped.push(record.id);
      continue;
    }

    if (projected.state === 'pending') {
      report.interrupted.push(record.id);
      log.warn(
        { update_id: record.id, event_id: event.id, name: record.name, version: record.version },
        `Recovery: ${describeTarget(record)} was interrupted, marked failed`,
      );
    } else {
      report.reconciled.push(record.id);
      log.warn(
        { update_id: record.id, event_id: event.id, state: projected.state },
        `Recovery: ${describeTarget(record)} reconciled to ${projected.state}`,
      );
    }

    if (options.onEvent !== undefined) {
      try {
        await options.onEvent(event);
      } catch (err: unknown) {
        log.warn({ err, event_id: event.id }, 'Recovery: event listener failed');
      }
    }
  }

  log.info(
    {
      interrupted: report.interrupted.length,
      reconciled: report.reconciled.length,
      skipped: report.skipped.length,
      unresolved: report.unresolved.length,
    },
    'Recovery complete',
  );
  return report;
}

async function markInterrupted(
  ledger: Ledger,
  record: UpdateRecord,
  at: Date,
  isBusy: (updateId: number) => boolean,
): Promise<LedgerEvent | null> {
  return ledger.transaction(async (tx) => {
    if (isBusy(record.id)) return null;
    const event = await tx.events.append('update.interrupted', {
      ...lifecyclePayload(record),
      reason: INTERRUPTED_REASON,
    });
    await tx.updates.setState(
      record.id,
      'failed',
      { ...(record.meta ?? {}), error: INTERRUPTED_REASON, interrupted: true, recovered_at: at.toISOString() },
      'pending',
    );
    return event;
  });
}

async function reconcile(
  ledger: Ledger,
  record: UpdateRecord,
  to: UpdateRecord['state'],
  isBusy: (updateId: number) => boolean,
): Promise<LedgerEvent | null> {
  return ledger.transaction(async (tx) => {
    if (isBusy(record.id)) return null;
    const event = await tx.events.append('update.reconciled', {
      ...lifecyclePayload(record),
      from: record.state,
      to,
    });
    await tx.updates.setState(record.id, to, { ...(record.meta ?? {}), reconciled: true }, record.state);
    return event;
  });
}
