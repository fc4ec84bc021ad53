import type { Ledger, LedgerEvent, UpdateRecord, UpdateState } from '../domain/index.js';
import { UPDATE_STATES, errorMessage, replay } from '../domain/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListUpdatesParams {
  limit?: number;
  offset?: number;
  state?: UpdateState;
  name?: string;
}

export interface ListEventsParams {
  limit?: number;
  /** Only events with `id > after`. */
  after?: number;
}

function clampLimit(limit: number | undefined): number {
  return Math.min(Math.max(limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
}

/**
 * Use case: list update records, newest first.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listUpdates(ledger: Ledger, params: ListUpdatesParams) {
  const limit = clampLimit(params.limit);
  const offset = Math.max(params.offset ?? 0, 0);

  const data = await ledger.updates.list(
    { state: params.state, name: params.name },
    { limit, offset },
  );

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/** Use case: fetch one record. Throws NotFoundError. */
export async function getUpdate(ledger: Ledger, updateId: number): Promise<UpdateRecord> {
  return ledger.updates.get(updateId);
}

/**
 * Use case: the full history of one record, oldest first, with the state
 * that history projects to. Throws NotFoundError for unknown ids.
 */
export async function listUpdateEvents(ledger: Ledger, updateId: number) {
  await ledger.updates.get(updateId);
  const { state, events } = await replay(ledger.events.readByReference(updateId), updateId);
  return { data: events, projected_state: state };
}

/** Use case: page through the whole log in append order. */
export async function listEvents(ledger: Ledger, params: ListEventsParams) {
  const limit = clampLimit(params.limit);
  const after = Math.max(params.after ?? 0, 0);

  const data: LedgerEvent[] = [];
  for await (const event of ledger.events.readAll({ afterId: after, batchSize: limit })) {
    data.push(event);
    if (data.length >= limit) break;
  }

  return {
    data,
    pagination: { limit, after, count: data.length, next_after: data.at(-1)?.id ?? null },
  };
}

export interface VerifyIssue {
  update_id: number;
  recorded: UpdateState;
  projected: UpdateState | null;
  error?: string;
}

export interface VerifyReport {
  checked: number;
  consistent: number;
  issues: VerifyIssue[];
}

/**
 * Replays every record's history and compares the projection with the
 * cached state. Read-only.
 */
export async function verifyLedger(ledger: Ledger): Promise<VerifyReport> {
  const report: VerifyReport = { checked: 0, consistent: 0, issues: [] };

  for (const state of UPDATE_STATES) {
    const records = await ledger.updates.listByState(state);
    for (const record of records) {
      report.checked++;
      try {
        const projected = await replay(ledger.events.readByReference(record.id), record.id);
        if (projected.state === record.state) {
          report.consistent++;
        } else {
          report.issues.push({ update_id: record.id, recorded: record.state, projected: projected.state });
        }
      } catch (err: unknown) {
        report.issues.push({
          update_id: record.id,
          recorded: record.state,
          projected: null,
          error: errorMessage(err),
        });
      }
    }
  }

  report.issues.sort((a, b) => a.update_id - b.update_id);
  return report;
}
