import type { LedgerEvent } from './event.js';
import { ProjectionError } from './errors.js';
import type { UpdateState } from './update.js';
import { canTransition } from './update.js';

/**
 * Replays the events of a single update and returns its current state.
 *
 * The log is the source of truth; `UpdateRecord.state` is a cached copy of
 * this function's result. Replay starts at `pending` because a record is
 * born pending, so a history that only holds `update.started` (or nothing)
 * projects to `pending`.
 *
 * Events must be passed in append order. Kinds that do not move the state
 * (`update.started`, `update.rollback_started`, `update.reconciled`, which
 * only records a repair of the cached row, and domain-specific kinds) are
 * skipped; every other kind is checked against the transition table.
 */
export function projectState(events: Iterable<LedgerEvent>, updateId: number | null = null): UpdateState {
  let state: UpdateState = 'pending';
  let lastId = -Infinity;

  for (const event of events) {
    if (event.id <= lastId) {
      throw new ProjectionError(updateId, event.id, `out of order after event ${lastId}`);
    }
    lastId = event.id;

    const next = targetStateOf(event);
    if (next === null) continue;

    if (!canTransition(state, next)) {
      throw new ProjectionError(updateId, event.id, `${event.kind} is illegal in state ${state}`);
    }
    state = next;
  }

  return state;
}

/** State an event moves its update into, or null when it moves nothing. */
export function targetStateOf(event: LedgerEvent): UpdateState | null {
  switch (event.kind) {
    case 'update.applied':
      return 'applied';
    case 'update.failed':
    case 'update.interrupted':
      return 'failed';
    case 'update.rolled_back':
      return 'rolled_back';
    default:
      return null;
  }
}

/** Collects an async event sequence and projects it. */
export async function replay(events: AsyncIterable<LedgerEvent>, updateId: number | null = null): Promise<{
  state: UpdateState;
  events: LedgerEvent[];
}> {
  const collected: LedgerEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return { state: projectState(collected, updateId), events: collected };
}
