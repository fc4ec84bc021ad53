/**
 * Update lifecycle states and the transition table.
 *
 * `pending` is the only initial state. Every legal move is listed in
 * TRANSITIONS; anything else is an InvalidTransitionError.
 */
import { InvalidTransitionError } from './errors.js';

export const UPDATE_STATES = ['pending', 'applied', 'failed', 'rolled_back'] as const;

export type UpdateState = (typeof UPDATE_STATES)[number];

export type UpdateMeta = Record<string, unknown>;

export interface UpdateRecord {
  readonly id: number;
  readonly name: string;
  readonly version: string | null;
  readonly state: UpdateState;
  readonly meta: UpdateMeta | null;
  readonly created_at: Date;
}

/** Identity of an update line: `(name, version)`, `null` version included. */
export interface UpdateTarget {
  readonly name: string;
  readonly version: string | null;
}

const TRANSITIONS: Readonly<Record<UpdateState, readonly UpdateState[]>> = {
  pending: ['applied', 'failed'],
  applied: ['rolled_back'],
  failed: ['rolled_back'],
  rolled_back: [],
};

export function isUpdateState(value: unknown): value is UpdateState {
  return typeof value === 'string' && (UPDATE_STATES as readonly string[]).includes(value);
}

export function canTransition(from: UpdateState, to: UpdateState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: UpdateState, to: UpdateState, updateId?: number): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to, updateId);
  }
}

/** States a rollback may start from. */
export function isRollbackable(state: UpdateState): boolean {
  return canTransition(state, 'rolled_back');
}

/** Key used for the pending-uniqueness check. `null` and `''` stay distinct. */
export function identityKey(target: UpdateTarget): string {
  return JSON.stringify([target.name, target.version]);
}

export function describeTarget(target: UpdateTarget): string {
  return target.version === null ? target.name : `${target.name}@${target.version}`;
}
