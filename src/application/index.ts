export { UpdateStateMachine, lifecyclePayload } from './update-state-machine.js';
export type {
  ApplyResult,
  EventListener,
  InverseOutcome,
  RollbackResult,
  StateMachineDeps,
  TransitionOptions,
} from './update-state-machine.js';
export { runRecovery, INTERRUPTED_REASON } from './recovery.js';
export type { RecoveryOptions, RecoveryReport } from './recovery.js';
export { listUpdates, getUpdate, listUpdateEvents, listEvents, verifyLedger } from './audit.js';
export type { ListUpdatesParams, ListEventsParams, VerifyIssue, VerifyReport } from './audit.js';
export {
  applyUpdateSchema,
  updateIdSchema,
  listUpdatesQuerySchema,
  listEventsQuerySchema,
} from './update-schema.js';
export type { ApplyUpdateInput, ListUpdatesQuery, ListEventsQuery } from './update-schema.js';
export { KeyedMutex } from './keyed-mutex.js';
