export type { LedgerEvent, EventKind, EventPayload, LifecycleEventKind } from './event.js';
export { EVENT_KINDS, isLifecycleKind, referencedUpdateId } from './event.js';
export type { UpdateRecord, UpdateState, UpdateMeta, UpdateTarget } from './update.js';
export {
  UPDATE_STATES,
  isUpdateState,
  canTransition,
  assertTransition,
  isRollbackable,
  identityKey,
  describeTarget,
} from './update.js';
export {
  LedgerError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  StorageError,
  ApplierError,
  ProjectionError,
  isLedgerError,
  errorMessage,
} from './errors.js';
export type { LedgerErrorCode } from './errors.js';
export { projectState, targetStateOf, replay } from './projection.js';
export { MAX_ID } from './ledger.js';
export type {
  Ledger,
  LedgerScope,
  EventLog,
  UpdateRecordStore,
  ReadAllOptions,
  UpdateListFilters,
  PaginationParams,
} from './ledger.js';
export type { Applier, ApplierCallOptions } from './applier.js';
