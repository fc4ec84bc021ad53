export * from './domain/index.js';
export {
  UpdateStateMachine,
  runRecovery,
  listUpdates,
  getUpdate,
  listUpdateEvents,
  listEvents,
  verifyLedger,
  INTERRUPTED_REASON,
} from './application/index.js';
export type {
  ApplyResult,
  RollbackResult,
  InverseOutcome,
  EventListener,
  StateMachineDeps,
  TransitionOptions,
  RecoveryOptions,
  RecoveryReport,
  VerifyReport,
  VerifyIssue,
} from './application/index.js';
export {
  InMemoryLedger,
  PgLedger,
  createDbClient,
  migrate,
  CommandApplier,
  NoopApplier,
  createApplier,
  loadConfig,
  ConfigError,
  createLogger,
  publishLedgerEvent,
} from './infrastructure/index.js';
export type { AppConfig, InMemoryLedgerOptions } from './infrastructure/index.js';
export { buildServer } from './server.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
