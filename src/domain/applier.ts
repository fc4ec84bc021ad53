import type { UpdateTarget } from './update.js';

export interface ApplierCallOptions {
  signal: AbortSignal;
}

/**
 * External capability that performs and undoes an update.
 *
 * A rejected promise is a failure; the state machine records it and never
 * lets it escape as a crash. Implementations should stop work when the
 * signal aborts.
 */
export interface Applier {
  apply(target: UpdateTarget, options: ApplierCallOptions): Promise<void>;
  /** Best-effort inverse of `apply`. */
  rollback(target: UpdateTarget, options: ApplierCallOptions): Promise<void>;
}
