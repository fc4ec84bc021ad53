/**
 * Error taxonomy for the ledger.
 *
 * Every error carries a stable `code` so the HTTP and CLI layers can map
 * it without instanceof chains. `StorageError` wraps driver failures and
 * keeps the original on `cause`.
 */

export type LedgerErrorCode =
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'STORAGE'
  | 'APPLIER'
  | 'PROJECTION';

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A pending record already exists for the same `(name, version)`. */
export class ConflictError extends LedgerError {
  readonly code = 'CONFLICT';

  constructor(
    readonly updateName: string,
    readonly version: string | null,
    options?: { cause?: unknown },
  ) {
    super(
      `An update for ${version === null ? updateName : `${updateName}@${version}`} is already pending`,
      options,
    );
  }
}

export class InvalidTransitionError extends LedgerError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly from: string,
    readonly to: string,
    readonly updateId?: number,
  ) {
    super(
      updateId === undefined
        ? `Illegal transition ${from} -> ${to}`
        : `Illegal transition ${from} -> ${to} for update ${updateId}`,
    );
  }
}

export class NotFoundError extends LedgerError {
  readonly code = 'NOT_FOUND';

  constructor(readonly updateId: number) {
    super(`Update ${updateId} not found`);
  }
}

export class StorageError extends LedgerError {
  readonly code = 'STORAGE';

  constructor(operation: string, cause: unknown) {
    super(`Storage failure during ${operation}: ${errorMessage(cause)}`, { cause });
  }
}

/** Failure reported by the external Applier, including cancellation. */
export class ApplierError extends LedgerError {
  readonly code = 'APPLIER';

  constructor(
    message: string,
    readonly cancelled = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static from(err: unknown): ApplierError {
    if (err instanceof ApplierError) return err;
    return new ApplierError(errorMessage(err), false, { cause: err });
  }
}

/** An update's event history cannot be replayed through the transition table. */
export class ProjectionError extends LedgerError {
  readonly code = 'PROJECTION';

  constructor(
    readonly updateId: number | null,
    readonly eventId: number,
    detail: string,
  ) {
    super(`Cannot replay event ${eventId}${updateId === null ? '' : ` of update ${updateId}`}: ${detail}`);
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
