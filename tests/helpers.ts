import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Applier, ApplierCallOptions, UpdateTarget } from '../src/domain/index.js';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

type Step = (target: UpdateTarget, options: ApplierCallOptions) => Promise<void>;

/**
 * Applier whose behaviour each test scripts. Every call is recorded;
 * unscripted calls succeed.
 */
export class ScriptedApplier implements Applier {
  readonly calls: Array<{ operation: 'apply' | 'rollback'; target: UpdateTarget }> = [];
  applyStep: Step = async () => {};
  rollbackStep: Step = async () => {};

  async apply(target: UpdateTarget, options: ApplierCallOptions): Promise<void> {
    this.calls.push({ operation: 'apply', target });
    await this.applyStep(target, options);
  }

  async rollback(target: UpdateTarget, options: ApplierCallOptions): Promise<void> {
    this.calls.push({ operation: 'rollback', target });
    await this.rollbackStep(target, options);
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: unknown) => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending promise callbacks run. */
export async function flush(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

/** Clock that advances one second per reading, from a fixed start. */
export function steppingClock(start = '2026-03-01T10:00:00Z'): () => Date {
  let ms = new Date(start).getTime();
  return () => {
    const now = new Date(ms);
    ms += 1000;
    return now;
  };
}
