import type { Logger } from 'pino';
import type { Applier, ApplierCallOptions, UpdateTarget } from '../../domain/index.js';
import { describeTarget } from '../../domain/index.js';

/** Applier that changes nothing. For dry runs and local development. */
export class NoopApplier implements Applier {
  constructor(private readonly log: Logger) {}

  async apply(target: UpdateTarget, _options: ApplierCallOptions): Promise<void> {
    this.log.debug({ name: target.name, version: target.version }, `noop apply ${describeTarget(target)}`);
  }

  async rollback(target: UpdateTarget, _options: ApplierCallOptions): Promise<void> {
    this.log.debug({ name: target.name, version: target.version }, `noop rollback ${describeTarget(target)}`);
  }
}
