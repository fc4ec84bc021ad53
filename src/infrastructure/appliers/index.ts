import type { Logger } from 'pino';
import type { Applier } from '../../domain/index.js';
import type { ApplierConfig } from '../config/config.js';
import { CommandApplier } from './command-applier.js';
import { NoopApplier } from './noop-applier.js';

export { CommandApplier, runCommand, describeFailure } from './command-applier.js';
export type { CommandApplierOptions, CommandResult, CommandStatus, RunCommandInput } from './command-applier.js';
export { NoopApplier } from './noop-applier.js';

/** Builds the Applier selected by the `applier` config section. */
export function createApplier(config: ApplierConfig, log: Logger): Applier {
  if (config.kind === 'noop' || config.apply_command === undefined) {
    return new NoopApplier(log);
  }
  return new CommandApplier({
    applyCommand: config.apply_command,
    rollbackCommand: config.rollback_command,
    cwd: config.cwd,
    timeoutMs: config.timeout_ms,
    log,
  });
}
