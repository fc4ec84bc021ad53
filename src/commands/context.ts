import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import type { Logger } from 'pino';
import { MAX_ID } from '../domain/index.js';
import { createLogger, loadConfig } from '../infrastructure/index.js';
import type { AppConfig, LogConsole } from '../infrastructure/index.js';
import { createRuntime } from '../runtime.js';
import type { Runtime, RuntimeOptions } from '../runtime.js';

interface GlobalOptions {
  config?: string;
}

export interface CommandContext {
  config: AppConfig;
  log: Logger;
}

/** Reads `--config` from the root program and builds config and logger. */
export function loadContext(command: Command, screen: LogConsole = 'stderr'): CommandContext {
  const { config: path } = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig({ path });
  return { config, log: createLogger(config, screen) };
}

/** Runs `work` against a fresh runtime and always closes it. */
export async function withRuntime<T>(
  command: Command,
  options: RuntimeOptions,
  work: (runtime: Runtime) => Promise<T>,
): Promise<T> {
  const { config, log } = loadContext(command);
  const runtime = await createRuntime(config, log, options);
  try {
    return await work(runtime);
  } finally {
    await runtime.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Argument parser for update and event ids. */
export function parseId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0 || n > MAX_ID) {
    throw new InvalidArgumentError(`Not an id between 1 and ${MAX_ID}.`);
  }
  return n;
}

/** Event cursor: 0 reads from the start. */
export function parseCursor(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > MAX_ID) {
    throw new InvalidArgumentError(`Not an id between 0 and ${MAX_ID}.`);
  }
  return n;
}

/** Argument parser for counts. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return n;
}
