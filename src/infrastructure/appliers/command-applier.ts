import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import type { Applier, ApplierCallOptions, UpdateTarget } from '../../domain/index.js';
import { ApplierError, describeTarget, errorMessage } from '../../domain/index.js';

const DEFAULT_MAX_OUTPUT_BYTES = 8_192;
const DEFAULT_FORCE_KILL_AFTER_MS = 1_500;

export type CommandStatus = 'pass' | 'fail' | 'timeout' | 'aborted' | 'error';

export interface RunCommandInput {
  /** Command line; split on whitespace, no shell. Quotes are not interpreted. */
  command: string;
  args: string[];
  cwd?: string | undefined;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
  maxOutputBytes?: number;
  forceKillAfterMs?: number;
}

export interface CommandResult {
  status: CommandStatus;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  stdout: string;
  stderr: string;
  errorMessage?: string;
}

export interface CommandApplierOptions {
  applyCommand: string;
  rollbackCommand?: string | undefined;
  cwd?: string | undefined;
  timeoutMs: number;
  log: Logger;
  maxOutputBytes?: number;
  forceKillAfterMs?: number;
}

/**
 * Applier that runs an external program per update.
 *
 * The command receives `name` and, when set, `version` as arguments and as
 * UPDATE_NAME / UPDATE_VERSION. Exit code 0 is success; anything else, a
 * timeout or an abort rejects. Configured commands are split on whitespace
 * with no shell quoting, so an argument cannot contain a space.
 */
export class CommandApplier implements Applier {
  constructor(private readonly options: CommandApplierOptions) {}

  async apply(target: UpdateTarget, { signal }: ApplierCallOptions): Promise<void> {
    await this.run('apply', this.options.applyCommand, target, signal);
  }

  async rollback(target: UpdateTarget, { signal }: ApplierCallOptions): Promise<void> {
    const command = this.options.rollbackCommand;
    if (command === undefined) {
      throw new ApplierError('no rollback command configured');
    }
    await this.run('rollback', command, target, signal);
  }

  private async run(
    operation: 'apply' | 'rollback',
    command: string,
    target: UpdateTarget,
    signal: AbortSignal,
  ): Promise<void> {
    const { log } = this.options;
    const args = target.version === null ? [target.name] : [target.name, target.version];

    log.debug({ operation, command, args }, `Running ${operation} command for ${describeTarget(target)}`);

    const result = await runCommand({
      command,
      args,
      cwd: this.options.cwd,
      env: {
        ...process.env,
        UPDATE_NAME: target.name,
        UPDATE_VERSION: target.version ?? '',
      },
      timeoutMs: this.options.timeoutMs,
      signal,
      maxOutputBytes: this.options.maxOutputBytes,
      forceKillAfterMs: this.options.forceKillAfterMs,
    });

    log.debug(
      { operation, status: result.status, exit_code: result.exitCode, duration_ms: result.durationMs },
      `${operation} command finished`,
    );

    if (result.status !== 'pass') {
      throw new ApplierError(describeFailure(result, this.options.timeoutMs), result.status === 'aborted');
    }
  }
}

export function describeFailure(result: CommandResult, timeoutMs: number): string {
  const tail = result.stderr.trim();
  const suffix = tail === '' ? '' : `: ${tail}`;

  switch (result.status) {
    case 'timeout':
      return `command timed out after ${timeoutMs}ms${suffix}`;
    case 'aborted':
      return 'command aborted';
    case 'error':
      return `command could not start: ${result.errorMessage ?? 'unknown error'}`;
    default:
      return result.exitCode === null
        ? `command terminated by ${result.signal ?? 'signal'}${suffix}`
        : `command exited with code ${result.exitCode}${suffix}`;
  }
}

function appendTail(value: string, chunk: string, maxBytes: number): string {
  if (maxBytes <= 0) {
    return '';
  }

  const combined = value + chunk;
  if (Buffer.byteLength(combined, 'utf8') <= maxBytes) {
    return combined;
  }

  const buffer = Buffer.from(combined, 'utf8');
  return buffer.subarray(buffer.length - maxBytes).toString('utf8');
}

/**
 * Spawns a command with a time limit and a bounded output tail.
 * Timeout and abort send SIGTERM, then SIGKILL if the child lingers.
 * Never rejects.
 */
export function runCommand(input: RunCommandInput): Promise<CommandResult> {
  const maxOutputBytes = Math.max(0, input.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES);
  const forceKillAfterMs = input.forceKillAfterMs ?? DEFAULT_FORCE_KILL_AFTER_MS;
  const [program, ...fixedArgs] = input.command.trim().split(/\s+/);
  const startedAt = Date.now();

  let stdout = '';
  let stderr = '';
  let timedOut = false;
  let aborted = false;
  let spawnError: string | null = null;

  return new Promise<CommandResult>((resolve) => {
    if (program === undefined || program === '') {
      resolve({
        status: 'error',
        exitCode: null,
        signal: null,
        durationMs: 0,
        stdout,
        stderr,
        errorMessage: 'empty command',
      });
      return;
    }

    let settled = false;
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
    let killHandle: ReturnType<typeof setTimeout> | null = null;

    const finalize = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) return;
      settled = true;

      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (killHandle) clearTimeout(killHandle);
      input.signal?.removeEventListener('abort', onAbort);

      let status: CommandStatus;
      if (spawnError !== null) status = 'error';
      else if (aborted) status = 'aborted';
      else if (timedOut) status = 'timeout';
      else status = exitCode === 0 ? 'pass' : 'fail';

      resolve({
        status,
        exitCode,
        signal,
        durationMs: Date.now() - startedAt,
        stdout,
        stderr,
        ...(spawnError === null ? {} : { errorMessage: spawnError }),
      });
    };

    if (input.signal?.aborted) {
      aborted = true;
      finalize(null, null);
      return;
    }

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(program, [...fixedArgs, ...input.args], {
        cwd: input.cwd,
        env: input.env,
        shell: false,
      });
    } catch (err: unknown) {
      spawnError = errorMessage(err);
      finalize(null, null);
      return;
    }

    const terminate = (): void => {
      child.kill('SIGTERM');
      killHandle = setTimeout(() => {
        child.kill('SIGKILL');
      }, forceKillAfterMs);
    };

    function onAbort(): void {
      aborted = true;
      terminate();
    }

    child.stdout?.on('data', (chunk: Buffer | string) => {
      stdout = appendTail(stdout, chunk.toString(), maxOutputBytes);
    });

    child.stderr?.on('data', (chunk: Buffer | string) => {
      stderr = appendTail(stderr, chunk.toString(), maxOutputBytes);
    });

    child.on('error', (err) => {
      spawnError = err.message;
      finalize(null, null);
    });

    child.on('close', (exitCode, signal) => {
      finalize(exitCode, signal);
    });

    input.signal?.addEventListener('abort', onAbort, { once: true });

    timeoutHandle = setTimeout(() => {
      timedOut = true;
      terminate();
    }, input.timeoutMs);
  });
}
