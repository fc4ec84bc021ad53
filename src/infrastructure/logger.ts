import { mkdirSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { createStream } from 'rotating-file-stream';
import type { RotatingFileStream } from 'rotating-file-stream';
import type { LogRotationConfig, TelemetryConfig } from './config/index.js';

/** Console stream for log lines. One-shot CLI commands keep stdout for their output. */
export type LogConsole = 'stdout' | 'stderr';

export interface LoggerConfig {
  telemetry: TelemetryConfig;
  log_rotation: LogRotationConfig;
}

/**
 * Name of the n-th rotated file: `update-ledger.log.1` is the newest.
 * Called with no number for the live file.
 */
export function rotatedFileName(file: string, index: number | null, compress: boolean): string {
  const name = basename(file);
  if (index === null || index <= 0) return name;
  return compress ? `${name}.${index}.gz` : `${name}.${index}`;
}

/**
 * Size-rotated log file. Keeps `max_files` rotated copies, numbered from
 * the newest, gzipped when `compress` is on.
 */
export function openLogFile(file: string, rotation: LogRotationConfig): RotatingFileStream {
  const dir = dirname(file);
  mkdirSync(dir, { recursive: true });

  return createStream(
    (time) => rotatedFileName(file, typeof time === 'number' ? time : null, rotation.compress),
    {
      path: dir,
      size: `${rotation.max_size_mb}M`,
      rotate: rotation.max_files,
      ...(rotation.compress ? { compress: 'gzip' } : {}),
    },
  );
}

function formatted(telemetry: TelemetryConfig, target: DestinationStream | number): DestinationStream {
  if (telemetry.log_format === 'plain') {
    return PinoPretty({ destination: target, colorize: false, translateTime: 'SYS:standard' });
  }
  return typeof target === 'number' ? pino.destination(target) : target;
}

/**
 * Builds the process logger from the telemetry and log_rotation sections.
 * `file` and `both` create the log directory on demand.
 */
export function createLogger(config: LoggerConfig, screenTarget: LogConsole = 'stdout'): Logger {
  const { telemetry } = config;
  const options = { level: telemetry.log_level };
  const screen = (): DestinationStream => formatted(telemetry, screenTarget === 'stdout' ? 1 : 2);

  if (telemetry.log_output === 'stdout' || telemetry.log_file === undefined) {
    return pino(options, screen());
  }

  const file = formatted(telemetry, openLogFile(telemetry.log_file, config.log_rotation));
  if (telemetry.log_output === 'file') {
    return pino(options, file);
  }

  // the root level already drops everything when silent
  const level: Level = telemetry.log_level === 'silent' ? 'fatal' : telemetry.log_level;
  return pino(options, pino.multistream([
    { level, stream: screen() },
    { level, stream: file },
  ]));
}
