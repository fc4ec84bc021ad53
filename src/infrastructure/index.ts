export { loadConfig, ConfigError } from './config/index.js';
export type { AppConfig, ApplierConfig, TelemetryConfig, LogRotationConfig } from './config/index.js';
export { createLogger } from './logger.js';
export type { LogConsole } from './logger.js';
export { createApplier, CommandApplier, NoopApplier } from './appliers/index.js';
export { createDbClient, migrate, PgLedger } from './db/index.js';
export type { Database } from './db/index.js';
export { InMemoryLedger } from './memory/in-memory-ledger.js';
export type { InMemoryLedgerOptions } from './memory/in-memory-ledger.js';
export { publishLedgerEvent, connectRedis, LEDGER_EVENTS_CHANNEL } from './redis/index.js';
