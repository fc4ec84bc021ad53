export { events, updates } from './schema.js';
export type { EventRow, UpdateRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Executor, DbClientOptions } from './client.js';
export { migrate } from './migrate.js';
export { PgLedger, PgEventLog, PgUpdateRecordStore, isUniqueViolation } from './pg-ledger.js';
