export { publishLedgerEvent, connectRedis, toMessage, LEDGER_EVENTS_CHANNEL } from './event-notifier.js';
export type { LedgerEventMessage } from './event-notifier.js';
