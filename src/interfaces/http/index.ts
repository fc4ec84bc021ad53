export { default as ledgerPlugin } from './ledger-plugin.js';
export type { LedgerPluginOptions } from './ledger-plugin.js';
export { default as errorHandler, statusForCode } from './error-handler.js';
export { default as updateRoutes } from './update-routes.js';
export { default as auditRoutes } from './audit-routes.js';
