/**
 * Ledger module exports
 *
 * InvoiceLifecycle, ObligationLedger and SummaryAggregator over the
 * finledger schema. Mutations take the Database (they open their own locked
 * transaction); queries accept a Database or a transaction.
 */

export * from './errors';
export { logInternalError, type LogInternalErrorParams, type NotificationSeverity } from './admin-notifications';
export * from './obligation-ref';
export * from './invoices';
export * from './obligations';
export * from './payments';
export * from './exchange-rates';
export * from './summary';
