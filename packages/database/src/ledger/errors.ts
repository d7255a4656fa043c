/**
 * Ledger Error Classes
 *
 * Every failure the ledger reports on purpose is a LedgerError with a stable
 * `code`. Callers (the tRPC layer) map codes to transport errors; anything
 * else reaching them is an unexpected system error.
 */

export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_CLOSED'
  | 'DUPLICATE_OBLIGATION_PERIOD'
  | 'INVOICE_SEQUENCE_EXISTS'
  | 'INACTIVE_CARD'
  | 'MISSING_RATE'
  | 'INVALID_OBLIGATION_REFERENCE'
  | 'CURRENCY_MISMATCH'
  | 'LOCK_TIMEOUT';

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class NotFoundError extends LedgerError {
  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Close attempted on an invoice that is already closed
 *
 * Also what the losing side of two concurrent closes receives.
 */
export class AlreadyClosedError extends LedgerError {
  constructor(invoiceId: number) {
    super(`Invoice ${invoiceId} is already closed`, 'ALREADY_CLOSED', { invoiceId });
    this.name = 'AlreadyClosedError';
  }
}

export class DuplicateObligationPeriodError extends LedgerError {
  constructor(reference: string, monthYear: string) {
    super(
      `Obligation ${reference} already has a status for ${monthYear}`,
      'DUPLICATE_OBLIGATION_PERIOD',
      { reference, monthYear }
    );
    this.name = 'DuplicateObligationPeriodError';
  }
}

export class InvoiceSequenceExistsError extends LedgerError {
  constructor(cardId: number) {
    super(`Card ${cardId} already has invoices`, 'INVOICE_SEQUENCE_EXISTS', { cardId });
    this.name = 'InvoiceSequenceExistsError';
  }
}

export class InactiveCardError extends LedgerError {
  constructor(cardId: number) {
    super(`Card ${cardId} is not active`, 'INACTIVE_CARD', { cardId });
    this.name = 'InactiveCardError';
  }
}

export class MissingRateError extends LedgerError {
  constructor(fromCurrency: string, toCurrency: string, date: string, policy: string) {
    super(
      `No ${fromCurrency}->${toCurrency} exchange rate for ${date} (policy ${policy})`,
      'MISSING_RATE',
      { fromCurrency, toCurrency, date, policy }
    );
    this.name = 'MissingRateError';
  }
}

export class InvalidObligationReferenceError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_OBLIGATION_REFERENCE', details);
    this.name = 'InvalidObligationReferenceError';
  }
}

/**
 * Entry currency that can't be reconciled with its obligation's
 *
 * Invoice entries must be in the card currency; other entries need an
 * explicit amount when scheduled in a currency other than the obligation's.
 */
export class CurrencyMismatchError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CURRENCY_MISMATCH', details);
    this.name = 'CurrencyMismatchError';
  }
}

export class LockTimeoutError extends LedgerError {
  constructor(operation: string, durationMs: number) {
    super(
      'Ledger temporarily busy. Please try again in a few seconds.',
      'LOCK_TIMEOUT',
      { operation, durationMs }
    );
    this.name = 'LockTimeoutError';
  }
}

/**
 * PostgreSQL unique_violation (23505), on the error or its cause
 */
export function isUniqueViolation(error: unknown): boolean {
  return hasPgCode(error, '23505');
}

/**
 * Check an error (or the error it wraps) for a PostgreSQL SQLSTATE
 */
export function hasPgCode(error: unknown, code: string): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && error.code === code) {
    return true;
  }
  return error.cause !== undefined && error.cause !== error && hasPgCode(error.cause, code);
}
