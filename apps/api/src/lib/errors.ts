/**
 * Ledger error → tRPC error mapping
 */

import { TRPCError } from '@trpc/server';
import type { LedgerError, LedgerErrorCode } from '@finledger/database/ledger';

export const LEDGER_ERROR_TRPC_CODE: Record<LedgerErrorCode, TRPCError['code']> = {
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_CLOSED: 'CONFLICT',
  DUPLICATE_OBLIGATION_PERIOD: 'CONFLICT',
  INVOICE_SEQUENCE_EXISTS: 'CONFLICT',
  INACTIVE_CARD: 'PRECONDITION_FAILED',
  MISSING_RATE: 'PRECONDITION_FAILED',
  INVALID_OBLIGATION_REFERENCE: 'BAD_REQUEST',
  CURRENCY_MISMATCH: 'BAD_REQUEST',
  // Maps to HTTP 408, indicates retryable
  LOCK_TIMEOUT: 'TIMEOUT',
};

export function toTRPCError(error: LedgerError): TRPCError {
  return new TRPCError({
    code: LEDGER_ERROR_TRPC_CODE[error.code],
    message: error.message,
    cause: error,
  });
}
