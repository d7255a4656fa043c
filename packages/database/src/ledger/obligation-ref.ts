/**
 * Obligation references
 *
 * A ledger entry points at exactly one obligation. Inputs arrive in the
 * loose form (three optional ids); the ledger works with the tagged form
 * and stores it as obligation_kind plus one non-null FK column.
 */

import type { LooseObligationRef } from '@finledger/shared/schemas';
import type { ObligationKind } from '../schema';
import type { LockKey } from '../locking';
import { InvalidObligationReferenceError } from './errors';

export type ObligationRef =
  | { kind: 'fixed'; fixedPaymentId: number }
  | { kind: 'variable'; variablePaymentId: number }
  | { kind: 'credit_card_invoice'; invoiceId: number };

/**
 * Reference columns of obligation_statuses
 */
export interface ObligationRefColumns {
  obligationKind: ObligationKind;
  fixedPaymentId: number | null;
  variablePaymentId: number | null;
  creditCardInvoiceId: number | null;
}

/**
 * Convert the loose form to a tagged reference
 *
 * @throws InvalidObligationReferenceError unless exactly one id is set
 */
export function toObligationRef(loose: LooseObligationRef): ObligationRef {
  const candidates: ObligationRef[] = [];
  if (loose.fixedPaymentId != null) {
    candidates.push({ kind: 'fixed', fixedPaymentId: loose.fixedPaymentId });
  }
  if (loose.variablePaymentId != null) {
    candidates.push({ kind: 'variable', variablePaymentId: loose.variablePaymentId });
  }
  if (loose.creditCardInvoiceId != null) {
    candidates.push({ kind: 'credit_card_invoice', invoiceId: loose.creditCardInvoiceId });
  }

  if (candidates.length !== 1) {
    throw new InvalidObligationReferenceError(
      candidates.length === 0
        ? 'Obligation reference must name one of fixedPaymentId, variablePaymentId, creditCardInvoiceId'
        : 'Obligation reference must name exactly one obligation',
      { ...loose }
    );
  }

  return candidates[0];
}

export function obligationRefToColumns(ref: ObligationRef): ObligationRefColumns {
  switch (ref.kind) {
    case 'fixed':
      return { obligationKind: 'fixed', fixedPaymentId: ref.fixedPaymentId, variablePaymentId: null, creditCardInvoiceId: null };
    case 'variable':
      return { obligationKind: 'variable', fixedPaymentId: null, variablePaymentId: ref.variablePaymentId, creditCardInvoiceId: null };
    case 'credit_card_invoice':
      return { obligationKind: 'credit_card_invoice', fixedPaymentId: null, variablePaymentId: null, creditCardInvoiceId: ref.invoiceId };
  }
}

/**
 * Rebuild the tagged reference from stored columns
 *
 * @throws InvalidObligationReferenceError if the row breaks the
 *   one-reference-matching-kind invariant
 */
export function obligationRefFromRow(row: ObligationRefColumns): ObligationRef {
  const ref = toObligationRef({
    fixedPaymentId: row.fixedPaymentId ?? undefined,
    variablePaymentId: row.variablePaymentId ?? undefined,
    creditCardInvoiceId: row.creditCardInvoiceId ?? undefined,
  });

  if (ref.kind !== row.obligationKind) {
    throw new InvalidObligationReferenceError(
      `Obligation kind ${row.obligationKind} does not match its ${ref.kind} reference`,
      { ...row }
    );
  }

  return ref;
}

export function obligationRefId(ref: ObligationRef): number {
  switch (ref.kind) {
    case 'fixed':
      return ref.fixedPaymentId;
    case 'variable':
      return ref.variablePaymentId;
    case 'credit_card_invoice':
      return ref.invoiceId;
  }
}

// e.g. "fixed:12"
export function describeObligationRef(ref: ObligationRef): string {
  return `${ref.kind}:${obligationRefId(ref)}`;
}

/**
 * Scheduling serializes per referenced obligation
 */
export function lockKeyForRef(ref: ObligationRef): LockKey {
  switch (ref.kind) {
    case 'fixed':
      return { scope: 'fixed_payment', id: ref.fixedPaymentId };
    case 'variable':
      return { scope: 'variable_payment', id: ref.variablePaymentId };
    case 'credit_card_invoice':
      return { scope: 'credit_card_invoice', id: ref.invoiceId };
  }
}
