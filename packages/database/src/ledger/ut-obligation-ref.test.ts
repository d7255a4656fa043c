/**
 * Obligation Reference Tests
 */

import { describe, it, expect } from 'vitest';
import {
  describeObligationRef,
  lockKeyForRef,
  obligationRefFromRow,
  obligationRefToColumns,
  toObligationRef,
} from './obligation-ref';
import { InvalidObligationReferenceError } from './errors';

describe('toObligationRef', () => {
  it('should tag each single-id form', () => {
    expect(toObligationRef({ fixedPaymentId: 3 })).toEqual({ kind: 'fixed', fixedPaymentId: 3 });
    expect(toObligationRef({ variablePaymentId: 4 })).toEqual({ kind: 'variable', variablePaymentId: 4 });
    expect(toObligationRef({ creditCardInvoiceId: 5 })).toEqual({ kind: 'credit_card_invoice', invoiceId: 5 });
  });

  it('should reject zero ids', () => {
    expect(() => toObligationRef({})).toThrow(InvalidObligationReferenceError);
  });

  it('should reject more than one id', () => {
    expect(() => toObligationRef({ fixedPaymentId: 1, creditCardInvoiceId: 2 }))
      .toThrow('Obligation reference must name exactly one obligation');
  });
});

describe('obligationRefFromRow', () => {
  it('should round-trip through the stored columns', () => {
    const columns = obligationRefToColumns({ kind: 'variable', variablePaymentId: 9 });

    expect(columns).toEqual({
      obligationKind: 'variable',
      fixedPaymentId: null,
      variablePaymentId: 9,
      creditCardInvoiceId: null,
    });
    expect(obligationRefFromRow(columns)).toEqual({ kind: 'variable', variablePaymentId: 9 });
  });

  it('should reject a kind that does not match the set column', () => {
    expect(() => obligationRefFromRow({
      obligationKind: 'fixed',
      fixedPaymentId: null,
      variablePaymentId: null,
      creditCardInvoiceId: 7,
    })).toThrow('Obligation kind fixed does not match its credit_card_invoice reference');
  });

  it('should reject a row with no reference', () => {
    expect(() => obligationRefFromRow({
      obligationKind: 'fixed',
      fixedPaymentId: null,
      variablePaymentId: null,
      creditCardInvoiceId: null,
    })).toThrow(InvalidObligationReferenceError);
  });
});

describe('reference helpers', () => {
  it('should describe and lock per obligation', () => {
    const ref = toObligationRef({ creditCardInvoiceId: 12 });

    expect(describeObligationRef(ref)).toBe('credit_card_invoice:12');
    expect(lockKeyForRef(ref)).toEqual({ scope: 'credit_card_invoice', id: 12 });
  });
});
