/**
 * One-off (variable) payments
 *
 * A payment made with a card gets its FX and tax fees computed once, at
 * recording time, and stored with it. Later changes to the card's
 * percentages don't rewrite past fees.
 */

import { eq } from 'drizzle-orm';
import { calculateTransactionFees, type TransactionFees } from '@finledger/shared/billing';
import type { DBClock } from '@finledger/shared/db-clock';
import type { RecordVariablePaymentInput } from '@finledger/shared/schemas';
import type { Database } from '../db';
import { creditCards, variablePayments, type VariablePayment } from '../schema';
import { InactiveCardError, NotFoundError } from './errors';

export interface RecordedVariablePayment {
  payment: VariablePayment;
  fees: TransactionFees;
}

function noFees(amountCents: number): TransactionFees {
  return { fxFeeCents: 0, taxFeeCents: 0, totalWithFeesCents: amountCents };
}

/**
 * @throws NotFoundError if `creditCardId` names no card
 * @throws InactiveCardError if the card is deactivated
 */
export async function recordVariablePayment(
  database: Database,
  input: RecordVariablePaymentInput,
  clock: DBClock
): Promise<RecordedVariablePayment> {
  return await database.transaction(async (tx) => {
    let fees = noFees(input.amountCents);

    if (input.creditCardId != null) {
      const [card] = await tx
        .select()
        .from(creditCards)
        .where(eq(creditCards.cardId, input.creditCardId))
        .limit(1);

      if (!card) {
        throw new NotFoundError('Credit card', input.creditCardId);
      }
      if (!card.isActive) {
        throw new InactiveCardError(card.cardId);
      }

      fees = calculateTransactionFees(input.amountCents, input.currency, card);
    }

    const now = clock.now();
    const [payment] = await tx
      .insert(variablePayments)
      .values({
        date: input.date,
        description: input.description,
        amountCents: input.amountCents,
        currency: input.currency,
        country: input.country,
        category: input.category,
        creditCardId: input.creditCardId ?? null,
        fxFeeCents: fees.fxFeeCents,
        taxFeeCents: fees.taxFeeCents,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    console.log(
      `[LEDGER] Recorded variable payment ${payment.variablePaymentId}: ${payment.amountCents} ${payment.currency}` +
      (fees.totalWithFeesCents !== payment.amountCents ? ` (+fx ${fees.fxFeeCents}, +tax ${fees.taxFeeCents})` : '')
    );
    return { payment, fees };
  });
}
