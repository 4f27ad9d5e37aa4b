import Decimal from 'decimal.js';
import type { RawExpense } from '../types/index.js';
import { FALLBACK_PAYEE, SINK_LIMITS, describeError } from '../types/index.js';
import { calculateShare, toMinorUnits } from '../share/calculate.js';
import { formatMemo } from '../memo/format.js';
import { generateImportId } from '../identity/import-id.js';
import { clipText } from '../utils/text.js';
import type { DeriveOptions, DerivationOutcome, DerivationResult } from './types.js';

/**
 * Map one expense to at most one candidate transaction for a user.
 *
 * PURE FUNCTION: returns an outcome describing why no candidate was made
 * (deleted, not a participant, zero net) instead of logging it.
 *
 * @throws ValidationError for structurally invalid expenses
 */
export function deriveTransaction(
    expense: RawExpense,
    userId: number,
    options: DeriveOptions = {}
): DerivationOutcome {
    const sourceId = expense.source_id;

    if (expense.deleted) {
        return { kind: 'deleted', sourceId };
    }

    const share = calculateShare(expense, userId);
    if (!share.is_participant) {
        return { kind: 'not_participant', sourceId };
    }
    if (new Decimal(share.net_amount).isZero()) {
        return { kind: 'zero_net', sourceId, share };
    }

    const memo = formatMemo(
        {
            share,
            participants: expense.participants,
            targetUserId: userId,
            notes: expense.notes,
            sourceId,
            currencyCode: expense.currency_code,
            isPayment: expense.is_payment,
        },
        options.memoMaxLength ?? SINK_LIMITS.MEMO_MAX_LENGTH
    );

    return {
        kind: 'candidate',
        sourceId,
        share,
        candidate: {
            external_id: generateImportId(sourceId),
            source_id: sourceId,
            payee: toPayee(expense.description, options.payeeMaxLength ?? SINK_LIMITS.PAYEE_MAX_LENGTH),
            amount_minor_units: toMinorUnits(share.net_amount),
            memo,
            occurrence_date: expense.occurrence_date,
            cleared: 'uncleared',
        },
    };
}

/**
 * Derive a whole batch. A bad expense becomes a failure entry; the rest
 * of the batch is still derived.
 */
export function deriveTransactions(
    expenses: readonly RawExpense[],
    userId: number,
    options: DeriveOptions = {}
): DerivationResult {
    const result: DerivationResult = {
        candidates: [],
        failures: [],
        stats: { deleted: 0, notParticipant: 0, zeroNet: 0 },
    };

    for (const expense of expenses) {
        let outcome: DerivationOutcome;
        try {
            outcome = deriveTransaction(expense, userId, options);
        } catch (err) {
            result.failures.push({ sourceId: expense.source_id, reason: describeError(err), error: err });
            continue;
        }

        switch (outcome.kind) {
            case 'deleted':
                result.stats.deleted++;
                break;
            case 'not_participant':
                result.stats.notParticipant++;
                break;
            case 'zero_net':
                result.stats.zeroNet++;
                break;
            case 'candidate':
                result.candidates.push(outcome.candidate);
                break;
        }
    }

    return result;
}

function toPayee(description: string, maxLength: number): string {
    const payee = description.trim() || FALLBACK_PAYEE;
    return payee.length > maxLength ? clipText(payee, maxLength).trimEnd() : payee;
}
