import Decimal from 'decimal.js';
import type { Participant, RawExpense, ShareResult } from '../types/index.js';
import { MILLIUNITS_PER_UNIT, SHARE_BALANCE_TOLERANCE, ValidationError } from '../types/index.js';
import { currencyDecimals } from '../utils/currency.js';

const NOT_A_PARTICIPANT: ShareResult = {
    is_participant: false,
    paid_amount: '0',
    owed_amount: '0',
    net_amount: '0',
};

/**
 * Compute one user's share of an expense.
 *
 * net = paid - owed, rounded half-to-even to the currency's minor unit.
 * Positive net: the user is owed money back. Negative: the user owes.
 *
 * PURE FUNCTION: no I/O, deterministic for identical inputs.
 * Deleted expenses must be filtered out by the caller.
 *
 * @throws ValidationError when the participant list is empty, lists a user
 *   twice, or its paid/owed sums don't match the expense total
 */
export function calculateShare(expense: RawExpense, userId: number): ShareResult {
    const participant = findParticipant(expense, userId);
    if (!participant) {
        return { ...NOT_A_PARTICIPANT };
    }

    assertBalanced(expense);

    const paid = new Decimal(participant.paid_amount);
    const owed = new Decimal(participant.owed_amount);
    let net = paid.minus(owed).toDecimalPlaces(
        currencyDecimals(expense.currency_code),
        Decimal.ROUND_HALF_EVEN
    );
    if (net.isZero()) {
        // Drop the sign of -0 so it never reaches a memo or amount.
        net = new Decimal(0);
    }

    return {
        is_participant: true,
        paid_amount: paid.toFixed(),
        owed_amount: owed.toFixed(),
        net_amount: net.toFixed(),
    };
}

/**
 * Scale a decimal amount to the budget ledger's integer milliunits.
 * toMinorUnits('-20') → -20000
 */
export function toMinorUnits(amount: string): number {
    return new Decimal(amount)
        .times(MILLIUNITS_PER_UNIT)
        .toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN)
        .toNumber();
}

function findParticipant(expense: RawExpense, userId: number): Participant | undefined {
    if (expense.participants.length === 0) {
        throw new ValidationError(`Expense ${expense.source_id} has no participants`, {
            sourceId: expense.source_id,
        });
    }

    const matches = expense.participants.filter(p => p.user_id === userId);
    if (matches.length > 1) {
        throw new ValidationError(`Expense ${expense.source_id} lists user ${userId} more than once`, {
            sourceId: expense.source_id,
        });
    }
    return matches[0];
}

/**
 * Sum of paid shares and sum of owed shares must each equal the total cost.
 */
function assertBalanced(expense: RawExpense): void {
    const total = new Decimal(expense.total_cost);
    const tolerance = new Decimal(SHARE_BALANCE_TOLERANCE);

    const paidSum = expense.participants.reduce(
        (sum, p) => sum.plus(new Decimal(p.paid_amount)),
        new Decimal(0)
    );
    const owedSum = expense.participants.reduce(
        (sum, p) => sum.plus(new Decimal(p.owed_amount)),
        new Decimal(0)
    );

    if (paidSum.minus(total).abs().greaterThan(tolerance)) {
        throw new ValidationError(`Expense ${expense.source_id} paid shares don't balance`, {
            sourceId: expense.source_id,
            details: `paid sum ${paidSum.toFixed()} vs total ${total.toFixed()}`,
        });
    }
    if (owedSum.minus(total).abs().greaterThan(tolerance)) {
        throw new ValidationError(`Expense ${expense.source_id} owed shares don't balance`, {
            sourceId: expense.source_id,
            details: `owed sum ${owedSum.toFixed()} vs total ${total.toFixed()}`,
        });
    }
}
