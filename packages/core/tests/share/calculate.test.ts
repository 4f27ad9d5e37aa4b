import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { calculateShare, toMinorUnits } from '../../src/share/calculate.js';
import { ValidationError } from '../../src/types/index.js';
import { makeExpense, USER_ID, FRIEND_ID } from '../fixtures.js';

describe('calculateShare', () => {
    it('returns a positive net when the user paid more than their share', () => {
        const share = calculateShare(makeExpense(), USER_ID);
        expect(share).toEqual({
            is_participant: true,
            paid_amount: '25',
            owed_amount: '12.5',
            net_amount: '12.5',
        });
    });

    it('returns a negative net when someone else paid', () => {
        const expense = makeExpense({
            source_id: '502',
            total_cost: '40.00',
            participants: [
                { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: '0.00', owed_amount: '20.00' },
                { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '40.00', owed_amount: '20.00' },
            ],
        });
        expect(calculateShare(expense, USER_ID).net_amount).toBe('-20');
    });

    it('reports non-participants without throwing', () => {
        const share = calculateShare(makeExpense(), 999);
        expect(share.is_participant).toBe(false);
        expect(share.net_amount).toBe('0');
    });

    it('returns zero net for a fully offsetting share', () => {
        const expense = makeExpense({
            source_id: '503',
            total_cost: '10.00',
            participants: [
                { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: '10.00', owed_amount: '10.00' },
                { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '0.00', owed_amount: '0.00' },
            ],
        });
        expect(calculateShare(expense, USER_ID).net_amount).toBe('0');
    });

    it('rounds half to even at the currency minor unit', () => {
        const expense = (paid: string) => makeExpense({
            total_cost: paid,
            participants: [
                { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: paid, owed_amount: '0' },
                { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '0', owed_amount: paid },
            ],
        });
        expect(calculateShare(expense('10.125'), USER_ID).net_amount).toBe('10.12');
        expect(calculateShare(expense('10.135'), USER_ID).net_amount).toBe('10.14');
    });

    it('rounds to whole units for zero-decimal currencies', () => {
        const expense = makeExpense({
            currency_code: 'JPY',
            total_cost: '1000',
            participants: [
                { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: '1000', owed_amount: '333.5' },
                { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '0', owed_amount: '666.5' },
            ],
        });
        expect(calculateShare(expense, USER_ID).net_amount).toBe('666');
    });

    it('keeps the global balance: nets across all participants sum to zero', () => {
        const expense = makeExpense({
            total_cost: '90.00',
            participants: [
                { user_id: 1, display_name: 'A', paid_amount: '90.00', owed_amount: '30.00' },
                { user_id: 2, display_name: 'B', paid_amount: '0.00', owed_amount: '30.00' },
                { user_id: 3, display_name: 'C', paid_amount: '0.00', owed_amount: '30.00' },
            ],
        });
        const total = [1, 2, 3]
            .map(id => new Decimal(calculateShare(expense, id).net_amount))
            .reduce((sum, net) => sum.plus(net), new Decimal(0));
        expect(total.isZero()).toBe(true);
    });

    it('tolerates a one-cent rounding drift in share sums', () => {
        const expense = makeExpense({
            total_cost: '10.00',
            participants: [
                { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: '10.00', owed_amount: '3.33' },
                { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '0.00', owed_amount: '3.33' },
                { user_id: 300, display_name: 'Kim Park', paid_amount: '0.00', owed_amount: '3.33' },
            ],
        });
        expect(calculateShare(expense, USER_ID).net_amount).toBe('6.67');
    });

    it('throws ValidationError when paid shares do not balance', () => {
        const expense = makeExpense({ total_cost: '30.00' });
        expect(() => calculateShare(expense, USER_ID)).toThrow(ValidationError);
        expect(() => calculateShare(expense, USER_ID)).toThrow('Expense 501 paid shares don\'t balance');
    });

    it('throws ValidationError for an empty participant list', () => {
        expect(() => calculateShare(makeExpense({ participants: [] }), USER_ID))
            .toThrow('Expense 501 has no participants');
    });

    it('throws ValidationError when the user is listed twice', () => {
        const base = makeExpense();
        const expense = makeExpense({ participants: [...base.participants, base.participants[0]] });
        expect(() => calculateShare(expense, USER_ID)).toThrow(ValidationError);
    });

    it('is deterministic', () => {
        const expense = makeExpense();
        expect(calculateShare(expense, USER_ID)).toEqual(calculateShare(expense, USER_ID));
    });
});

describe('toMinorUnits', () => {
    it('scales to integer milliunits', () => {
        expect(toMinorUnits('12.5')).toBe(12500);
        expect(toMinorUnits('-20')).toBe(-20000);
        expect(toMinorUnits('0.01')).toBe(10);
    });
});
