import { describe, it, expect, vi } from 'vitest';
import { AccountNotFoundError, TransportError, type CandidateTransaction } from '@split-sync/shared';
import { SplitwiseClient, toRawExpense } from '../src/clients/splitwise.js';
import { YnabClient } from '../src/clients/ynab.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../src/http/transport.js';

/**
 * Transport that answers from a queue and records every request.
 */
function fakeTransport(responses: HttpResponse[]) {
    const requests: HttpRequest[] = [];
    const transport: HttpTransport = vi.fn(async (request: HttpRequest) => {
        requests.push(request);
        const next = responses.shift();
        if (!next) throw new Error(`Unexpected request: ${request.method} ${request.url}`);
        return next;
    });
    return { transport, requests };
}

function wireExpense(id: number, overrides: Record<string, unknown> = {}) {
    return {
        id,
        description: 'Groceries',
        details: null,
        cost: '25.0',
        currency_code: 'USD',
        date: '2024-01-15T12:00:00Z',
        deleted_at: null,
        payment: false,
        users: [
            { user: { id: 100, first_name: 'Alex', last_name: 'Doe' }, user_id: 100, paid_share: '25.0', owed_share: '12.5' },
            { user: { id: 200, first_name: 'Sam', last_name: null }, user_id: 200, paid_share: '0.0', owed_share: '12.5' },
        ],
        ...overrides,
    };
}

describe('SplitwiseClient', () => {
    const config = { apiUrl: 'https://sw.test/api/v3.0', apiKey: 'test-secret' };

    it('should load the current user with a bearer token', async () => {
        const { transport, requests } = fakeTransport([
            { status: 200, body: { user: { id: 100, first_name: 'Alex', last_name: 'Doe', email: 'alex@example.com' } } },
        ]);
        const client = new SplitwiseClient(config, transport);

        const user = await client.getCurrentUser();

        expect(user).toEqual({ id: 100, display_name: 'Alex Doe', email: 'alex@example.com' });
        expect(requests[0].url).toBe('https://sw.test/api/v3.0/get_current_user');
        expect(requests[0].headers.Authorization).toBe('Bearer test-secret');
    });

    it('should page through expenses until a short page', async () => {
        const { transport, requests } = fakeTransport([
            { status: 200, body: { expenses: [wireExpense(1), wireExpense(2)] } },
            { status: 200, body: { expenses: [wireExpense(3)] } },
        ]);
        const client = new SplitwiseClient({ ...config, pageSize: 2 }, transport);

        const result = await client.fetchExpenses('2024-01-01');

        expect(result.expenses.map(e => e.source_id)).toEqual(['1', '2', '3']);
        expect(result.invalid).toEqual([]);
        expect(requests).toHaveLength(2);
        expect(requests[0].url).toBe(
            'https://sw.test/api/v3.0/get_expenses?dated_after=2024-01-01T00%3A00%3A00Z&limit=2&offset=0'
        );
        expect(requests[1].url).toContain('offset=2');
    });

    it('should drop expenses dated before the start date', async () => {
        const { transport } = fakeTransport([
            { status: 200, body: { expenses: [wireExpense(1, { date: '2023-12-31T23:00:00Z' }), wireExpense(2)] } },
        ]);
        const client = new SplitwiseClient(config, transport);

        const result = await client.fetchExpenses('2024-01-01');
        expect(result.expenses.map(e => e.source_id)).toEqual(['2']);
    });

    it('should report malformed expenses without failing the fetch', async () => {
        const { transport } = fakeTransport([
            { status: 200, body: { expenses: [wireExpense(1, { date: 'yesterday' }), wireExpense(2)] } },
        ]);
        const client = new SplitwiseClient(config, transport);

        const result = await client.fetchExpenses('2024-01-01');
        expect(result.expenses).toHaveLength(1);
        expect(result.invalid).toEqual([{ sourceId: '1', reason: 'Invalid expense date: yesterday' }]);
    });

    it('should raise TransportError on HTTP errors', async () => {
        const { transport } = fakeTransport([{ status: 401, body: { error: 'Invalid API request: you are not logged in' } }]);
        const client = new SplitwiseClient(config, transport);

        await expect(client.getCurrentUser()).rejects.toThrow('Splitwise API error: HTTP 401 for /get_current_user');
    });

    it('should raise TransportError when a 200 carries errors', async () => {
        const { transport } = fakeTransport([{ status: 200, body: { errors: { base: ['Invalid request'] } } }]);
        const client = new SplitwiseClient(config, transport);

        const failure = client.fetchExpenses('2024-01-01');
        await expect(failure).rejects.toBeInstanceOf(TransportError);
    });
});

describe('toRawExpense', () => {
    it('should normalize the wire format', () => {
        expect(toRawExpense(wireExpense(501, { details: 'Weekly shop' }))).toEqual({
            source_id: '501',
            description: 'Groceries',
            total_cost: '25.0',
            currency_code: 'USD',
            occurrence_date: '2024-01-15',
            deleted: false,
            notes: 'Weekly shop',
            is_payment: false,
            participants: [
                { user_id: 100, display_name: 'Alex Doe', paid_amount: '25.0', owed_amount: '12.5' },
                { user_id: 200, display_name: 'Sam', paid_amount: '0.0', owed_amount: '12.5' },
            ],
        });
    });

    it('should flag deleted expenses', () => {
        const result = toRawExpense(wireExpense(7, { deleted_at: '2024-01-16T08:00:00Z' }));
        expect('deleted' in result && result.deleted).toBe(true);
    });

    it('should describe why an item is not an expense', () => {
        expect(toRawExpense({ id: 9, cost: 'lots' })).toEqual({
            sourceId: '9',
            reason: expect.stringContaining('Malformed expense'),
        });
        expect(toRawExpense(null)).toEqual({ sourceId: 'unknown', reason: expect.stringContaining('Malformed expense') });
    });
});

describe('YnabClient', () => {
    const config = { apiUrl: 'https://ynab.test/v1', accessToken: 'test-token', budgetId: 'last-used' };
    const account = { id: 'acct-1', name: 'Splitwise (Wallet)' };

    const candidate = (sourceId: string): CandidateTransaction => ({
        external_id: `splitwise_${sourceId}`,
        source_id: sourceId,
        payee: 'Groceries',
        amount_minor_units: 12500,
        memo: `Splitwise ID: ${sourceId}`,
        occurrence_date: '2024-01-15',
        cleared: 'uncleared',
    });

    it('should find an open account by exact name', async () => {
        const { transport, requests } = fakeTransport([{
            status: 200,
            body: {
                data: {
                    accounts: [
                        { id: 'acct-0', name: 'Splitwise (Wallet)', deleted: true },
                        { id: 'acct-1', name: 'Splitwise (Wallet)', deleted: false },
                        { id: 'acct-2', name: 'Checking' },
                    ],
                },
            },
        }]);
        const client = new YnabClient(config, transport);

        await expect(client.findAccount('Splitwise (Wallet)')).resolves.toEqual(account);
        expect(requests[0].url).toBe('https://ynab.test/v1/budgets/last-used/accounts');
        expect(requests[0].headers.Authorization).toBe('Bearer test-token');
    });

    it('should list available accounts when the name is missing', async () => {
        const { transport } = fakeTransport([{
            status: 200,
            body: { data: { accounts: [{ id: 'acct-2', name: 'Checking' }] } },
        }]);
        const client = new YnabClient(config, transport);

        const error = await client.findAccount('Splitwise').catch((err: unknown) => err);
        expect(error).toBeInstanceOf(AccountNotFoundError);
        if (error instanceof AccountNotFoundError) {
            expect(error.message).toBe("Account 'Splitwise' not found");
            expect(error.details).toBe('Available accounts: Checking');
        }
    });

    it('should map account transactions to imported records', async () => {
        const { transport, requests } = fakeTransport([{
            status: 200,
            body: {
                data: {
                    transactions: [
                        { id: 't1', date: '2024-01-15', amount: 12500, memo: null, payee_name: 'Groceries', import_id: 'splitwise_501' },
                        { id: 't2', date: '2024-01-16', amount: -4000, payee_name: null, import_id: null, deleted: true },
                    ],
                },
            },
        }]);
        const client = new YnabClient(config, transport);

        const records = await client.fetchAccountTransactions(account, '2023-12-02');

        expect(requests[0].url).toBe('https://ynab.test/v1/budgets/last-used/accounts/acct-1/transactions?since_date=2023-12-02');
        expect(records).toEqual([
            { id: 't1', external_id: 'splitwise_501', amount: 12500, payee: 'Groceries', occurrence_date: '2024-01-15', memo: null, deleted: false },
            { id: 't2', external_id: null, amount: -4000, payee: null, occurrence_date: '2024-01-16', memo: null, deleted: true },
        ]);
    });

    it('should post candidates and report an outcome per item', async () => {
        const { transport, requests } = fakeTransport([{
            status: 201,
            body: {
                data: {
                    transaction_ids: ['new-1'],
                    duplicate_import_ids: ['splitwise_502'],
                    transactions: [{ id: 'new-1', import_id: 'splitwise_501' }],
                },
            },
        }]);
        const client = new YnabClient(config, transport);

        const outcomes = await client.createTransactions(account, [candidate('501'), candidate('502'), candidate('503')]);

        expect(outcomes).toEqual([
            { status: 'accepted', external_id: 'splitwise_501', transaction_id: 'new-1' },
            { status: 'duplicate', external_id: 'splitwise_502' },
            { status: 'rejected', external_id: 'splitwise_503', reason: 'Not created by YNAB' },
        ]);
        expect(requests[0].method).toBe('POST');
        expect(requests[0].url).toBe('https://ynab.test/v1/budgets/last-used/transactions');
        expect(JSON.parse(requests[0].body ?? '{}').transactions[0]).toEqual({
            account_id: 'acct-1',
            date: '2024-01-15',
            amount: 12500,
            payee_name: 'Groceries',
            memo: 'Splitwise ID: 501',
            cleared: 'uncleared',
            approved: false,
            import_id: 'splitwise_501',
        });
    });

    it('should not call the API for an empty batch', async () => {
        const { transport } = fakeTransport([]);
        const client = new YnabClient(config, transport);

        await expect(client.createTransactions(account, [])).resolves.toEqual([]);
        expect(transport).not.toHaveBeenCalled();
    });

    it('should surface a refused batch as a 400 TransportError with the API detail', async () => {
        const { transport } = fakeTransport([{
            status: 400,
            body: { error: { id: '400', name: 'bad_request', detail: 'payee_name is too long' } },
        }]);
        const client = new YnabClient(config, transport);

        const error = await client.createTransactions(account, [candidate('501')]).catch((err: unknown) => err);
        expect(error).toBeInstanceOf(TransportError);
        if (error instanceof TransportError) {
            expect(error.status).toBe(400);
            expect(error.details).toBe('payee_name is too long');
        }
    });
});
