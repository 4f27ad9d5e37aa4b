import { z } from 'zod';
import { toIsoDate } from '@split-sync/core';
import {
    AccountNotFoundError,
    TransportError,
    type AccountHandle,
    type CandidateTransaction,
    type ImportedRecord,
    type ItemOutcome,
} from '@split-sync/shared';
import { errorDetail, fetchTransport, type HttpTransport } from '../http/transport.js';
import type { BudgetSink } from './types.js';
import { debug } from '../utils/console.js';

// ============================================================================
// Wire Schemas
// ============================================================================

const AccountsResponseSchema = z.object({
    data: z.object({
        accounts: z.array(z.object({
            id: z.string(),
            name: z.string(),
            closed: z.boolean().optional(),
            deleted: z.boolean().optional(),
        })),
    }),
});

const TransactionsResponseSchema = z.object({
    data: z.object({
        transactions: z.array(z.object({
            id: z.string(),
            date: z.string(),
            amount: z.number().int(),
            memo: z.string().nullish(),
            payee_name: z.string().nullish(),
            import_id: z.string().nullish(),
            deleted: z.boolean().optional(),
        })),
    }),
});

const CreateResponseSchema = z.object({
    data: z.object({
        transaction_ids: z.array(z.string()).optional(),
        duplicate_import_ids: z.array(z.string()).nullish(),
        transactions: z.array(z.object({
            id: z.string(),
            import_id: z.string().nullish(),
        })).nullish(),
    }),
});

const ErrorResponseSchema = z.object({
    error: z.object({
        id: z.string().optional(),
        name: z.string().optional(),
        detail: z.string().optional(),
    }),
});

export interface YnabClientConfig {
    apiUrl: string;
    accessToken: string;
    budgetId: string;
    timeoutMs?: number;
}

/**
 * YNAB API client for one budget.
 */
export class YnabClient implements BudgetSink {
    constructor(
        private readonly config: YnabClientConfig,
        private readonly transport: HttpTransport = fetchTransport,
    ) {}

    async findAccount(name: string): Promise<AccountHandle> {
        const body = await this.get(`/budgets/${this.budgetPath()}/accounts`);
        const parsed = parseOrThrow(AccountsResponseSchema, body, 'accounts');

        const accounts = parsed.data.accounts.filter(a => !a.deleted);
        const match = accounts.find(a => a.name === name);
        if (!match) {
            throw new AccountNotFoundError(name, accounts.map(a => a.name));
        }
        return { id: match.id, name: match.name };
    }

    /**
     * Account transactions dated on or after `since`, deleted ones included
     * (their import ids stay reserved).
     */
    async fetchAccountTransactions(account: AccountHandle, since: string): Promise<ImportedRecord[]> {
        const params = new URLSearchParams({ since_date: since });
        const body = await this.get(
            `/budgets/${this.budgetPath()}/accounts/${encodeURIComponent(account.id)}/transactions?${params.toString()}`
        );
        const parsed = parseOrThrow(TransactionsResponseSchema, body, 'transactions');

        const records: ImportedRecord[] = [];
        for (const txn of parsed.data.transactions) {
            const date = toIsoDate(txn.date);
            if (!date) {
                throw new TransportError(`Invalid YNAB response: transaction ${txn.id} has date ${txn.date}`);
            }
            records.push({
                id: txn.id,
                external_id: txn.import_id ?? null,
                amount: txn.amount,
                payee: txn.payee_name ?? null,
                occurrence_date: date,
                memo: txn.memo ?? null,
                deleted: txn.deleted ?? false,
            });
        }
        debug(`Fetched ${records.length} transactions from '${account.name}' since ${since}`);
        return records;
    }

    /**
     * Create transactions in one request.
     *
     * Per-item outcomes come from the returned import ids and
     * duplicate_import_ids. A 400 means YNAB refused the payload as a whole
     * and surfaces as a TransportError with status 400, so the caller can
     * resubmit item by item.
     */
    async createTransactions(
        account: AccountHandle,
        candidates: readonly CandidateTransaction[]
    ): Promise<ItemOutcome[]> {
        if (candidates.length === 0) return [];

        const payload = {
            transactions: candidates.map(c => ({
                account_id: account.id,
                date: c.occurrence_date,
                amount: c.amount_minor_units,
                payee_name: c.payee,
                memo: c.memo,
                cleared: c.cleared,
                approved: false,
                import_id: c.external_id,
            })),
        };

        const response = await this.transport({
            url: `${this.config.apiUrl}/budgets/${this.budgetPath()}/transactions`,
            method: 'POST',
            headers: this.headers(),
            body: JSON.stringify(payload),
            timeoutMs: this.config.timeoutMs,
        });

        assertOk(response.status, response.body, 'creating transactions');

        const parsed = parseOrThrow(CreateResponseSchema, response.body, 'created transactions');
        const duplicates = new Set(parsed.data.duplicate_import_ids ?? []);
        const created = new Map<string, string>();
        for (const txn of parsed.data.transactions ?? []) {
            if (txn.import_id) created.set(txn.import_id, txn.id);
        }

        return candidates.map((c): ItemOutcome => {
            const transactionId = created.get(c.external_id);
            if (transactionId !== undefined) {
                return { status: 'accepted', external_id: c.external_id, transaction_id: transactionId };
            }
            if (duplicates.has(c.external_id)) {
                return { status: 'duplicate', external_id: c.external_id };
            }
            return { status: 'rejected', external_id: c.external_id, reason: 'Not created by YNAB' };
        });
    }

    private async get(path: string): Promise<unknown> {
        const response = await this.transport({
            url: `${this.config.apiUrl}${path}`,
            method: 'GET',
            headers: this.headers(),
            timeoutMs: this.config.timeoutMs,
        });
        assertOk(response.status, response.body, `GET ${path.split('?')[0]}`);
        return response.body;
    }

    private headers(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.config.accessToken}`,
            Accept: 'application/json',
            'Content-Type': 'application/json',
        };
    }

    private budgetPath(): string {
        return encodeURIComponent(this.config.budgetId);
    }
}

function assertOk(status: number, body: unknown, operation: string): void {
    if (status >= 200 && status < 300) return;
    throw new TransportError(`YNAB API error during ${operation}: HTTP ${status}`, {
        status,
        details: ynabErrorDetail(body) ?? errorDetail(body),
    });
}

function ynabErrorDetail(body: unknown): string | undefined {
    const parsed = ErrorResponseSchema.safeParse(body);
    if (!parsed.success) return undefined;
    return parsed.data.error.detail ?? parsed.data.error.name;
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new TransportError(`Invalid YNAB response: unexpected ${what} payload`, {
            details: parsed.error.message,
        });
    }
    return parsed.data;
}
