import { z } from 'zod';
import { toIsoDate } from '@split-sync/core';
import {
    RawExpenseSchema,
    SYNC_DEFAULTS,
    TransportError,
    type CurrentUser,
    type RawExpense,
} from '@split-sync/shared';
import { errorDetail, fetchTransport, type HttpTransport } from '../http/transport.js';
import type { ExpenseSource, FetchedExpenses, InvalidExpense } from './types.js';
import { debug } from '../utils/console.js';

// ============================================================================
// Wire Schemas
// ============================================================================

const SplitwiseUserSchema = z.object({
    id: z.number().int(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    email: z.string().nullish(),
});

const SplitwiseShareSchema = z.object({
    user: SplitwiseUserSchema.partial().nullish(),
    user_id: z.number().int(),
    paid_share: z.string(),
    owed_share: z.string(),
});

const SplitwiseExpenseSchema = z.object({
    id: z.number().int(),
    description: z.string().nullish(),
    details: z.string().nullish(),
    cost: z.string(),
    currency_code: z.string(),
    date: z.string(),
    deleted_at: z.string().nullish(),
    payment: z.boolean().nullish(),
    users: z.array(SplitwiseShareSchema),
});

const CurrentUserResponseSchema = z.object({ user: SplitwiseUserSchema });
const ExpensesResponseSchema = z.object({ expenses: z.array(z.unknown()) });

type SplitwiseExpense = z.infer<typeof SplitwiseExpenseSchema>;

export interface SplitwiseClientConfig {
    apiUrl: string;
    apiKey: string;
    pageSize?: number;
    timeoutMs?: number;
}

/**
 * Read-only Splitwise API client.
 *
 * Every response is parsed into RawExpense here; nothing past this class
 * sees Splitwise's wire format.
 */
export class SplitwiseClient implements ExpenseSource {
    private readonly pageSize: number;

    constructor(
        private readonly config: SplitwiseClientConfig,
        private readonly transport: HttpTransport = fetchTransport,
    ) {
        this.pageSize = config.pageSize ?? SYNC_DEFAULTS.SOURCE_PAGE_SIZE;
    }

    async getCurrentUser(): Promise<CurrentUser> {
        const body = await this.get('/get_current_user');
        const parsed = CurrentUserResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new TransportError('Invalid Splitwise response: missing user data', {
                details: parsed.error.message,
            });
        }

        const user = parsed.data.user;
        return {
            id: user.id,
            display_name: displayName(user.first_name, user.last_name),
            email: user.email ?? undefined,
        };
    }

    /**
     * Pages through /get_expenses until a short page comes back.
     * dated_after is applied server side and re-checked here so the start
     * date is always inclusive.
     */
    async fetchExpenses(since: string): Promise<FetchedExpenses> {
        const result: FetchedExpenses = { expenses: [], invalid: [] };
        let offset = 0;

        while (true) {
            const params = new URLSearchParams({
                dated_after: `${since}T00:00:00Z`,
                limit: String(this.pageSize),
                offset: String(offset),
            });
            const body = await this.get(`/get_expenses?${params.toString()}`);
            const parsed = ExpensesResponseSchema.safeParse(body);
            if (!parsed.success) {
                throw new TransportError('Invalid Splitwise response: missing expenses data', {
                    details: parsed.error.message,
                });
            }

            const page = parsed.data.expenses;
            debug(`Fetched ${page.length} expenses at offset ${offset}`);

            for (const item of page) {
                const converted = toRawExpense(item);
                if ('reason' in converted) {
                    result.invalid.push(converted);
                } else if (converted.occurrence_date >= since) {
                    result.expenses.push(converted);
                }
            }

            if (page.length < this.pageSize) break;
            offset += this.pageSize;
        }

        return result;
    }

    private async get(path: string): Promise<unknown> {
        const url = `${this.config.apiUrl}${path}`;
        const response = await this.transport({
            url,
            method: 'GET',
            headers: {
                Authorization: `Bearer ${this.config.apiKey}`,
                Accept: 'application/json',
            },
            timeoutMs: this.config.timeoutMs,
        });

        if (response.status < 200 || response.status >= 300) {
            throw new TransportError(`Splitwise API error: HTTP ${response.status} for ${path.split('?')[0]}`, {
                status: response.status,
                details: errorDetail(response.body),
            });
        }

        const errors = apiErrors(response.body);
        if (errors) {
            throw new TransportError('Splitwise API error', { status: response.status, details: errors });
        }
        return response.body;
    }
}

/**
 * Wire expense → RawExpense, or the reason it can't be one.
 */
export function toRawExpense(item: unknown): RawExpense | InvalidExpense {
    const sourceId = sourceIdOf(item);

    const wire = SplitwiseExpenseSchema.safeParse(item);
    if (!wire.success) {
        return { sourceId, reason: `Malformed expense: ${wire.error.issues[0]?.message ?? 'unknown issue'}` };
    }

    const occurrenceDate = toIsoDate(wire.data.date);
    if (!occurrenceDate) {
        return { sourceId, reason: `Invalid expense date: ${wire.data.date}` };
    }

    const expense = RawExpenseSchema.safeParse(fromWire(wire.data, occurrenceDate));
    if (!expense.success) {
        const issue = expense.error.issues[0];
        return { sourceId, reason: `Malformed expense: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}` };
    }
    return expense.data;
}

function fromWire(expense: SplitwiseExpense, occurrenceDate: string): RawExpense {
    return {
        source_id: String(expense.id),
        description: expense.description ?? '',
        total_cost: expense.cost,
        currency_code: expense.currency_code,
        occurrence_date: occurrenceDate,
        deleted: Boolean(expense.deleted_at),
        notes: expense.details ?? '',
        is_payment: expense.payment ?? false,
        participants: expense.users.map(share => ({
            user_id: share.user_id,
            display_name: displayName(share.user?.first_name, share.user?.last_name),
            paid_amount: share.paid_share,
            owed_amount: share.owed_share,
        })),
    };
}

function displayName(first: string | null | undefined, last: string | null | undefined): string {
    return `${first ?? ''} ${last ?? ''}`.trim();
}

function sourceIdOf(item: unknown): string {
    if (item !== null && typeof item === 'object' && 'id' in item) {
        const id = item.id;
        if (typeof id === 'number' || typeof id === 'string') return String(id);
    }
    return 'unknown';
}

/**
 * Splitwise reports some failures as 200 with an "errors" member.
 */
function apiErrors(body: unknown): string | null {
    if (body === null || typeof body !== 'object' || !('errors' in body)) return null;
    const errors = body.errors;
    if (!errors) return null;
    if (Array.isArray(errors)) return errors.length > 0 ? JSON.stringify(errors) : null;
    if (typeof errors === 'object') return Object.keys(errors).length > 0 ? JSON.stringify(errors) : null;
    return String(errors);
}
