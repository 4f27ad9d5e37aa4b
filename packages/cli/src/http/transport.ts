import { SYNC_DEFAULTS, TransportError, describeError } from '@split-sync/shared';

export interface HttpRequest {
    url: string;
    method: 'GET' | 'POST';
    headers: Record<string, string>;
    body?: string;
    timeoutMs?: number;
}

export interface HttpResponse {
    status: number;
    body: unknown;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * fetch with a timeout. Network failures and timeouts become TransportError;
 * HTTP error statuses are returned for the client to interpret.
 */
export const fetchTransport: HttpTransport = async (input) => {
    const controller = new AbortController();
    const timeoutMs = input.timeoutMs ?? SYNC_DEFAULTS.REQUEST_TIMEOUT_MS;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(input.url, {
            method: input.method,
            headers: input.headers,
            body: input.body,
            signal: controller.signal,
        });

        // Error pages are not always JSON; an empty body still carries the status.
        const body: unknown = await response.json().catch(() => ({}));
        return { status: response.status, body };
    } catch (err) {
        if (controller.signal.aborted) {
            throw new TransportError(`${input.method} ${input.url} timed out after ${timeoutMs}ms`, { cause: err });
        }
        throw new TransportError(`${input.method} ${input.url} failed: ${describeError(err)}`, { cause: err });
    } finally {
        clearTimeout(timeout);
    }
};

/**
 * Readable detail from an API error body, for error messages.
 */
export function errorDetail(body: unknown): string | undefined {
    if (body === null || typeof body !== 'object') return undefined;
    if (Object.keys(body).length === 0) return undefined;
    return JSON.stringify(body);
}
