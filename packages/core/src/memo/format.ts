import type { Participant, ShareResult } from '../types/index.js';
import { MEMO, SINK_LIMITS } from '../types/index.js';
import { formatCurrency } from '../utils/currency.js';
import { clipText } from '../utils/text.js';

/**
 * Everything the memo is rendered from. Optional text may be empty.
 */
export interface MemoInput {
    share: ShareResult;
    participants: readonly Participant[];
    targetUserId: number;
    notes: string;
    sourceId: string;
    currencyCode: string;
    /** Settle-up payment between members rather than a shared cost. */
    isPayment?: boolean;
}

/**
 * Render the single-line memo for a budget transaction.
 *
 * Segments, each only when its data is non-empty, joined by " | ":
 *   [Settle-up payment |] Paid: $25.00, Owed: $12.50 | With: Jane Smith | Notes: ... | Splitwise ID: 501
 *
 * When the memo exceeds maxLength, the source id segment is kept whole and
 * the text before it is cut. The id is the fallback duplicate marker when
 * a transaction's import id is lost (e.g. the user re-enters it by hand).
 * A cap too small for the id segment drops its label before any digit.
 */
export function formatMemo(input: MemoInput, maxLength: number = SINK_LIMITS.MEMO_MAX_LENGTH): string {
    const head: string[] = [];

    if (input.isPayment) {
        head.push(MEMO.PAYMENT_LABEL);
    }
    if (input.share.is_participant) {
        const paid = formatCurrency(input.share.paid_amount, input.currencyCode);
        const owed = formatCurrency(input.share.owed_amount, input.currencyCode);
        head.push(`Paid: ${paid}, Owed: ${owed}`);
    }

    const others = input.participants
        .filter(p => p.user_id !== input.targetUserId)
        .map(p => p.display_name.trim())
        .filter(name => name.length > 0);
    if (others.length > 0) {
        head.push(`With: ${others.join(', ')}`);
    }

    const notes = singleLine(input.notes);
    if (notes) {
        head.push(`Notes: ${notes}`);
    }

    const idSegment = input.sourceId ? `${MEMO.SOURCE_LABEL}: ${input.sourceId}` : '';

    return fitMemo(head.join(MEMO.DELIMITER), idSegment, input.sourceId, maxLength);
}

function fitMemo(head: string, idSegment: string, sourceId: string, maxLength: number): string {
    const full = [head, idSegment].filter(s => s.length > 0).join(MEMO.DELIMITER);
    if (full.length <= maxLength) {
        return full;
    }

    if (!idSegment) {
        return truncateEnd(head, maxLength);
    }
    if (idSegment.length > maxLength) {
        return clipText(sourceId, maxLength);
    }

    const room = maxLength - idSegment.length - MEMO.DELIMITER.length;
    if (room <= MEMO.ELLIPSIS.length) {
        return idSegment;
    }
    return `${truncateEnd(head, room)}${MEMO.DELIMITER}${idSegment}`;
}

function truncateEnd(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    if (maxLength <= MEMO.ELLIPSIS.length) return clipText(text, maxLength);
    return clipText(text, maxLength - MEMO.ELLIPSIS.length).trimEnd() + MEMO.ELLIPSIS;
}

function singleLine(text: string): string {
    return text.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}
