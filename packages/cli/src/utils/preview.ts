import Decimal from 'decimal.js';
import { clipText } from '@split-sync/core';
import { MILLIUNITS_PER_UNIT, type CandidateTransaction, type RunSummary } from '@split-sync/shared';

const MEMO_PREVIEW_LENGTH = 60;
const PAYEE_COLUMN_WIDTH = 30;

/**
 * Signed display amount from ledger milliunits: 12500 → "+12.50".
 */
export function formatMilliunits(amount: number): string {
    const value = new Decimal(amount).div(MILLIUNITS_PER_UNIT);
    const sign = value.isNegative() ? '-' : '+';
    return `${sign}${value.abs().toFixed(2)}`;
}

function truncate(text: string, length: number): string {
    return text.length > length ? `${clipText(text, length - 3)}...` : text;
}

/**
 * One line per candidate, numbered in the order given (1-based).
 */
export function formatCandidateTable(candidates: readonly CandidateTransaction[]): string[] {
    const width = String(candidates.length).length;
    return candidates.map((c, i) => {
        const position = String(i + 1).padStart(width);
        const amount = formatMilliunits(c.amount_minor_units).padStart(11);
        const payee = truncate(c.payee, PAYEE_COLUMN_WIDTH).padEnd(PAYEE_COLUMN_WIDTH);
        return `${position}. ${c.occurrence_date} | ${amount} | ${payee} | ${truncate(c.memo, MEMO_PREVIEW_LENGTH)}`;
    });
}

/**
 * Count lines for the terminal summary.
 */
export function formatSummaryCounts(summary: RunSummary): string[] {
    const skipped = summary.skipped_deleted + summary.skipped_not_participant + summary.skipped_zero_net;
    return [
        `Fetched expenses: ${summary.fetched}`,
        `Skipped: ${skipped} (deleted ${summary.skipped_deleted}, not a participant ${summary.skipped_not_participant}, zero net ${summary.skipped_zero_net})`,
        `Candidates: ${summary.candidates}`,
        `Duplicates: ${summary.duplicates}`,
        `Ambiguous: ${summary.ambiguous}`,
        `Deselected: ${summary.deselected}`,
        `Imported: ${summary.imported}`,
        `Failed: ${summary.failed}`,
    ];
}
