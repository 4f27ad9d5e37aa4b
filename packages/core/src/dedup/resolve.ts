import type { CandidateTransaction, ImportedRecord } from '../types/index.js';
import { DuplicateCollisionError } from '../types/index.js';
import { isImportId } from '../identity/import-id.js';
import type { DuplicateMatch, Resolution } from './types.js';

/**
 * Decide which candidates may be imported.
 *
 * 1. A candidate repeating an import id already derived earlier in this run
 *    is ambiguous. The source feed is malformed; neither copy is trusted
 *    beyond the first, and the collision is reported.
 * 2. Import id present among the ledger's records → duplicate.
 * 3. Otherwise, exact (amount, date, payee) match against ledger records
 *    that carry no import id of ours and are not deleted → duplicate.
 *    Catches expenses the user entered by hand before syncing. This tier is
 *    approximate: two genuinely distinct same-day, same-amount, same-payee
 *    expenses are indistinguishable to it.
 *
 * PURE FUNCTION: reads the snapshot only, performs no I/O.
 *
 * @param candidates - All candidates of the run, in derivation order
 * @param imported - Ledger snapshot covering the run's date range
 */
export function resolveDuplicates(
    candidates: readonly CandidateTransaction[],
    imported: readonly ImportedRecord[]
): Resolution {
    const byImportId = new Map<string, string>();
    const byContent = new Map<string, string>();

    for (const record of imported) {
        if (record.external_id) {
            // Deleted records keep their import id reserved in the ledger.
            if (!byImportId.has(record.external_id)) {
                byImportId.set(record.external_id, record.id);
            }
        }
        if (!isImportId(record.external_id) && !record.deleted && record.payee !== null) {
            const key = contentKey(record.amount, record.occurrence_date, record.payee);
            if (!byContent.has(key)) {
                byContent.set(key, record.id);
            }
        }
    }

    const importable: CandidateTransaction[] = [];
    const duplicates: DuplicateMatch[] = [];
    const ambiguous: CandidateTransaction[] = [];
    const seen = new Map<string, string[]>();

    for (const candidate of candidates) {
        const sourceIds = seen.get(candidate.external_id);
        if (sourceIds) {
            sourceIds.push(candidate.source_id);
            ambiguous.push(candidate);
            continue;
        }
        seen.set(candidate.external_id, [candidate.source_id]);

        const tokenMatch = byImportId.get(candidate.external_id);
        if (tokenMatch !== undefined) {
            duplicates.push({ candidate, reason: 'import_id', recordId: tokenMatch });
            continue;
        }

        const contentMatch = byContent.get(
            contentKey(candidate.amount_minor_units, candidate.occurrence_date, candidate.payee)
        );
        if (contentMatch !== undefined) {
            duplicates.push({ candidate, reason: 'content', recordId: contentMatch });
            continue;
        }

        importable.push(candidate);
    }

    const collisions: DuplicateCollisionError[] = [];
    for (const [externalId, sourceIds] of seen) {
        if (sourceIds.length > 1) {
            collisions.push(new DuplicateCollisionError(externalId, sourceIds));
        }
    }

    return { importable, duplicates, ambiguous, collisions };
}

function contentKey(amount: number, date: string, payee: string): string {
    return `${amount}|${date}|${payee}`;
}
