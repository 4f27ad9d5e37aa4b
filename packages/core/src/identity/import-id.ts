/**
 * Import id generation.
 *
 * The budget ledger refuses a second transaction with an import id it has
 * already seen on the account, so this id is the primary duplicate guard.
 */

import { IMPORT_ID_PREFIX, SINK_LIMITS, ValidationError } from '../types/index.js';

/**
 * Derive the import id for a source expense: "splitwise_{sourceId}".
 *
 * Deterministic and injective: the prefix is fixed, so distinct source ids
 * always give distinct tokens.
 *
 * @throws ValidationError for an empty id, or one too long for the ledger
 */
export function generateImportId(sourceId: string): string {
    if (sourceId.length === 0) {
        throw new ValidationError('Cannot derive an import id from an empty source id');
    }

    const token = `${IMPORT_ID_PREFIX}${sourceId}`;
    if (token.length > SINK_LIMITS.IMPORT_ID_MAX_LENGTH) {
        throw new ValidationError(`Import id for expense ${sourceId} exceeds ${SINK_LIMITS.IMPORT_ID_MAX_LENGTH} characters`, {
            sourceId,
        });
    }
    return token;
}

/**
 * True for tokens this tool generated.
 */
export function isImportId(token: string | null | undefined): token is string {
    return typeof token === 'string' && token.length > IMPORT_ID_PREFIX.length && token.startsWith(IMPORT_ID_PREFIX);
}
