/**
 * Error taxonomy for sync runs.
 *
 * Fatal kinds (configuration, transport) abort a run. Per-item kinds
 * (validation, sink rejection, collision) are caught at the pipeline
 * stage boundary and counted in the run summary.
 */

export class SyncError extends Error {
    readonly details?: string;
    readonly fatal: boolean;

    constructor(message: string, options: { details?: string; fatal?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.details = options.details;
        this.fatal = options.fatal ?? false;
    }
}

/**
 * Missing or invalid credentials, account name or settings.
 */
export class ConfigurationError extends SyncError {
    constructor(message: string, options: { details?: string; cause?: unknown } = {}) {
        super(message, { ...options, fatal: true });
    }
}

/**
 * No budget account matches the configured name.
 */
export class AccountNotFoundError extends ConfigurationError {
    readonly accountName: string;

    constructor(accountName: string, available: readonly string[]) {
        super(`Account '${accountName}' not found`, {
            details: available.length > 0
                ? `Available accounts: ${available.join(', ')}`
                : 'The budget has no open accounts',
        });
        this.accountName = accountName;
    }
}

/**
 * Network, timeout or HTTP failure talking to either ledger.
 */
export class TransportError extends SyncError {
    readonly status?: number;

    constructor(message: string, options: { details?: string; status?: number; cause?: unknown } = {}) {
        super(message, { details: options.details, cause: options.cause, fatal: true });
        this.status = options.status;
    }
}

/**
 * An expense breaks a structural assumption (unbalanced shares, bad id).
 */
export class ValidationError extends SyncError {
    readonly sourceId?: string;

    constructor(message: string, options: { sourceId?: string; details?: string } = {}) {
        super(message, { details: options.details });
        this.sourceId = options.sourceId;
    }
}

/**
 * Two candidates in one run derived the same import id.
 */
export class DuplicateCollisionError extends SyncError {
    readonly externalId: string;
    readonly sourceIds: string[];

    constructor(externalId: string, sourceIds: readonly string[]) {
        super(`Import id ${externalId} derived by ${sourceIds.length} expenses`, {
            details: `Source ids: ${sourceIds.join(', ')}`,
        });
        this.externalId = externalId;
        this.sourceIds = [...sourceIds];
    }
}

/**
 * The budget ledger refused a single transaction.
 */
export class SinkRejection extends SyncError {
    readonly externalId: string;

    constructor(externalId: string, reason: string) {
        super(`Transaction ${externalId} rejected: ${reason}`, { details: reason });
        this.externalId = externalId;
    }
}

/**
 * Message plus details, for summaries and console output.
 */
export function describeError(err: unknown): string {
    if (err instanceof SyncError) {
        return err.details ? `${err.message} (${err.details})` : err.message;
    }
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}
