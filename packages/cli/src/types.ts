/**
 * split-sync CLI - Core Types
 */

/**
 * Flags as given on the command line.
 */
export interface SyncOptions {
    startDate?: string;
    dryRun: boolean;
    skipFilter: boolean;
    yes: boolean;
    verbose: boolean;
    config?: string;
    account?: string;
}

/**
 * Settings for one run. Built once by loadConfig, never mutated.
 */
export interface SyncConfig {
    readonly startDate: string;
    readonly dryRun: boolean;
    readonly skipFilter: boolean;
    readonly assumeYes: boolean;
    readonly accountName: string;
    readonly budgetId: string;
    readonly splitwise: {
        readonly apiUrl: string;
        readonly apiKey: string;
    };
    readonly ynab: {
        readonly apiUrl: string;
        readonly accessToken: string;
    };
    readonly importBatchSize: number;
    readonly lookbackDays: number;
    readonly memoMaxLength: number;
    readonly requestTimeoutMs: number;
    readonly configPath: string | null;
}
