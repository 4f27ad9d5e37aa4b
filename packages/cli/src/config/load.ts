import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { parseIsoDate } from '@split-sync/core';
import { ConfigurationError, MEMO_MIN_LENGTH, SINK_LIMITS, SYNC_DEFAULTS } from '@split-sync/shared';
import { findConfigFile } from './detect.js';
import type { SyncConfig, SyncOptions } from '../types.js';

/**
 * Settings allowed in split-sync.yaml. Credentials are not accepted here;
 * they come from the environment only.
 */
export const FileConfigSchema = z.object({
    account_name: z.string().trim().min(1).optional(),
    budget_id: z.string().min(1).optional(),
    splitwise_api_url: z.string().url().optional(),
    ynab_api_url: z.string().url().optional(),
    import_batch_size: z.number().int().min(1).max(1000).optional(),
    lookback_days: z.number().int().min(0).max(365).optional(),
    memo_max_length: z.number().int().min(MEMO_MIN_LENGTH).max(SINK_LIMITS.MEMO_MAX_LENGTH).optional(),
    request_timeout_ms: z.number().int().min(1000).optional(),
}).strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type Env = Record<string, string | undefined>;

export interface LoadConfigInput {
    options: SyncOptions;
    env?: Env;
    cwd?: string;
}

/**
 * Build the run configuration.
 * Precedence, lowest first: defaults, split-sync.yaml, environment, flags.
 *
 * @throws ConfigurationError for missing credentials or invalid values
 */
export function loadConfig({ options, env = process.env, cwd = process.cwd() }: LoadConfigInput): SyncConfig {
    const configPath = options.config ?? findConfigFile(cwd);
    const file = configPath ? readConfigFile(configPath) : {};

    const startDate = options.startDate;
    if (!startDate) {
        throw new ConfigurationError('Missing start date', { details: 'Pass --start-date YYYY-MM-DD' });
    }
    if (!parseIsoDate(startDate)) {
        throw new ConfigurationError(`Invalid start date: ${startDate}`, {
            details: 'Use YYYY-MM-DD format (e.g., 2024-01-01)',
        });
    }

    const accountName = (options.account ?? env.YNAB_ACCOUNT_NAME ?? file.account_name ?? SYNC_DEFAULTS.ACCOUNT_NAME).trim();
    if (!accountName) {
        throw new ConfigurationError('Invalid YNAB account name', { details: 'Account name cannot be empty' });
    }

    const config: SyncConfig = {
        startDate,
        dryRun: options.dryRun,
        skipFilter: options.skipFilter,
        assumeYes: options.yes,
        accountName,
        budgetId: env.YNAB_BUDGET_ID ?? file.budget_id ?? SYNC_DEFAULTS.BUDGET_ID,
        splitwise: {
            apiUrl: parseUrl('SPLITWISE_API_URL', env.SPLITWISE_API_URL ?? file.splitwise_api_url ?? SYNC_DEFAULTS.SPLITWISE_API_URL),
            apiKey: requireEnv(env, 'SPLITWISE_API_KEY'),
        },
        ynab: {
            apiUrl: parseUrl('YNAB_API_URL', env.YNAB_API_URL ?? file.ynab_api_url ?? SYNC_DEFAULTS.YNAB_API_URL),
            accessToken: requireEnv(env, 'YNAB_ACCESS_TOKEN'),
        },
        importBatchSize: file.import_batch_size ?? SYNC_DEFAULTS.IMPORT_BATCH_SIZE,
        lookbackDays: file.lookback_days ?? SYNC_DEFAULTS.LOOKBACK_DAYS,
        memoMaxLength: file.memo_max_length ?? SINK_LIMITS.MEMO_MAX_LENGTH,
        requestTimeoutMs: file.request_timeout_ms ?? SYNC_DEFAULTS.REQUEST_TIMEOUT_MS,
        configPath,
    };

    return Object.freeze(config);
}

/**
 * Loads and validates split-sync.yaml. An empty file is an empty config.
 */
export function readConfigFile(path: string): FileConfig {
    if (!existsSync(path)) {
        throw new ConfigurationError(`Config file not found: ${path}`);
    }

    let data: unknown;
    try {
        data = parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(`Config file is not valid YAML: ${path}`, {
            details: err instanceof Error ? err.message : String(err),
            cause: err,
        });
    }
    if (data === null || data === undefined) return {};

    const result = FileConfigSchema.safeParse(data);
    if (!result.success) {
        throw new ConfigurationError(`Invalid config file: ${path}`, {
            details: result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
        });
    }
    return result.data;
}

function requireEnv(env: Env, name: string): string {
    const value = env[name]?.trim();
    if (!value) {
        throw new ConfigurationError(`Missing required environment variable: ${name}`, {
            details: `Please set ${name} in your environment`,
        });
    }
    return value;
}

/**
 * Validates a base URL and strips any trailing slash.
 */
function parseUrl(name: string, value: string): string {
    const result = z.string().url().safeParse(value);
    if (!result.success) {
        throw new ConfigurationError(`Invalid URL for ${name}: ${value}`);
    }
    return value.replace(/\/+$/, '');
}
