/**
 * Derivation module: raw expense → candidate budget transaction.
 */

export { deriveTransaction, deriveTransactions } from './derive.js';
export type { DeriveOptions, DerivationOutcome, DerivationFailure, DerivationStats, DerivationResult } from './types.js';
