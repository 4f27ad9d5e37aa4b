/**
 * Dedup module: import id and content based duplicate detection.
 */

export { resolveDuplicates } from './resolve.js';
export type { DuplicateReason, DuplicateMatch, Resolution } from './types.js';
