/**
 * Selection module: narrowing the importable list by position.
 */

export { applySelection, toIndexPredicate, parsePositions, sortChronologically } from './select.js';
export type { Selection, IndexPredicate, SelectionResult } from './types.js';
