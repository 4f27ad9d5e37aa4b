export { formatMemo } from './format.js';
export type { MemoInput } from './format.js';
