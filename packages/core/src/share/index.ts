/**
 * Share module: a participant's paid/owed/net for one expense.
 */

export { calculateShare, toMinorUnits } from './calculate.js';
