/**
 * @ledgerpair/money — Fixed-point money math for reconciliation.
 *
 * Amounts are held and compared as bigint minor units.
 */

export {
  MAX_DECIMALS,
  assertDecimals,
  parseAmount,
  formatAmount,
  toMinorUnits,
  parseTolerance,
  absMinor,
  withinTolerance,
  formatCurrency,
} from "./money-math.js";

export { MoneyError } from "./types.js";
export type { MoneyErrorCode } from "./types.js";
