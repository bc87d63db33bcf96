/**
 * @ledgerpair/money — Error types.
 *
 * A decimal string finer than the currency precision throws rather
 * than being rounded.
 */

/** Error codes for money operations. */
export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DECIMALS"
  | "INVALID_TOLERANCE";

/**
 * Structured error from the money math helpers.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}
