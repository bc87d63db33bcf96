/**
 * @ledgerpair/money — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint minor units (cents at 2 decimals).
 * Decimal strings and float-sourced numbers are converted once,
 * at intake, and never compared as floats afterwards.
 *
 * Rules:
 * - No floating-point comparisons
 * - Amounts must be valid decimal strings or finite numbers
 * - Zero runtime dependencies
 */

import type { Amount } from "@ledgerpair/types";
import { MoneyError } from "./types.js";

/** Largest precision accepted for a currency. */
export const MAX_DECIMALS = 18;

// ─── Decimal String ↔ Minor Units ─────────────────────────────────────────

/**
 * Assert that a decimals value is usable as a currency precision.
 */
export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new MoneyError(
      "INVALID_DECIMALS",
      `Decimals must be an integer between 0 and ${String(MAX_DECIMALS)}, got: ${String(decimals)}`,
    );
  }
}

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (amount.trim() === "") {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  const trimmed = amount.trim();

  // Optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=2 → "0.05"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Convert a source-ledger amount to minor units.
 *
 * Strings are parsed exactly. Numbers come from float-based sources and
 * are quantised to the currency precision with `toFixed`, which rounds
 * the binary value to the nearest representable decimal.
 *
 * The two forms therefore treat excess precision differently: the
 * number 19.996 rounds to 2000n, while the string "19.996" throws
 * INVALID_AMOUNT.
 *
 * 19.99 with decimals=2 → 1999n
 * 0.1 + 0.2 with decimals=2 → 30n
 */
export function toMinorUnits(amount: Amount, decimals: number): bigint {
  if (typeof amount === "string") {
    return parseAmount(amount, decimals);
  }

  if (!Number.isFinite(amount)) {
    throw new MoneyError("INVALID_AMOUNT", `Amount must be finite, got: ${String(amount)}`);
  }

  // toFixed switches to exponent notation from 1e21 up; parseAmount rejects that.
  return parseAmount(amount.toFixed(decimals), decimals);
}

/**
 * Parse a comparison tolerance. Same format as an amount, never negative.
 */
export function parseTolerance(tolerance: string, decimals: number): bigint {
  let scaled: bigint;
  try {
    scaled = parseAmount(tolerance, decimals);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MoneyError("INVALID_TOLERANCE", `Invalid tolerance "${tolerance}": ${reason}`);
  }

  if (scaled < 0n) {
    throw new MoneyError("INVALID_TOLERANCE", `Tolerance must not be negative, got: "${tolerance}"`);
  }

  return scaled;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Absolute value of a minor-unit amount.
 */
export function absMinor(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * True when two minor-unit amounts differ by no more than the tolerance.
 */
export function withinTolerance(a: bigint, b: bigint, tolerance: bigint): boolean {
  return absMinor(a - b) <= tolerance;
}

// ─── Presentation ────────────────────────────────────────────────────────

/**
 * Format a minor-unit amount for display with a currency symbol.
 *
 * 5000n with decimals=2 → "$50.00"
 * -500n with decimals=2 → "-$5.00"
 */
export function formatCurrency(scaled: bigint, decimals: number, symbol = "$"): string {
  const formatted = formatAmount(absMinor(scaled), decimals);
  return scaled < 0n ? `-${symbol}${formatted}` : `${symbol}${formatted}`;
}
