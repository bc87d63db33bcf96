/**
 * Tests for the deterministic money math helpers.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Conversion of float-sourced numbers
 * - Tolerance parsing
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import {
  assertDecimals,
  parseAmount,
  formatAmount,
  toMinorUnits,
  parseTolerance,
  absMinor,
  withinTolerance,
  formatCurrency,
} from "../src/money-math.js";
import { MoneyError } from "../src/types.js";

// ─── assertDecimals ──────────────────────────────────────────────────────

describe("assertDecimals", () => {
  it("accepts 0 through 18", () => {
    expect(() => assertDecimals(0)).not.toThrow();
    expect(() => assertDecimals(2)).not.toThrow();
    expect(() => assertDecimals(18)).not.toThrow();
  });

  it("rejects negative, fractional and oversized values", () => {
    expect(() => assertDecimals(-1)).toThrow(MoneyError);
    expect(() => assertDecimals(1.5)).toThrow(MoneyError);
    expect(() => assertDecimals(19)).toThrow(MoneyError);
  });
});

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 2)).toBe(10000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("199.9", 2)).toBe(19990n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  19.99 ", 2)).toBe(1999n);
  });

  it("rejects empty and whitespace-only strings", () => {
    expect(() => parseAmount("", 2)).toThrow(MoneyError);
    expect(() => parseAmount("   ", 2)).toThrow(MoneyError);
  });

  it("rejects non-numeric strings", () => {
    expect(() => parseAmount("abc", 2)).toThrow(/Invalid amount format/);
    expect(() => parseAmount("1.2.3", 2)).toThrow(MoneyError);
    expect(() => parseAmount("+100", 2)).toThrow(MoneyError);
    expect(() => parseAmount("1e3", 2)).toThrow(MoneyError);
  });

  it("rejects excess decimal places", () => {
    expect(() => parseAmount("1.234", 2)).toThrow(/3 decimal places, but currency allows 2/);
  });

  it("carries the INVALID_AMOUNT code", () => {
    try {
      parseAmount("x", 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MoneyError);
      expect((err as MoneyError).code).toBe("INVALID_AMOUNT");
    }
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats a fractional amount", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("formats zero", () => {
    expect(formatAmount(0n, 2)).toBe("0.00");
  });

  it("formats a sub-unit amount", () => {
    expect(formatAmount(5n, 2)).toBe("0.05");
  });

  it("formats a negative amount", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── toMinorUnits ────────────────────────────────────────────────────────

describe("toMinorUnits", () => {
  it("parses strings exactly", () => {
    expect(toMinorUnits("19.99", 2)).toBe(1999n);
  });

  it("quantises numbers to the currency precision", () => {
    expect(toMinorUnits(19.99, 2)).toBe(1999n);
    expect(toMinorUnits(199.9, 2)).toBe(19990n);
    expect(toMinorUnits(-12.5, 2)).toBe(-1250n);
  });

  it("absorbs binary float drift", () => {
    expect(toMinorUnits(0.1 + 0.2, 2)).toBe(30n);
  });

  it("rounds excess precision in numbers but rejects it in strings", () => {
    expect(toMinorUnits(19.996, 2)).toBe(2000n);
    expect(() => toMinorUnits("19.996", 2)).toThrow(
      'Amount "19.996" has 3 decimal places, but currency allows 2',
    );
  });

  it("rejects non-finite numbers", () => {
    expect(() => toMinorUnits(Number.NaN, 2)).toThrow(MoneyError);
    expect(() => toMinorUnits(Number.POSITIVE_INFINITY, 2)).toThrow(MoneyError);
  });

  it("rejects numbers too large for fixed notation", () => {
    expect(() => toMinorUnits(1e21, 2)).toThrow(MoneyError);
  });

  it("rejects strings with excess precision", () => {
    expect(() => toMinorUnits("19.999", 2)).toThrow(MoneyError);
  });
});

// ─── parseTolerance ──────────────────────────────────────────────────────

describe("parseTolerance", () => {
  it("parses one minor unit", () => {
    expect(parseTolerance("0.01", 2)).toBe(1n);
  });

  it("parses zero", () => {
    expect(parseTolerance("0", 2)).toBe(0n);
  });

  it("rejects negative tolerances", () => {
    expect(() => parseTolerance("-0.01", 2)).toThrow(/must not be negative/);
  });

  it("wraps parse failures as INVALID_TOLERANCE", () => {
    try {
      parseTolerance("0.001", 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MoneyError);
      expect((err as MoneyError).code).toBe("INVALID_TOLERANCE");
    }
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("absMinor", () => {
  it("returns the magnitude", () => {
    expect(absMinor(-150n)).toBe(150n);
    expect(absMinor(150n)).toBe(150n);
    expect(absMinor(0n)).toBe(0n);
  });
});

describe("withinTolerance", () => {
  it("is inclusive at the boundary", () => {
    expect(withinTolerance(2500n, 2501n, 1n)).toBe(true);
    expect(withinTolerance(2501n, 2500n, 1n)).toBe(true);
  });

  it("rejects differences above the tolerance", () => {
    expect(withinTolerance(2500n, 2502n, 1n)).toBe(false);
  });
});

// ─── Presentation ────────────────────────────────────────────────────────

describe("formatCurrency", () => {
  it("prefixes the symbol", () => {
    expect(formatCurrency(5000n, 2)).toBe("$50.00");
  });

  it("puts the sign before the symbol", () => {
    expect(formatCurrency(-500n, 2)).toBe("-$5.00");
  });

  it("accepts a custom symbol", () => {
    expect(formatCurrency(123n, 2, "€")).toBe("€1.23");
  });
});
