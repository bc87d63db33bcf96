/**
 * Property-Based Tests for @ledgerpair/money
 *
 * 1. Any whole number of cents survives a trip through a float
 * 2. Tolerance comparison is symmetric
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { toMinorUnits, withinTolerance } from "../src/money-math.js";

describe("property: float-sourced amounts land on the intended cent", () => {
  it("toMinorUnits(cents / 100) === cents", () => {
    fc.assert(
      fc.property(fc.integer({ min: -99_999_999, max: 99_999_999 }), (cents) => {
        expect(toMinorUnits(cents / 100, 2)).toBe(BigInt(cents));
      }),
      { numRuns: 500 },
    );
  });
});

describe("property: tolerance comparison is symmetric", () => {
  it("withinTolerance(a, b) === withinTolerance(b, a)", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -1_000_000n, max: 1_000_000n }),
        fc.bigInt({ min: -1_000_000n, max: 1_000_000n }),
        fc.bigInt({ min: 0n, max: 1_000n }),
        (a, b, tolerance) => {
          expect(withinTolerance(a, b, tolerance)).toBe(withinTolerance(b, a, tolerance));
        },
      ),
    );
  });
});
