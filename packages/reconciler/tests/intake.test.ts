/**
 * Intake tests
 */
import { describe, it, expect } from "vitest";
import { intakePos, intakeProcessor } from "../src/intake.js";

describe("intakePos", () => {
  it("prices string and number amounts in minor units", () => {
    const result = intakePos(
      [
        { transactionId: "TX-001", amount: "25.00" },
        { transactionId: "TX-002", amount: 19.99 },
      ],
      2,
    );

    expect(result.rejected).toEqual([]);
    expect(result.accepted.map((r) => r.amount)).toEqual([2500n, 1999n]);
    expect(result.accepted.map((r) => r.index)).toEqual([0, 1]);
    expect(result.accepted[0]!.record.transactionId).toBe("TX-001");
  });

  it("ignores absent and null non-key fields", () => {
    const result = intakePos(
      [{ transactionId: "TX-003", amount: "5.00", cardId: null, storeId: undefined }],
      2,
    );
    expect(result.accepted).toHaveLength(1);
  });

  it("rejects a record that is not an object", () => {
    const result = intakePos(["TX-004", null], 2);
    expect(result.accepted).toEqual([]);
    expect(result.rejected).toEqual([
      {
        side: "pos",
        index: 0,
        transactionId: null,
        reason: "NOT_AN_OBJECT",
        message: "Record at index 0 is not an object",
      },
      {
        side: "pos",
        index: 1,
        transactionId: null,
        reason: "NOT_AN_OBJECT",
        message: "Record at index 1 is not an object",
      },
    ]);
  });

  it("rejects a missing or empty transactionId", () => {
    const result = intakePos([{ amount: "1.00" }, { transactionId: "", amount: "1.00" }], 2);
    expect(result.rejected.map((r) => r.reason)).toEqual([
      "MISSING_TRANSACTION_ID",
      "MISSING_TRANSACTION_ID",
    ]);
  });

  it("rejects a missing amount", () => {
    const result = intakePos([{ transactionId: "TX-005" }], 2);
    expect(result.rejected[0]).toEqual({
      side: "pos",
      index: 0,
      transactionId: "TX-005",
      reason: "INVALID_AMOUNT",
      message: "Record TX-005 has no finite numeric or string amount",
    });
  });

  it("rejects an unparseable amount string with the parser's message", () => {
    const result = intakePos([{ transactionId: "TX-006", amount: "twelve" }], 2);
    expect(result.rejected[0]!.reason).toBe("INVALID_AMOUNT");
    expect(result.rejected[0]!.message).toBe('Invalid amount format: "twelve"');
  });

  it("rejects an amount string with more precision than the currency", () => {
    const result = intakePos([{ transactionId: "TX-007", amount: "1.005" }], 2);
    expect(result.rejected[0]!.reason).toBe("INVALID_AMOUNT");
  });

  it("keeps good records around bad ones, in ledger order", () => {
    const result = intakePos(
      [
        { transactionId: "A", amount: "1.00" },
        { transactionId: "B" },
        { transactionId: "C", amount: "3.00" },
      ],
      2,
    );
    expect(result.accepted.map((r) => [r.record.transactionId, r.index])).toEqual([
      ["A", 0],
      ["C", 2],
    ]);
    expect(result.rejected.map((r) => r.index)).toEqual([1]);
  });

  it("accepts an empty ledger", () => {
    expect(intakePos([], 2)).toEqual({ accepted: [], rejected: [] });
  });
});

describe("intakeProcessor", () => {
  it("accepts a record with transactionId, referenceId and amount", () => {
    const result = intakeProcessor(
      [{ transactionId: "P-1", referenceId: "TX-001", amount: 199.9 }],
      2,
    );
    expect(result.accepted[0]!.amount).toBe(19990n);
    expect(result.accepted[0]!.record.referenceId).toBe("TX-001");
  });

  it("rejects a missing referenceId", () => {
    const result = intakeProcessor([{ transactionId: "P-2", amount: "1.00" }], 2);
    expect(result.rejected).toEqual([
      {
        side: "processor",
        index: 0,
        transactionId: "P-2",
        reason: "MISSING_REFERENCE_ID",
        message: "Processor record P-2 has no referenceId",
      },
    ]);
  });

  it("accepts a record without its own transactionId", () => {
    const result = intakeProcessor(
      [
        { referenceId: "TX-001", amount: "25.00" },
        { transactionId: null, referenceId: "TX-002", amount: "5.00" },
      ],
      2,
    );
    expect(result.rejected).toEqual([]);
    expect(result.accepted.map((r) => [r.record.referenceId, r.amount])).toEqual([
      ["TX-001", 2500n],
      ["TX-002", 500n],
    ]);
  });

  it("labels an anonymous record by index", () => {
    const result = intakeProcessor([{ amount: "1.00" }, { referenceId: "TX-1", amount: "abc" }], 2);
    expect(result.rejected).toEqual([
      {
        side: "processor",
        index: 0,
        transactionId: null,
        reason: "MISSING_REFERENCE_ID",
        message: "Processor record at index 0 has no referenceId",
      },
      {
        side: "processor",
        index: 1,
        transactionId: null,
        reason: "INVALID_AMOUNT",
        message: 'Invalid amount format: "abc"',
      },
    ]);
  });

  it("rejects a non-finite number amount", () => {
    const result = intakeProcessor(
      [{ transactionId: "P-3", referenceId: "TX-1", amount: Number.NaN }],
      2,
    );
    expect(result.rejected[0]!.reason).toBe("INVALID_AMOUNT");
  });
});
