import { describe, it, expect } from "vitest";
import { createScaleResolver, hasDebts, memberHasDebts } from "../../src/engine/index.js";
import { BalanceComputationError, UnknownCurrencyError } from "../../src/errors.js";
import type { BalanceReport } from "../../src/types/index.js";
import { netMap } from "../helpers.js";

const scaleOf = createScaleResolver({ USD: 2, EUR: 2, JPY: 0 });

function report(
  entries: Array<[string, Record<string, string>]>,
  skipped: BalanceReport["skipped"] = []
): BalanceReport {
  return {
    byCurrency: new Map(entries.map(([code, net]) => [code, netMap(code, net)])),
    skipped,
  };
}

describe("hasDebts", () => {
  it("should report no debts for an empty group", () => {
    expect(hasDebts(report([]), scaleOf)).toBe(false);
  });

  it("should report no debts when every balance is zero", () => {
    expect(hasDebts(report([["USD", { alice: "0.00", bob: "0.00" }]]), scaleOf)).toBe(false);
  });

  it("should count a single rounding unit as a debt", () => {
    expect(hasDebts(report([["USD", { alice: "0.01", bob: "-0.01" }]]), scaleOf)).toBe(true);
  });

  it("should ignore balances that round to zero", () => {
    expect(hasDebts(report([["USD", { alice: "0.004", bob: "-0.004" }]]), scaleOf)).toBe(false);
  });

  it("should look at every currency", () => {
    const multi = report([
      ["USD", { alice: "0.00", bob: "0.00" }],
      ["JPY", { alice: "-1", bob: "1" }],
    ]);
    expect(hasDebts(multi, scaleOf)).toBe(true);
  });

  it("should throw instead of answering on an incomplete report", () => {
    const incomplete = report([["USD", { alice: "0.00" }]], [
      { transactionId: "tx9", reason: "expense has no payer" },
    ]);

    expect(() => hasDebts(incomplete, scaleOf)).toThrow(BalanceComputationError);
  });

  it("should throw on a currency without a known scale", () => {
    expect(() => hasDebts(report([["ABC", { alice: "0" }]]), scaleOf)).toThrow(
      UnknownCurrencyError
    );
  });
});

describe("memberHasDebts", () => {
  const balances = report([
    ["USD", { alice: "5.00", bob: "-5.00", charlie: "0.00" }],
    ["EUR", { alice: "0.00", charlie: "0.00" }],
  ]);

  it("should be true for a member who owes or is owed", () => {
    expect(memberHasDebts(balances, "alice", scaleOf)).toBe(true);
    expect(memberHasDebts(balances, "bob", scaleOf)).toBe(true);
  });

  it("should be false for a settled member", () => {
    expect(memberHasDebts(balances, "charlie", scaleOf)).toBe(false);
  });

  it("should be false for someone who is not in the report", () => {
    expect(memberHasDebts(balances, "zoe", scaleOf)).toBe(false);
  });

  it("should throw on an incomplete report", () => {
    const incomplete = report([], [{ transactionId: "tx1", reason: "transfer has no sender" }]);
    expect(() => memberHasDebts(incomplete, "alice", scaleOf)).toThrow(BalanceComputationError);
  });
});
