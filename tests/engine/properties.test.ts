import { Decimal } from "decimal.js";
import { describe, it, expect } from "vitest";
import {
  Money,
  applySettlements,
  computeBalances,
  createScaleResolver,
  settleGreedy,
} from "../../src/engine/index.js";
import type { Transaction } from "../../src/types/index.js";
import { expense, seededRandom, transfer } from "../helpers.js";

const members = ["m1", "m2", "m3", "m4", "m5"];
const scaleOf = createScaleResolver({ USD: 2, EUR: 2, JPY: 0 });
const currencies = ["USD", "EUR", "JPY"];

function units(count: number, scale: number): string {
  return new Decimal(count).dividedBy(10 ** scale).toFixed(scale);
}

function randomLedger(seed: number, size: number): Transaction[] {
  const next = seededRandom(seed);
  const ledger: Transaction[] = [];

  for (let n = 0; n < size; n += 1) {
    const currency = currencies[next(currencies.length)];
    const scale = scaleOf(currency);

    if (next(4) === 0) {
      const recipients = members.filter(() => next(2) === 0);
      ledger.push(
        transfer({
          currency,
          amount: units(1 + next(20000), scale),
          transferFrom: members[next(members.length)],
          transferTo: recipients.length > 0 ? recipients : [members[0]],
        })
      );
      continue;
    }

    const shares: Array<[string, string]> = [];
    let total = 0;
    for (const member of members) {
      if (next(3) === 0) continue;
      const share = next(10000);
      total += share;
      shares.push([member, units(share, scale)]);
    }
    ledger.push(
      expense({
        currency,
        amount: units(total, scale),
        paidBy: members[next(members.length)],
        shares,
      })
    );
  }

  return ledger;
}

describe("ledger properties", () => {
  const seeds = [1, 7, 42, 1234, 99991];

  it("should conserve money in every currency", () => {
    for (const seed of seeds) {
      const report = computeBalances(randomLedger(seed, 40), members);
      expect(report.skipped).toEqual([]);

      for (const [currency, net] of report.byCurrency) {
        expect(Money.sum(net.values(), currency).isZero()).toBe(true);
      }
    }
  });

  it("should settle every balance with a bounded number of transfers", () => {
    for (const seed of seeds) {
      const report = computeBalances(randomLedger(seed, 40), members);

      for (const [currency, net] of report.byCurrency) {
        const scale = scaleOf(currency);
        const settlements = settleGreedy(net, scale);

        const open = Array.from(net.values()).filter((b) => !b.isNegligible(scale));
        const creditors = open.filter((b) => b.isPositive()).length;
        const debtors = open.length - creditors;
        expect(settlements.length).toBeLessThanOrEqual(Math.max(creditors + debtors - 1, 0));

        for (const settlement of settlements) {
          expect(settlement.amount.isPositive()).toBe(true);
          expect(settlement.amount.currency).toBe(currency);
        }
        for (const remaining of applySettlements(net, settlements).values()) {
          expect(remaining.isBelowUnit(scale)).toBe(true);
        }
      }
    }
  });
});
