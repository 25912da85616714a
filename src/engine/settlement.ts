import { Money } from "./money.js";
import type { ScaleResolver } from "./currency.js";
import type {
  BalanceReport,
  CurrencyCode,
  DebtMatrix,
  MemberId,
  NetBalanceMap,
  SettleAlgorithm,
  Settlement,
} from "../types/index.js";

interface Position {
  memberId: MemberId;
  remaining: Money; // magnitude still to settle
}

function byMagnitudeThenId(a: Position, b: Position): number {
  const byAmount = b.remaining.compare(a.remaining);
  if (byAmount !== 0) return byAmount;
  return a.memberId < b.memberId ? -1 : a.memberId > b.memberId ? 1 : 0;
}

/**
 * Simplify debts to minimize number of transfers (greedy algorithm)
 *
 * Pairs the largest creditor with the largest debtor until one side runs
 * out. Equal magnitudes are ordered by member id so the plan is
 * reproducible. Emits at most creditors + debtors - 1 transfers.
 *
 * @param net - One currency's net balances
 * @param scale - Decimal places of that currency
 */
export function settleGreedy(net: NetBalanceMap, scale: number): Settlement[] {
  const creditors: Position[] = [];
  const debtors: Position[] = [];

  for (const [memberId, balance] of net) {
    if (balance.isNegligible(scale)) continue;
    if (balance.isPositive()) {
      creditors.push({ memberId, remaining: balance });
    } else {
      debtors.push({ memberId, remaining: balance.negated() });
    }
  }

  creditors.sort(byMagnitudeThenId);
  debtors.sort(byMagnitudeThenId);

  const settlements: Settlement[] = [];
  let i = 0;
  let j = 0;

  while (i < debtors.length && j < creditors.length) {
    const debtor = debtors[i];
    const creditor = creditors[j];
    const smaller =
      debtor.remaining.compare(creditor.remaining) <= 0 ? debtor.remaining : creditor.remaining;
    const amount = smaller.round(scale);

    if (!amount.isZero()) {
      settlements.push({ from: debtor.memberId, to: creditor.memberId, amount });
      debtor.remaining = debtor.remaining.minus(amount);
      creditor.remaining = creditor.remaining.minus(amount);
    }

    const debtorDone = debtor.remaining.isBelowUnit(scale);
    const creditorDone = creditor.remaining.isBelowUnit(scale);
    if (!debtorDone && !creditorDone) {
      // the smaller side always ends below one unit
      throw new Error(
        `Settlement made no progress between ${debtor.memberId} and ${creditor.memberId}`
      );
    }
    if (debtorDone) i += 1;
    if (creditorDone) j += 1;
  }

  return settlements;
}

/**
 * Settle every pair of members directly: the two directions of a pair are
 * netted and the residual becomes one transfer.
 * Ordered by debtor id, then creditor id.
 */
export function settlePairwise(
  matrix: DebtMatrix,
  memberIds: Iterable<MemberId>,
  currency: CurrencyCode,
  scale: number
): Settlement[] {
  const members = Array.from(new Set(memberIds)).sort();
  const owed = (debtor: MemberId, creditor: MemberId): Money =>
    matrix.get(debtor)?.get(creditor) ?? Money.zero(currency);

  const settlements: Settlement[] = [];
  for (let a = 0; a < members.length; a += 1) {
    for (let b = a + 1; b < members.length; b += 1) {
      const first = members[a];
      const second = members[b];
      const residual = owed(first, second).minus(owed(second, first));
      if (residual.isNegligible(scale)) continue;

      settlements.push(
        residual.isPositive()
          ? { from: first, to: second, amount: residual.round(scale) }
          : { from: second, to: first, amount: residual.negated().round(scale) }
      );
    }
  }

  return settlements.sort((x, y) =>
    x.from === y.from ? (x.to < y.to ? -1 : 1) : x.from < y.from ? -1 : 1
  );
}

/**
 * Apply settlements to balances
 * @returns A new map; the input is left untouched
 */
export function applySettlements(
  net: NetBalanceMap,
  settlements: readonly Settlement[]
): NetBalanceMap {
  const result: NetBalanceMap = new Map(net);

  for (const settlement of settlements) {
    const zero = Money.zero(settlement.amount.currency);
    // Paying reduces the debtor's negative balance
    result.set(settlement.from, (result.get(settlement.from) ?? zero).plus(settlement.amount));
    // Receiving reduces the creditor's positive balance
    result.set(settlement.to, (result.get(settlement.to) ?? zero).minus(settlement.amount));
  }

  return result;
}

/**
 * Plan transfers for every currency of a balance report, one currency at a
 * time. Pairwise planning needs the debt matrices the report was built
 * from; its members are the keys of each net map.
 * @throws UnknownCurrencyError through `scaleOf`
 */
export function planSettlements(
  report: BalanceReport,
  scaleOf: ScaleResolver,
  algorithm: SettleAlgorithm,
  matrices: Map<CurrencyCode, DebtMatrix> = new Map()
): Map<CurrencyCode, Settlement[]> {
  const plans = new Map<CurrencyCode, Settlement[]>();

  for (const [currency, net] of report.byCurrency) {
    const scale = scaleOf(currency);

    if (algorithm === "pairs") {
      const matrix: DebtMatrix = matrices.get(currency) ?? new Map();
      plans.set(currency, settlePairwise(matrix, net.keys(), currency, scale));
      continue;
    }

    plans.set(currency, settleGreedy(net, scale));
  }

  return plans;
}
