import type { GroupBalances, SettlePlan } from "../services/index.js";
import type { CurrencyCode, Settlement, SkippedTransaction } from "../types/index.js";

// Money goes over the wire as fixed-point strings at the currency's scale

export interface BalanceLine {
  userId: string;
  balance: string;
}

export interface SettlementLine {
  from: string;
  to: string;
  amount: string;
}

export interface BalancesResponse {
  balances: Record<CurrencyCode, BalanceLine[]>;
  skipped: SkippedTransaction[];
}

export interface SettleUpResponse {
  algorithm: string;
  settlements: Record<CurrencyCode, SettlementLine[]>;
  skipped: SkippedTransaction[];
}

const byId = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function renderBalances(result: GroupBalances): BalancesResponse {
  const balances: Record<CurrencyCode, BalanceLine[]> = {};

  for (const [currency, net] of result.byCurrency) {
    const scale = result.scaleOf(currency);
    balances[currency] = Array.from(net, ([userId, balance]) => ({
      userId,
      balance: balance.toFixed(scale),
    })).sort((a, b) => byId(a.userId, b.userId));
  }

  return { balances, skipped: result.skipped };
}

export function renderSettlement(settlement: Settlement, scale: number): SettlementLine {
  return {
    from: settlement.from,
    to: settlement.to,
    amount: settlement.amount.toFixed(scale),
  };
}

export function renderSettlePlan(plan: SettlePlan): SettleUpResponse {
  const settlements: Record<CurrencyCode, SettlementLine[]> = {};

  for (const [currency, list] of plan.byCurrency) {
    const scale = plan.scaleOf(currency);
    settlements[currency] = list.map((settlement) => renderSettlement(settlement, scale));
  }

  return { algorithm: plan.algorithm, settlements, skipped: plan.skipped };
}
