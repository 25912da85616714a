import { BalanceComputationError } from "../errors.js";
import type { ScaleResolver } from "./currency.js";
import type { BalanceReport, MemberId } from "../types/index.js";

function assertComplete(report: BalanceReport): void {
  if (report.skipped.length > 0) {
    throw new BalanceComputationError(report.skipped.map((s) => s.transactionId));
  }
}

/**
 * Does any member carry a balance in any currency that does not round to
 * zero at that currency's scale?
 *
 * An incomplete report (skipped transactions) throws instead of answering:
 * archiving and member removal must not rest on partial balances.
 */
export function hasDebts(report: BalanceReport, scaleOf: ScaleResolver): boolean {
  assertComplete(report);

  for (const [currency, net] of report.byCurrency) {
    const scale = scaleOf(currency);
    for (const balance of net.values()) {
      if (!balance.isNegligible(scale)) return true;
    }
  }
  return false;
}

/** Same test restricted to one member. */
export function memberHasDebts(
  report: BalanceReport,
  memberId: MemberId,
  scaleOf: ScaleResolver
): boolean {
  assertComplete(report);

  for (const [currency, net] of report.byCurrency) {
    const balance = net.get(memberId);
    if (balance && !balance.isNegligible(scaleOf(currency))) return true;
  }
  return false;
}
