export {
  Money,
  UNKNOWN_CURRENCY,
  normalizeCurrency,
  parseAmount,
  unitOf,
} from "./money.js";
export { createScaleResolver, type ScaleResolver } from "./currency.js";
export { splitEqually, splitByShareCounts } from "./splits.js";
export { aggregateShares, assertMembers } from "./shares.js";
export {
  buildDebtMatrices,
  computeBalances,
  netBalances,
  pairBalance,
  type DebtMatrixReport,
} from "./balances.js";
export {
  applySettlements,
  planSettlements,
  settleGreedy,
  settlePairwise,
} from "./settlement.js";
export { hasDebts, memberHasDebts } from "./debts.js";
