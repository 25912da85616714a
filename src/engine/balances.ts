import { LedgerError } from "../errors.js";
import { Money, normalizeCurrency } from "./money.js";
import type {
  BalanceReport,
  CurrencyCode,
  DebtMatrix,
  MemberId,
  NetBalanceMap,
  SkippedTransaction,
  Transaction,
} from "../types/index.js";

export interface DebtMatrixReport {
  byCurrency: Map<CurrencyCode, DebtMatrix>;
  skipped: SkippedTransaction[];
}

interface Debt {
  debtor: MemberId;
  creditor: MemberId;
  amount: Money;
}

/**
 * Translate one transaction into "debtor owes creditor" edges.
 * Returns a reason string instead when the record is malformed.
 */
function debtsOf(tx: Transaction, currency: CurrencyCode): Debt[] | string {
  let amount: Money;
  try {
    amount = Money.of(tx.amount, currency);
  } catch (error) {
    if (error instanceof LedgerError) return `invalid amount "${tx.amount}"`;
    throw error;
  }

  if (tx.kind === "expense") {
    if (!tx.paidBy) return "expense has no payer";

    const debts: Debt[] = [];
    for (const share of tx.shares) {
      // The payer's own share contributes nothing
      if (share.userId === tx.paidBy) continue;
      let shareAmount: Money;
      try {
        shareAmount = Money.of(share.amount, currency);
      } catch (error) {
        if (error instanceof LedgerError) return `invalid share amount "${share.amount}"`;
        throw error;
      }
      debts.push({ debtor: share.userId, creditor: tx.paidBy, amount: shareAmount });
    }
    return debts;
  }

  if (!tx.transferFrom) return "transfer has no sender";
  if (!tx.transferTo || tx.transferTo.length === 0) return "transfer has no recipients";

  // The full amount goes to every recipient, it is not split between them
  const sender = tx.transferFrom;
  return tx.transferTo
    .filter((recipient) => recipient !== sender)
    .map((recipient) => ({ debtor: sender, creditor: recipient, amount }));
}

/**
 * Build per-currency pairwise debt matrices from a transaction snapshot.
 * Soft-deleted records are ignored; malformed ones are skipped and reported.
 */
export function buildDebtMatrices(transactions: readonly Transaction[]): DebtMatrixReport {
  const byCurrency = new Map<CurrencyCode, DebtMatrix>();
  const skipped: SkippedTransaction[] = [];

  for (const tx of transactions) {
    if (tx.isDeleted === true) continue;

    const currency = normalizeCurrency(tx.currency);
    const debts = debtsOf(tx, currency);
    if (typeof debts === "string") {
      skipped.push({ transactionId: tx.id, reason: debts });
      continue;
    }

    let matrix = byCurrency.get(currency);
    if (!matrix) {
      matrix = new Map();
      byCurrency.set(currency, matrix);
    }

    for (const { debtor, creditor, amount } of debts) {
      let row = matrix.get(debtor);
      if (!row) {
        row = new Map();
        matrix.set(debtor, row);
      }
      row.set(creditor, (row.get(creditor) ?? Money.zero(currency)).plus(amount));
    }
  }

  return { byCurrency, skipped };
}

/**
 * Net each member's position from a debt matrix.
 * Only debts between two listed members count, so the map sums to zero.
 */
export function netBalances(
  matrix: DebtMatrix,
  memberIds: Iterable<MemberId>,
  currency: CurrencyCode
): NetBalanceMap {
  const members = new Set(memberIds);
  const net: NetBalanceMap = new Map();
  for (const memberId of members) {
    net.set(memberId, Money.zero(currency));
  }

  for (const [debtor, row] of matrix) {
    if (!members.has(debtor)) continue;
    for (const [creditor, amount] of row) {
      if (!members.has(creditor)) continue;
      net.set(creditor, (net.get(creditor) ?? Money.zero(currency)).plus(amount));
      net.set(debtor, (net.get(debtor) ?? Money.zero(currency)).minus(amount));
    }
  }

  return net;
}

/**
 * Calculate per-currency net balances for a group
 * @param transactions - Snapshot of the group's transactions
 * @param memberIds - Active members; every one of them appears in each map
 * @returns Net maps (positive = owed money, negative = owes money) and the
 * transactions that had to be skipped
 */
export function computeBalances(
  transactions: readonly Transaction[],
  memberIds: Iterable<MemberId>
): BalanceReport {
  const members = Array.from(memberIds);
  const { byCurrency: matrices, skipped } = buildDebtMatrices(transactions);

  const byCurrency = new Map<CurrencyCode, NetBalanceMap>();
  for (const [currency, matrix] of matrices) {
    byCurrency.set(currency, netBalances(matrix, members, currency));
  }

  return { byCurrency, skipped };
}

/**
 * Balance between two users across their shared transactions, per currency.
 * Positive means `friendId` owes `userId`.
 */
export function pairBalance(
  transactions: readonly Transaction[],
  userId: MemberId,
  friendId: MemberId
): Map<CurrencyCode, Money> {
  const { byCurrency } = buildDebtMatrices(transactions);
  const result = new Map<CurrencyCode, Money>();

  for (const [currency, matrix] of byCurrency) {
    const owedToUser = matrix.get(friendId)?.get(userId) ?? Money.zero(currency);
    const owedByUser = matrix.get(userId)?.get(friendId) ?? Money.zero(currency);
    result.set(currency, owedToUser.minus(owedByUser));
  }

  return result;
}
