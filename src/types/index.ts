import type { Money } from "../engine/money.js";

// Amounts cross the storage and HTTP boundaries as fixed-point decimal strings
export type MemberId = string;
export type CurrencyCode = string;

export type TransactionKind = "expense" | "transfer";
export type SplitType = "equal" | "shares" | "custom";
export type SettleAlgorithm = "greedy" | "pairs";

export interface Group {
  id: string;
  name: string;
  defaultCurrency: CurrencyCode;
  settleAlgorithm: SettleAlgorithm;
  members: MemberId[]; // active members only
  createdAt: Date;
  createdBy: MemberId;
}

export interface Currency {
  code: CurrencyCode;
  numericCode: number;
  decimals: number;
  symbol: string | null;
}

export interface TransactionShare {
  userId: MemberId;
  amount: string; // decimal
  shares: number | null;
}

interface TransactionBase {
  id: string;
  groupId: string;
  createdBy: MemberId;
  amount: string; // decimal
  currency: CurrencyCode | null;
  date: Date;
  comment: string | null;
  isDeleted: boolean | null; // null on legacy rows, counts as not deleted
}

export interface ExpenseTransaction extends TransactionBase {
  kind: "expense";
  paidBy: MemberId | null;
  categoryId: number | null;
  splitType: SplitType | null;
  shares: TransactionShare[];
}

export interface TransferTransaction extends TransactionBase {
  kind: "transfer";
  transferFrom: MemberId | null;
  transferTo: MemberId[] | null;
}

export type Transaction = ExpenseTransaction | TransferTransaction;

export interface RawShare {
  userId: MemberId;
  amount: string;
  shares?: number | null;
}

export interface AggregatedShare {
  amount: Money;
  shares?: number;
}

export interface Settlement {
  from: MemberId; // debtor
  to: MemberId; // creditor
  amount: Money;
}

// positive = owed money, negative = owes money
export type NetBalanceMap = Map<MemberId, Money>;

// debtor -> creditor -> summed amount
export type DebtMatrix = Map<MemberId, Map<MemberId, Money>>;

export interface SkippedTransaction {
  transactionId: string;
  reason: string;
}

export interface BalanceReport {
  byCurrency: Map<CurrencyCode, NetBalanceMap>;
  skipped: SkippedTransaction[];
}
