import { randomUUID } from "node:crypto";
import { eq, and, or, isNull, asc, inArray } from "drizzle-orm";
import type { Db } from "../db.js";
import { groupMembers, transactions, transactionShares } from "../schema.js";
import type {
  ExpenseTransaction,
  MemberId,
  Transaction,
  TransactionShare,
  TransferTransaction,
} from "../../types/index.js";

type TransactionRow = typeof transactions.$inferSelect;
type ShareRow = typeof transactionShares.$inferSelect;

export type NewTransaction =
  | Omit<ExpenseTransaction, "isDeleted">
  | Omit<TransferTransaction, "isDeleted">;

export interface GroupSnapshot {
  memberIds: MemberId[];
  transactions: Transaction[];
}

function toShare(row: ShareRow): TransactionShare {
  return { userId: row.userId, amount: row.amount, shares: row.shares };
}

function toTransaction(row: TransactionRow, shares: ShareRow[]): Transaction {
  const base = {
    id: row.id,
    groupId: row.groupId,
    createdBy: row.createdBy,
    amount: row.amount,
    currency: row.currency,
    date: row.date,
    comment: row.comment,
    isDeleted: row.isDeleted,
  };

  if (row.kind === "expense") {
    return {
      ...base,
      kind: "expense",
      paidBy: row.paidBy,
      categoryId: row.categoryId,
      splitType: row.splitType,
      shares: shares.map(toShare),
    };
  }

  return {
    ...base,
    kind: "transfer",
    transferFrom: row.transferFrom,
    transferTo: row.transferTo,
  };
}

function toRow(tx: NewTransaction, now: Date) {
  return {
    groupId: tx.groupId,
    createdBy: tx.createdBy,
    kind: tx.kind,
    amount: tx.amount,
    currency: tx.currency,
    date: tx.date,
    comment: tx.comment,
    categoryId: tx.kind === "expense" ? tx.categoryId : null,
    paidBy: tx.kind === "expense" ? tx.paidBy : null,
    splitType: tx.kind === "expense" ? tx.splitType : null,
    transferFrom: tx.kind === "transfer" ? tx.transferFrom : null,
    transferTo: tx.kind === "transfer" ? tx.transferTo : null,
    updatedAt: now,
  };
}

function shareRows(tx: NewTransaction) {
  if (tx.kind !== "expense") return [];
  return tx.shares.map((share) => ({
    id: randomUUID(),
    transactionId: tx.id,
    userId: share.userId,
    amount: share.amount,
    shares: share.shares,
  }));
}

export class TransactionRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(tx: NewTransaction): Promise<Transaction> {
    const now = new Date();

    this.db.transaction((trx) => {
      trx
        .insert(transactions)
        .values({ id: tx.id, ...toRow(tx, now), isDeleted: false, createdAt: now })
        .run();

      const rows = shareRows(tx);
      if (rows.length > 0) {
        trx.insert(transactionShares).values(rows).run();
      }
    });

    return { ...tx, isDeleted: false };
  }

  /** Replace the full state of a transaction, shares included. */
  async replace(tx: NewTransaction): Promise<Transaction | null> {
    const now = new Date();

    const updated = this.db.transaction((trx) => {
      const result = trx
        .update(transactions)
        .set(toRow(tx, now))
        .where(eq(transactions.id, tx.id))
        .run();
      if (result.changes === 0) return false;

      trx.delete(transactionShares).where(eq(transactionShares.transactionId, tx.id)).run();
      const rows = shareRows(tx);
      if (rows.length > 0) {
        trx.insert(transactionShares).values(rows).run();
      }
      return true;
    });

    return updated ? this.findById(tx.id) : null;
  }

  async softDelete(id: string): Promise<boolean> {
    const result = await this.db
      .update(transactions)
      .set({ isDeleted: true, updatedAt: new Date() })
      .where(eq(transactions.id, id))
      .run();
    return result.changes > 0;
  }

  async findById(id: string): Promise<Transaction | null> {
    const row = await this.db.select().from(transactions).where(eq(transactions.id, id)).get();

    if (!row) return null;

    const shares = await this.db
      .select()
      .from(transactionShares)
      .where(eq(transactionShares.transactionId, id));

    return toTransaction(row, shares);
  }

  async findActiveByGroupId(groupId: string): Promise<Transaction[]> {
    return this.loadActive(this.db, groupId);
  }

  /**
   * Members and transactions of a group read inside one database transaction,
   * so balances are computed from a consistent snapshot.
   */
  async loadSnapshot(groupId: string): Promise<GroupSnapshot> {
    return this.db.transaction((trx) => {
      const members = trx
        .select({ userId: groupMembers.userId })
        .from(groupMembers)
        .where(and(eq(groupMembers.groupId, groupId), isNull(groupMembers.deletedAt)))
        .all();

      return {
        memberIds: members.map((m) => m.userId),
        transactions: this.loadActive(trx, groupId),
      };
    });
  }

  // legacy rows with is_deleted = NULL count as not deleted
  private loadActive(db: Pick<Db, "select">, groupId: string): Transaction[] {
    const rows = db
      .select()
      .from(transactions)
      .where(
        and(
          eq(transactions.groupId, groupId),
          or(eq(transactions.isDeleted, false), isNull(transactions.isDeleted))
        )
      )
      .orderBy(asc(transactions.date), asc(transactions.id))
      .all();

    if (rows.length === 0) return [];

    const shares = db
      .select()
      .from(transactionShares)
      .where(
        inArray(
          transactionShares.transactionId,
          rows.map((row) => row.id)
        )
      )
      .all();

    const sharesByTx = new Map<string, ShareRow[]>();
    for (const share of shares) {
      const list = sharesByTx.get(share.transactionId) ?? [];
      list.push(share);
      sharesByTx.set(share.transactionId, list);
    }

    return rows.map((row) => toTransaction(row, sharesByTx.get(row.id) ?? []));
  }
}
