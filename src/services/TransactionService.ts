import { randomUUID } from "node:crypto";
import { GroupRepo, CurrencyRepo, TransactionRepo, type NewTransaction } from "../storage/index.js";
import {
  Money,
  aggregateShares,
  assertMembers,
  createScaleResolver,
  normalizeCurrency,
  splitByShareCounts,
  splitEqually,
} from "../engine/index.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  Group,
  MemberId,
  RawShare,
  SplitType,
  Transaction,
  TransactionShare,
} from "../types/index.js";

export interface ShareInput {
  userId: MemberId;
  amount?: string;
  shares?: number | null;
}

interface TransactionInputBase {
  amount: string;
  currency?: string | null; // defaults to the group's currency
  date?: Date;
  comment?: string | null;
}

export interface ExpenseInput extends TransactionInputBase {
  kind: "expense";
  paidBy: MemberId;
  splitType: SplitType;
  categoryId?: number | null;
  shares?: ShareInput[];
}

export interface TransferInput extends TransactionInputBase {
  kind: "transfer";
  transferFrom: MemberId;
  transferTo: MemberId[];
}

export type TransactionInput = ExpenseInput | TransferInput;

function toRawShares(shares: Map<MemberId, Money>, counts?: Map<MemberId, number>): RawShare[] {
  return Array.from(shares, ([userId, amount]) => ({
    userId,
    amount: amount.toDecimalString(),
    shares: counts?.get(userId) ?? null,
  }));
}

/**
 * Turn the submitted share lines into explicit per-member amounts.
 * Equal splits without lines cover every active member.
 */
function materializeShares(
  input: ExpenseInput,
  group: Group,
  total: Money,
  scale: number
): RawShare[] {
  const lines = input.shares ?? [];

  if (lines.length === 0) {
    if (input.splitType !== "equal") {
      throw new ValidationError(`Shares are required for split type "${input.splitType}"`, {
        field: "shares",
      });
    }
    return toRawShares(splitEqually(total, group.members, scale));
  }

  const explicit: RawShare[] = [];
  for (const line of lines) {
    if (line.amount !== undefined) {
      explicit.push({ userId: line.userId, amount: line.amount, shares: line.shares ?? null });
    }
  }
  if (explicit.length === lines.length) {
    return explicit;
  }
  if (explicit.length > 0) {
    throw new ValidationError("Either every share line has an amount or none does", {
      field: "shares",
    });
  }

  if (input.splitType === "shares") {
    const counts = new Map<MemberId, number>();
    for (const line of lines) {
      if (line.shares === undefined || line.shares === null) {
        throw new ValidationError(`Share count missing for ${line.userId}`, {
          field: "shares",
          userId: line.userId,
        });
      }
      counts.set(line.userId, (counts.get(line.userId) ?? 0) + line.shares);
    }
    return toRawShares(splitByShareCounts(total, counts, scale), counts);
  }

  if (input.splitType === "equal") {
    const participants = Array.from(new Set(lines.map((line) => line.userId)));
    return toRawShares(splitEqually(total, participants, scale));
  }

  throw new ValidationError('Split type "custom" needs an amount on every share line', {
    field: "shares",
  });
}

export class TransactionService {
  private transactionRepo: TransactionRepo;
  private groupRepo: GroupRepo;
  private currencyRepo: CurrencyRepo;
  private logger: Logger;

  constructor(
    transactionRepo: TransactionRepo,
    groupRepo: GroupRepo,
    currencyRepo: CurrencyRepo,
    logger: Logger
  ) {
    this.transactionRepo = transactionRepo;
    this.groupRepo = groupRepo;
    this.currencyRepo = currencyRepo;
    this.logger = logger.child({ service: "TransactionService" });
  }

  async createTransaction(
    groupId: string,
    authorId: MemberId,
    input: TransactionInput,
    id: string = randomUUID()
  ): Promise<Transaction> {
    const group = await this.requireGroup(groupId);
    const tx = await this.buildTransaction(group, id, authorId, input);
    const created = await this.transactionRepo.create(tx);

    this.logger.info(
      { groupId, transactionId: id, kind: tx.kind, currency: tx.currency },
      "transaction created"
    );
    return created;
  }

  /** Replace the whole state of a transaction; the author is kept. */
  async replaceTransaction(id: string, input: TransactionInput): Promise<Transaction> {
    const existing = await this.transactionRepo.findById(id);
    if (!existing || existing.isDeleted === true) {
      throw new NotFoundError("Transaction", id);
    }

    const group = await this.requireGroup(existing.groupId);
    const tx = await this.buildTransaction(group, id, existing.createdBy, input);
    const updated = await this.transactionRepo.replace(tx);
    if (!updated) {
      throw new NotFoundError("Transaction", id);
    }

    this.logger.info({ groupId: group.id, transactionId: id }, "transaction replaced");
    return updated;
  }

  async deleteTransaction(id: string): Promise<void> {
    const deleted = await this.transactionRepo.softDelete(id);
    if (!deleted) {
      throw new NotFoundError("Transaction", id);
    }
    this.logger.info({ transactionId: id }, "transaction deleted");
  }

  async getGroupTransactions(groupId: string): Promise<Transaction[]> {
    await this.requireGroup(groupId);
    return this.transactionRepo.findActiveByGroupId(groupId);
  }

  private async requireGroup(groupId: string): Promise<Group> {
    const group = await this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }
    return group;
  }

  /**
   * Validate and normalise a submission. Throws before anything is written:
   * unknown currency, non-members, malformed amounts, shares that do not
   * add up.
   */
  private async buildTransaction(
    group: Group,
    id: string,
    createdBy: MemberId,
    input: TransactionInput
  ): Promise<NewTransaction> {
    const currency = normalizeCurrency(input.currency ?? group.defaultCurrency);
    const scaleOf = createScaleResolver(await this.currencyRepo.decimalsFor([currency]));
    const scale = scaleOf(currency);

    const total = Money.of(input.amount, currency);
    if (total.isNegative()) {
      throw new ValidationError("Amount cannot be negative", { field: "amount" });
    }
    if (!total.round(scale).equals(total)) {
      throw new ValidationError(`Amount has more than ${scale} decimal places for ${currency}`, {
        field: "amount",
      });
    }

    const members = new Set(group.members);
    const base = {
      id,
      groupId: group.id,
      createdBy,
      amount: total.toFixed(scale),
      currency,
      date: input.date ?? new Date(),
      comment: input.comment ?? null,
    };

    if (input.kind === "transfer") {
      assertMembers([input.transferFrom], members, "transferFrom");
      if (input.transferTo.length === 0) {
        throw new ValidationError("A transfer needs at least one recipient", {
          field: "transferTo",
        });
      }
      assertMembers(input.transferTo, members, "transferTo");

      return {
        ...base,
        kind: "transfer",
        transferFrom: input.transferFrom,
        transferTo: Array.from(new Set(input.transferTo)),
      };
    }

    assertMembers([input.paidBy], members, "paidBy");
    assertMembers(
      (input.shares ?? []).map((line) => line.userId),
      members,
      "shares"
    );

    const aggregated = aggregateShares(materializeShares(input, group, total, scale), total, scale);
    const shares: TransactionShare[] = [];
    for (const [userId, share] of aggregated) {
      // stored shares are on the currency scale
      if (!share.amount.round(scale).equals(share.amount)) {
        throw new ValidationError(
          `Share for ${userId} has more than ${scale} decimal places for ${currency}`,
          { field: "shares", userId }
        );
      }
      shares.push({ userId, amount: share.amount.toFixed(scale), shares: share.shares ?? null });
    }

    return {
      ...base,
      kind: "expense",
      paidBy: input.paidBy,
      categoryId: input.categoryId ?? null,
      splitType: input.splitType,
      shares,
    };
  }
}
