import { CurrencyRepo, GroupRepo, TransactionRepo, type GroupSnapshot } from "../storage/index.js";
import {
  buildDebtMatrices,
  computeBalances,
  createScaleResolver,
  hasDebts as hasDebtsEngine,
  memberHasDebts as memberHasDebtsEngine,
  normalizeCurrency,
  pairBalance,
  planSettlements,
  type ScaleResolver,
} from "../engine/index.js";
import { NotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  BalanceReport,
  CurrencyCode,
  Group,
  MemberId,
  NetBalanceMap,
  SettleAlgorithm,
  Settlement,
  SkippedTransaction,
} from "../types/index.js";

export interface GroupBalances extends BalanceReport {
  scaleOf: ScaleResolver;
}

export interface SettlePlan {
  algorithm: SettleAlgorithm;
  byCurrency: Map<CurrencyCode, Settlement[]>;
  skipped: SkippedTransaction[];
  scaleOf: ScaleResolver;
}

export interface DebtsPreview {
  owe: Record<CurrencyCode, string>;
  owed: Record<CurrencyCode, string>;
}

interface LoadedGroup {
  group: Group;
  snapshot: GroupSnapshot;
  report: BalanceReport;
  scaleOf: ScaleResolver;
}

export class BalanceService {
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
    this.logger = logger.child({ service: "BalanceService" });
  }

  async getGroupBalances(groupId: string): Promise<GroupBalances> {
    const { report, scaleOf } = await this.load(groupId);
    return { ...report, scaleOf };
  }

  /**
   * Transfers that settle the group, one list per currency.
   * @param options.algorithm - overrides the group's stored algorithm
   * @param options.currency - restrict the plan to one currency
   */
  async getSettlePlan(
    groupId: string,
    options: { algorithm?: SettleAlgorithm; currency?: string } = {}
  ): Promise<SettlePlan> {
    const code = options.currency === undefined ? undefined : normalizeCurrency(options.currency);
    const { group, snapshot, report, scaleOf } = await this.load(groupId, {
      extraCurrencies: code === undefined ? [] : [code],
    });
    const algorithm = options.algorithm ?? group.settleAlgorithm;

    let scoped: BalanceReport = report;
    if (code !== undefined) {
      scaleOf(code); // unknown codes fail even when the group never used them
      const byCurrency = new Map<CurrencyCode, NetBalanceMap>();
      const net = report.byCurrency.get(code);
      if (net) byCurrency.set(code, net);
      scoped = { ...report, byCurrency };
    }

    const matrices =
      algorithm === "pairs" ? buildDebtMatrices(snapshot.transactions).byCurrency : undefined;
    const byCurrency = planSettlements(scoped, scaleOf, algorithm, matrices);

    return { algorithm, byCurrency, skipped: report.skipped, scaleOf };
  }

  /**
   * Signed balance between two members per currency, positive when
   * `friendId` owes `userId`. Currencies where it rounds to zero are left out.
   */
  async getPairBalance(
    groupId: string,
    userId: MemberId,
    friendId: MemberId
  ): Promise<Record<CurrencyCode, string>> {
    const { group, snapshot, scaleOf } = await this.load(groupId);
    for (const id of [userId, friendId]) {
      if (!group.members.includes(id)) {
        throw new NotFoundError("Member", id);
      }
    }

    const result: Record<CurrencyCode, string> = {};
    for (const [currency, balance] of pairBalance(snapshot.transactions, userId, friendId)) {
      const scale = scaleOf(currency);
      if (balance.isNegligible(scale)) continue;
      result[currency] = balance.toFixed(scale);
    }
    return result;
  }

  /**
   * Whether anyone in the group still owes money in any currency.
   * Throws when balances could not be computed completely.
   */
  async hasDebts(groupId: string): Promise<boolean> {
    const { report, scaleOf } = await this.load(groupId);
    return hasDebtsEngine(report, scaleOf);
  }

  async memberHasDebts(groupId: string, memberId: MemberId): Promise<boolean> {
    const { report, scaleOf } = await this.load(groupId);
    return memberHasDebtsEngine(report, memberId, scaleOf);
  }

  /**
   * What a user owes and is owed in each of the given groups, per currency.
   * Groups the user is not an active member of are left out.
   */
  async getDebtsPreview(
    userId: MemberId,
    groupIds: string[]
  ): Promise<Record<string, DebtsPreview>> {
    const result: Record<string, DebtsPreview> = {};

    for (const groupId of groupIds) {
      const group = await this.groupRepo.findById(groupId);
      if (!group || !group.members.includes(userId)) continue;

      const { report, scaleOf } = await this.load(groupId, { group });
      const preview: DebtsPreview = { owe: {}, owed: {} };

      for (const [currency, net] of report.byCurrency) {
        const balance = net.get(userId);
        const scale = scaleOf(currency);
        if (!balance || balance.isNegligible(scale)) continue;
        if (balance.isNegative()) {
          preview.owe[currency] = balance.abs().toFixed(scale);
        } else {
          preview.owed[currency] = balance.toFixed(scale);
        }
      }
      result[groupId] = preview;
    }

    return result;
  }

  private async load(
    groupId: string,
    options: { group?: Group; extraCurrencies?: CurrencyCode[] } = {}
  ): Promise<LoadedGroup> {
    const group = options.group ?? (await this.groupRepo.findById(groupId));
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }

    const snapshot = await this.transactionRepo.loadSnapshot(groupId);
    const report = computeBalances(snapshot.transactions, snapshot.memberIds);
    for (const skipped of report.skipped) {
      this.logger.warn(
        { groupId, transactionId: skipped.transactionId, reason: skipped.reason },
        "transaction skipped in balance computation"
      );
    }

    const decimals = await this.currencyRepo.decimalsFor([
      ...report.byCurrency.keys(),
      ...(options.extraCurrencies ?? []),
    ]);
    return { group, snapshot, report, scaleOf: createScaleResolver(decimals) };
  }
}
