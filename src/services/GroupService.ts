import { randomUUID } from "node:crypto";
import { CurrencyRepo, GroupRepo } from "../storage/index.js";
import { normalizeCurrency } from "../engine/index.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BalanceService } from "./BalanceService.js";
import type { Group, MemberId, SettleAlgorithm } from "../types/index.js";

export class GroupService {
  private groupRepo: GroupRepo;
  private currencyRepo: CurrencyRepo;
  private balanceService: BalanceService;
  private logger: Logger;
  private defaultAlgorithm: SettleAlgorithm;

  constructor(
    groupRepo: GroupRepo,
    currencyRepo: CurrencyRepo,
    balanceService: BalanceService,
    logger: Logger,
    defaultAlgorithm: SettleAlgorithm = "greedy"
  ) {
    this.groupRepo = groupRepo;
    this.currencyRepo = currencyRepo;
    this.balanceService = balanceService;
    this.logger = logger.child({ service: "GroupService" });
    this.defaultAlgorithm = defaultAlgorithm;
  }

  async createGroup(params: {
    id?: string;
    name: string;
    creatorId: MemberId;
    currency: string;
    settleAlgorithm?: SettleAlgorithm;
    members?: MemberId[];
  }): Promise<Group> {
    const currency = normalizeCurrency(params.currency);
    if (!(await this.currencyRepo.findByCode(currency))) {
      throw new ValidationError(`Unknown currency "${currency}"`, { field: "currency" });
    }

    // Creator is always a member
    const members = Array.from(new Set([params.creatorId, ...(params.members ?? [])]));

    const group = await this.groupRepo.create({
      id: params.id ?? randomUUID(),
      name: params.name,
      defaultCurrency: currency,
      settleAlgorithm: params.settleAlgorithm ?? this.defaultAlgorithm,
      members,
      createdBy: params.creatorId,
    });

    this.logger.info({ groupId: group.id, members: members.length }, "group created");
    return group;
  }

  async getGroup(groupId: string): Promise<Group> {
    const group = await this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }
    return group;
  }

  async addMember(groupId: string, userId: MemberId): Promise<Group> {
    await this.getGroup(groupId);
    await this.groupRepo.addMember(groupId, userId);
    return this.getGroup(groupId);
  }

  /**
   * Refused while the member still owes or is owed money in any currency.
   */
  async removeMember(groupId: string, userId: MemberId): Promise<void> {
    const group = await this.getGroup(groupId);
    if (!group.members.includes(userId)) {
      throw new NotFoundError("Member", userId);
    }

    if (await this.balanceService.memberHasDebts(groupId, userId)) {
      throw new ConflictError("Member still has an unsettled balance", { groupId, userId });
    }

    await this.groupRepo.removeMember(groupId, userId);
    this.logger.info({ groupId, userId }, "member removed");
  }
}
