import { randomUUID } from "node:crypto";
import { eq, and, isNull } from "drizzle-orm";
import type { Db } from "../db.js";
import { groups, groupMembers } from "../schema.js";
import type { Group, MemberId } from "../../types/index.js";

export class GroupRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(group: Omit<Group, "createdAt">): Promise<Group> {
    const now = new Date();

    await this.db.insert(groups).values({
      id: group.id,
      name: group.name,
      defaultCurrency: group.defaultCurrency,
      settleAlgorithm: group.settleAlgorithm,
      createdBy: group.createdBy,
      createdAt: now,
    });

    // Add members
    if (group.members.length > 0) {
      await this.db.insert(groupMembers).values(
        group.members.map((userId) => ({
          id: randomUUID(),
          groupId: group.id,
          userId,
          joinedAt: now,
        }))
      );
    }

    return {
      ...group,
      createdAt: now,
    };
  }

  async findById(id: string): Promise<Group | null> {
    const group = await this.db.select().from(groups).where(eq(groups.id, id)).get();

    if (!group) return null;

    return {
      id: group.id,
      name: group.name,
      defaultCurrency: group.defaultCurrency,
      settleAlgorithm: group.settleAlgorithm,
      members: await this.activeMemberIds(id),
      createdAt: group.createdAt,
      createdBy: group.createdBy,
    };
  }

  async activeMemberIds(groupId: string): Promise<MemberId[]> {
    const members = await this.db
      .select({ userId: groupMembers.userId })
      .from(groupMembers)
      .where(and(eq(groupMembers.groupId, groupId), isNull(groupMembers.deletedAt)));

    return members.map((m) => m.userId);
  }

  /** Idempotent: reactivates a soft-deleted membership instead of duplicating it. */
  async addMember(groupId: string, userId: MemberId): Promise<void> {
    await this.db
      .insert(groupMembers)
      .values({
        id: randomUUID(),
        groupId,
        userId,
        joinedAt: new Date(),
      })
      .onConflictDoUpdate({
        target: [groupMembers.groupId, groupMembers.userId],
        set: { deletedAt: null },
      });
  }

  async removeMember(groupId: string, userId: MemberId): Promise<void> {
    await this.db
      .update(groupMembers)
      .set({ deletedAt: new Date() })
      .where(
        and(
          eq(groupMembers.groupId, groupId),
          eq(groupMembers.userId, userId),
          isNull(groupMembers.deletedAt)
        )
      );
  }
}
