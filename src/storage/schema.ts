import { sqliteTable, text, integer, index, uniqueIndex } from "drizzle-orm/sqlite-core";

export const currencies = sqliteTable("currencies", {
  code: text("code").primaryKey(), // ISO-4217
  numericCode: integer("numeric_code").notNull(),
  decimals: integer("decimals").notNull(),
  symbol: text("symbol"),
});

export const groups = sqliteTable("groups", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  defaultCurrency: text("default_currency_code")
    .notNull()
    .references(() => currencies.code),
  settleAlgorithm: text("settle_algorithm", { enum: ["greedy", "pairs"] })
    .notNull()
    .default("greedy"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
  createdBy: text("created_by").notNull(),
});

export const groupMembers = sqliteTable(
  "group_members",
  {
    id: text("id").primaryKey(),
    groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
    userId: text("user_id").notNull(),
    joinedAt: integer("joined_at", { mode: "timestamp" }).notNull(),
    deletedAt: integer("deleted_at", { mode: "timestamp" }), // soft delete
  },
  (table) => ({
    groupUserIdx: uniqueIndex("ux_group_members_group_user").on(table.groupId, table.userId),
  })
);

export const transactions = sqliteTable(
  "transactions",
  {
    id: text("id").primaryKey(),
    groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
    createdBy: text("created_by").notNull(),
    kind: text("kind", { enum: ["expense", "transfer"] }).notNull(),
    amount: text("amount").notNull(), // exact decimal
    currency: text("currency"),
    date: integer("date", { mode: "timestamp" }).notNull(),
    comment: text("comment"),
    categoryId: integer("category_id"),
    paidBy: text("paid_by"),
    splitType: text("split_type", { enum: ["equal", "shares", "custom"] }),
    transferFrom: text("transfer_from"),
    transferTo: text("transfer_to", { mode: "json" }).$type<string[]>(),
    isDeleted: integer("is_deleted", { mode: "boolean" }).default(false),
    createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
  },
  (table) => ({
    groupDateIdx: index("ix_tx_group_date").on(table.groupId, table.date),
  })
);

export const transactionShares = sqliteTable("transaction_shares", {
  id: text("id").primaryKey(),
  transactionId: text("transaction_id")
    .notNull()
    .references(() => transactions.id, { onDelete: "cascade" }),
  userId: text("user_id").notNull(),
  amount: text("amount").notNull(), // exact decimal
  shares: integer("shares"),
});
