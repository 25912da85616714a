import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { applySettlements } from "../../src/engine/index.js";
import {
  BalanceComputationError,
  NotFoundError,
  UnknownCurrencyError,
  ValidationError,
} from "../../src/errors.js";
import { createTestContext, type TestContext } from "../context.js";
import { capturingLogger, fixed, lines } from "../helpers.js";

async function seedTrip(ctx: TestContext): Promise<void> {
  await ctx.groupService.createGroup({
    id: "grp1",
    name: "Trip",
    creatorId: "alice",
    currency: "EUR",
    members: ["bob", "charlie"],
  });
  await ctx.transactionService.createTransaction("grp1", "alice", {
    kind: "expense",
    amount: "90.00",
    paidBy: "alice",
    splitType: "equal",
  });
  await ctx.transactionService.createTransaction("grp1", "alice", {
    kind: "transfer",
    amount: "20.00",
    currency: "USD",
    transferFrom: "alice",
    transferTo: ["bob", "charlie"],
  });
}

describe("BalanceService", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
    await seedTrip(ctx);
  });

  afterEach(() => {
    ctx.handle.close();
  });

  it("should compute balances per currency", async () => {
    const result = await ctx.balanceService.getGroupBalances("grp1");

    expect(result.skipped).toEqual([]);
    expect(fixed(result.byCurrency.get("EUR"))).toEqual({
      alice: "60.00",
      bob: "-30.00",
      charlie: "-30.00",
    });
    expect(fixed(result.byCurrency.get("USD"))).toEqual({
      alice: "-40.00",
      bob: "20.00",
      charlie: "20.00",
    });
    expect(result.scaleOf("USD")).toBe(2);
  });

  it("should plan greedy settlements for every currency", async () => {
    const plan = await ctx.balanceService.getSettlePlan("grp1");

    expect(plan.algorithm).toBe("greedy");
    expect(lines(plan.byCurrency.get("EUR") ?? [])).toEqual([
      { from: "bob", to: "alice", amount: "30.00" },
      { from: "charlie", to: "alice", amount: "30.00" },
    ]);
    expect(lines(plan.byCurrency.get("USD") ?? [])).toEqual([
      { from: "alice", to: "bob", amount: "20.00" },
      { from: "alice", to: "charlie", amount: "20.00" },
    ]);
  });

  it("should restrict the plan to one currency", async () => {
    const plan = await ctx.balanceService.getSettlePlan("grp1", { currency: "usd" });
    expect(Array.from(plan.byCurrency.keys())).toEqual(["USD"]);

    const unused = await ctx.balanceService.getSettlePlan("grp1", { currency: "JPY" });
    expect(unused.byCurrency.size).toBe(0);

    await expect(
      ctx.balanceService.getSettlePlan("grp1", { currency: "ABC" })
    ).rejects.toThrow(UnknownCurrencyError);
  });

  it("should settle pairs directly when asked to", async () => {
    await ctx.transactionService.createTransaction("grp1", "bob", {
      kind: "expense",
      amount: "40.00",
      paidBy: "bob",
      splitType: "custom",
      shares: [
        { userId: "alice", amount: "20.00" },
        { userId: "bob", amount: "20.00" },
      ],
    });

    const pairs = await ctx.balanceService.getSettlePlan("grp1", {
      algorithm: "pairs",
      currency: "EUR",
    });
    expect(pairs.algorithm).toBe("pairs");
    expect(lines(pairs.byCurrency.get("EUR") ?? [])).toEqual([
      { from: "bob", to: "alice", amount: "10.00" },
      { from: "charlie", to: "alice", amount: "30.00" },
    ]);

    const greedy = await ctx.balanceService.getSettlePlan("grp1", { currency: "EUR" });
    expect(lines(greedy.byCurrency.get("EUR") ?? [])).toEqual([
      { from: "charlie", to: "alice", amount: "30.00" },
      { from: "bob", to: "alice", amount: "10.00" },
    ]);
  });

  it("should leave every member within one unit after paying the plan", async () => {
    await expect(
      ctx.transactionService.createTransaction("grp1", "charlie", {
        kind: "expense",
        amount: "3.01",
        currency: "GBP",
        paidBy: "charlie",
        splitType: "custom",
        shares: [
          { userId: "alice", amount: "1.004" },
          { userId: "bob", amount: "1.004" },
          { userId: "charlie", amount: "1.004" },
        ],
      })
    ).rejects.toThrow(ValidationError);
    await ctx.transactionService.createTransaction("grp1", "charlie", {
      kind: "expense",
      amount: "100.00",
      currency: "GBP",
      paidBy: "charlie",
      splitType: "equal",
    });

    const balances = await ctx.balanceService.getGroupBalances("grp1");
    const plan = await ctx.balanceService.getSettlePlan("grp1", { currency: "GBP" });
    const net = balances.byCurrency.get("GBP") ?? new Map();
    const after = applySettlements(net, plan.byCurrency.get("GBP") ?? []);

    expect(Array.from(plan.byCurrency.keys())).toEqual(["GBP"]);
    for (const remaining of after.values()) {
      expect(remaining.isZero()).toBe(true);
    }
  });

  it("should use the algorithm stored on the group", async () => {
    await ctx.groupService.createGroup({
      id: "grp2",
      name: "Flat",
      creatorId: "alice",
      currency: "EUR",
      settleAlgorithm: "pairs",
    });

    const plan = await ctx.balanceService.getSettlePlan("grp2");
    expect(plan.algorithm).toBe("pairs");
    expect(plan.byCurrency.size).toBe(0);
  });

  it("should report outstanding debts until everything is settled", async () => {
    expect(await ctx.balanceService.hasDebts("grp1")).toBe(true);

    await ctx.transactionService.createTransaction("grp1", "alice", {
      kind: "transfer",
      amount: "30.00",
      transferFrom: "alice",
      transferTo: ["bob", "charlie"],
    });
    await ctx.transactionService.createTransaction("grp1", "bob", {
      kind: "transfer",
      amount: "20.00",
      currency: "USD",
      transferFrom: "bob",
      transferTo: ["alice"],
    });
    await ctx.transactionService.createTransaction("grp1", "charlie", {
      kind: "transfer",
      amount: "20.00",
      currency: "USD",
      transferFrom: "charlie",
      transferTo: ["alice"],
    });

    expect(await ctx.balanceService.hasDebts("grp1")).toBe(false);
  });

  it("should refuse to answer when a transaction cannot be read", async () => {
    const { logger, lines: logLines } = capturingLogger();
    const logged = await createTestContext(logger);
    await seedTrip(logged);
    await logged.transactionRepo.create({
      id: "broken",
      groupId: "grp1",
      createdBy: "alice",
      kind: "transfer",
      amount: "5.00",
      currency: "EUR",
      date: new Date("2024-01-01T00:00:00Z"),
      comment: null,
      transferFrom: "alice",
      transferTo: [],
    });

    await expect(logged.balanceService.hasDebts("grp1")).rejects.toThrow(BalanceComputationError);
    const balances = await logged.balanceService.getGroupBalances("grp1");
    logged.handle.close();

    expect(balances.skipped).toEqual([
      { transactionId: "broken", reason: "transfer has no recipients" },
    ]);
    const warning = logLines.find(
      (line) => line.msg === "transaction skipped in balance computation"
    );
    expect(warning).toMatchObject({
      level: 40,
      service: "BalanceService",
      groupId: "grp1",
      transactionId: "broken",
      reason: "transfer has no recipients",
    });
  });

  it("should preview what a user owes across groups", async () => {
    await ctx.groupService.createGroup({
      id: "grp3",
      name: "Other",
      creatorId: "dave",
      currency: "EUR",
    });

    const preview = await ctx.balanceService.getDebtsPreview("bob", ["grp1", "grp3", "nope"]);

    expect(preview).toEqual({
      grp1: { owe: { EUR: "30.00" }, owed: { USD: "20.00" } },
    });
  });

  it("should give the balance between two members", async () => {
    expect(await ctx.balanceService.getPairBalance("grp1", "alice", "bob")).toEqual({
      EUR: "30.00",
      USD: "-20.00",
    });
    await expect(ctx.balanceService.getPairBalance("grp1", "alice", "zoe")).rejects.toThrow(
      NotFoundError
    );
  });

  it("should fail for an unknown group", async () => {
    await expect(ctx.balanceService.getGroupBalances("nope")).rejects.toThrow(
      "Group nope not found"
    );
  });
});
