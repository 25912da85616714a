import { pino, type Logger } from "pino";
import { Money } from "../src/engine/index.js";
import type {
  ExpenseTransaction,
  NetBalanceMap,
  Settlement,
  TransferTransaction,
} from "../src/types/index.js";

let sequence = 0;

export function expense(
  params: Partial<Omit<ExpenseTransaction, "shares" | "kind">> & {
    shares?: Array<[string, string]>;
  }
): ExpenseTransaction {
  sequence += 1;
  return {
    id: params.id ?? `exp${sequence}`,
    groupId: params.groupId ?? "grp1",
    createdBy: params.createdBy ?? params.paidBy ?? "alice",
    kind: "expense",
    amount: params.amount ?? "0.00",
    currency: params.currency === undefined ? "USD" : params.currency,
    date: params.date ?? new Date("2024-01-01T00:00:00Z"),
    comment: params.comment ?? null,
    isDeleted: params.isDeleted === undefined ? false : params.isDeleted,
    paidBy: params.paidBy === undefined ? "alice" : params.paidBy,
    categoryId: params.categoryId ?? null,
    splitType: params.splitType ?? "custom",
    shares: (params.shares ?? []).map(([userId, amount]) => ({ userId, amount, shares: null })),
  };
}

export function transfer(
  params: Partial<Omit<TransferTransaction, "kind">>
): TransferTransaction {
  sequence += 1;
  return {
    id: params.id ?? `trf${sequence}`,
    groupId: params.groupId ?? "grp1",
    createdBy: params.createdBy ?? params.transferFrom ?? "alice",
    kind: "transfer",
    amount: params.amount ?? "0.00",
    currency: params.currency === undefined ? "USD" : params.currency,
    date: params.date ?? new Date("2024-01-01T00:00:00Z"),
    comment: params.comment ?? null,
    isDeleted: params.isDeleted === undefined ? false : params.isDeleted,
    transferFrom: params.transferFrom === undefined ? "alice" : params.transferFrom,
    transferTo: params.transferTo === undefined ? ["bob"] : params.transferTo,
  };
}

export function netMap(currency: string, entries: Record<string, string>): NetBalanceMap {
  return new Map(Object.entries(entries).map(([id, value]) => [id, Money.of(value, currency)]));
}

/** Net map rendered as fixed strings, for exact assertions. */
export function fixed(net: NetBalanceMap | undefined, scale = 2): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [id, value] of net ?? []) {
    result[id] = value.toFixed(scale);
  }
  return result;
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function capturingLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    }
  );
  return { logger, lines };
}

export function lines(
  settlements: readonly Settlement[],
  scale = 2
): Array<{ from: string; to: string; amount: string }> {
  return settlements.map(({ from, to, amount }) => ({ from, to, amount: amount.toFixed(scale) }));
}

/** Deterministic pseudo-random integers for property-style tests. */
export function seededRandom(seed: number): (maxExclusive: number) => number {
  let state = seed >>> 0;
  return (maxExclusive: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % maxExclusive;
  };
}
