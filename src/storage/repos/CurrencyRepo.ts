import { inArray, eq, sql } from "drizzle-orm";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Db } from "../db.js";
import { currencies } from "../schema.js";
import type { Currency } from "../../types/index.js";

const DEFAULT_CURRENCIES_PATH = fileURLToPath(
  new URL("../../../data/currencies.json", import.meta.url)
);

const CurrencyFileSchema = z.array(
  z.object({
    code: z.string().regex(/^[A-Z]{3}$/),
    numericCode: z.number().int(),
    decimals: z.number().int().min(0),
    symbol: z.string().nullable(),
  })
);

export function readCurrencyFile(path: string = DEFAULT_CURRENCIES_PATH): Currency[] {
  const parsed = CurrencyFileSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!parsed.success) {
    throw new Error(`Malformed currency reference data in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export class CurrencyRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async seed(entries: Currency[] = readCurrencyFile()): Promise<void> {
    if (entries.length === 0) return;

    await this.db
      .insert(currencies)
      .values(entries)
      .onConflictDoUpdate({
        target: currencies.code,
        set: {
          numericCode: sql`excluded.numeric_code`,
          decimals: sql`excluded.decimals`,
          symbol: sql`excluded.symbol`,
        },
      });
  }

  async findByCode(code: string): Promise<Currency | null> {
    const row = await this.db.select().from(currencies).where(eq(currencies.code, code)).get();
    return row ?? null;
  }

  /** Decimal places for the requested codes; unknown codes are absent. */
  async decimalsFor(codes: Iterable<string>): Promise<Map<string, number>> {
    const wanted = Array.from(new Set(codes));
    if (wanted.length === 0) return new Map();

    const rows = await this.db
      .select({ code: currencies.code, decimals: currencies.decimals })
      .from(currencies)
      .where(inArray(currencies.code, wanted));

    return new Map(rows.map((row) => [row.code, row.decimals]));
  }
}
