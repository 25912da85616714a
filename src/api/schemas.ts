import { z } from "zod";
import { ValidationError } from "../errors.js";

// JSON numbers are accepted but strings keep their exact digits
const decimal = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(
    z
      .string()
      .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal")
      .regex(/^(?!\d{13})/, "must have at most 12 integer digits")
  );

const currencyCode = z.string().trim().length(3);
const memberId = z.string().trim().min(1);

const ShareSchema = z.object({
  userId: memberId,
  amount: decimal.optional(),
  shares: z.number().int().positive().nullable().optional(),
});

const TransactionBase = {
  amount: decimal,
  currency: currencyCode.nullable().optional(),
  date: z.coerce.date().optional(),
  comment: z.string().max(500).nullable().optional(),
};

export const TransactionBodySchema = z.discriminatedUnion("kind", [
  z.object({
    ...TransactionBase,
    kind: z.literal("expense"),
    paidBy: memberId,
    splitType: z.enum(["equal", "shares", "custom"]),
    categoryId: z.number().int().nullable().optional(),
    shares: z.array(ShareSchema).optional(),
  }),
  z.object({
    ...TransactionBase,
    kind: z.literal("transfer"),
    transferFrom: memberId,
    transferTo: z.array(memberId).min(1),
  }),
]);

export const GroupBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  currency: currencyCode,
  settleAlgorithm: z.enum(["greedy", "pairs"]).optional(),
  members: z.array(memberId).optional(),
});

export const MemberBodySchema = z.object({
  userId: memberId,
});

export const SettleUpQuerySchema = z.object({
  algorithm: z.enum(["greedy", "pairs"]).optional(),
  currency: currencyCode.optional(),
});

export const DebtsPreviewQuerySchema = z.object({
  groupIds: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    ),
});

/**
 * Parse a request body or query against a schema.
 * @throws ValidationError listing every failing field
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError("Request validation failed", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
