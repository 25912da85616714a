import { InvalidMemberError, ShareMismatchError, ValidationError, type MemberField } from "../errors.js";
import { Money } from "./money.js";
import type { AggregatedShare, MemberId, RawShare } from "../types/index.js";

/**
 * Merge raw share lines into one share per user and check them against the
 * transaction total.
 *
 * Lines for the same user are summed (share counts too, when given). The sum
 * is rounded to the currency scale once, after summation, and must equal the
 * expected total rounded the same way.
 *
 * @throws ValidationError on negative or unparsable amounts
 * @throws ShareMismatchError when the rounded sum differs from the total
 */
export function aggregateShares(
  rawShares: readonly RawShare[],
  expectedTotal: Money,
  scale: number
): Map<MemberId, AggregatedShare> {
  const currency = expectedTotal.currency;
  const aggregated = new Map<MemberId, AggregatedShare>();

  for (const line of rawShares) {
    const amount = Money.of(line.amount, currency);
    if (amount.isNegative()) {
      throw new ValidationError(`Share amount for ${line.userId} cannot be negative`, {
        field: "shares",
        userId: line.userId,
      });
    }

    const existing = aggregated.get(line.userId);
    const count = line.shares ?? undefined;
    if (!existing) {
      aggregated.set(line.userId, count === undefined ? { amount } : { amount, shares: count });
      continue;
    }

    existing.amount = existing.amount.plus(amount);
    if (count !== undefined) {
      existing.shares = (existing.shares ?? 0) + count;
    }
  }

  const total = Money.sum(
    Array.from(aggregated.values(), (share) => share.amount),
    currency
  ).round(scale);
  const expected = expectedTotal.round(scale);

  if (!total.equals(expected)) {
    throw new ShareMismatchError(expected.toFixed(scale), total.toFixed(scale));
  }

  return aggregated;
}

/**
 * Check that every id belongs to the group's active member set.
 * @throws InvalidMemberError naming the first offending id and its field
 */
export function assertMembers(
  ids: Iterable<MemberId>,
  members: ReadonlySet<MemberId>,
  field: MemberField
): void {
  for (const id of ids) {
    if (!members.has(id)) {
      throw new InvalidMemberError(id, field);
    }
  }
}
