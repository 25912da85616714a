import { Decimal } from "decimal.js";
import { ValidationError } from "../errors.js";
import { Money, unitOf } from "./money.js";
import type { MemberId } from "../types/index.js";

/**
 * Split an amount equally among members
 * Handles rounding by giving the remainder to the last member
 * @param scale - Decimal places of the currency
 * @returns Map of userId to their share
 */
export function splitEqually(
  total: Money,
  memberIds: MemberId[],
  scale: number
): Map<MemberId, Money> {
  if (memberIds.length === 0) {
    throw new ValidationError("Cannot split among zero participants");
  }

  const units = total.amount.dividedBy(unitOf(scale));
  const baseUnits = units.dividedToIntegerBy(memberIds.length);
  const baseShare = Money.of(baseUnits.times(unitOf(scale)), total.currency);

  const splits = new Map<MemberId, Money>();
  let allocated = Money.zero(total.currency);

  memberIds.forEach((userId, index) => {
    // Give remainder to the last member
    const share = index === memberIds.length - 1 ? total.minus(allocated) : baseShare;
    splits.set(userId, share);
    allocated = allocated.plus(share);
  });

  return splits;
}

/**
 * Split an amount in proportion to share counts
 * @param counts - userId to a positive whole number of shares
 * @returns Map of userId to their share, never negative; rounding units go
 * to the largest remainders, ties in input order
 * @throws ValidationError if a count is not a positive integer
 */
export function splitByShareCounts(
  total: Money,
  counts: Map<MemberId, number>,
  scale: number
): Map<MemberId, Money> {
  if (counts.size === 0) {
    throw new ValidationError("Cannot split among zero participants");
  }

  let totalCount = 0;
  for (const [userId, count] of counts) {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError(`Share count for ${userId} must be a positive integer, got ${count}`, {
        field: "shares",
        userId,
      });
    }
    totalCount += count;
  }

  // Whole units rounded down first, then leftover units by largest remainder
  const unit = unitOf(scale);
  const totalUnits = total.amount.dividedBy(unit);
  const allocations = Array.from(counts, ([userId, count]) => {
    const exact = totalUnits.times(count).dividedBy(totalCount);
    const units = exact.toDecimalPlaces(0, Decimal.ROUND_DOWN);
    return { userId, units, remainder: exact.minus(units) };
  });

  let leftover = totalUnits;
  for (const allocation of allocations) {
    leftover = leftover.minus(allocation.units);
  }

  const byRemainder = [...allocations].sort((a, b) => b.remainder.comparedTo(a.remainder));
  for (const allocation of byRemainder) {
    if (leftover.lessThan(1)) break;
    allocation.units = allocation.units.plus(1);
    leftover = leftover.minus(1);
  }
  // a total finer than the scale leaves less than one unit over
  const last = allocations[allocations.length - 1];
  last.units = last.units.plus(leftover);

  return new Map(
    allocations.map(({ userId, units }) => [userId, Money.of(units.times(unit), total.currency)])
  );
}
