import { Decimal } from "decimal.js";
import { CurrencyMismatchError, ValidationError } from "../errors.js";

// Default precision (20 significant digits) would round large sums silently
const Exact = Decimal.clone({ precision: 64 });

/** ISO-4217 "no currency"; bucket for legacy transactions without a code. */
export const UNKNOWN_CURRENCY = "XXX";

export function normalizeCurrency(code: string | null | undefined): string {
  const normalized = (code ?? "").trim().toUpperCase();
  return normalized === "" ? UNKNOWN_CURRENCY : normalized;
}

/**
 * One rounding unit at the given scale (0.01 for scale 2, 1 for scale 0).
 */
export function unitOf(scale: number): Decimal {
  return new Exact(1).dividedBy(new Exact(10).pow(scale));
}

/**
 * Parse a decimal amount, rejecting NaN, infinities and anything
 * decimal.js cannot read.
 */
export function parseAmount(value: Decimal.Value): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Exact(value);
  } catch {
    throw new ValidationError(`Invalid amount: "${String(value)}"`, { value: String(value) });
  }
  if (!parsed.isFinite()) {
    throw new ValidationError(`Invalid amount: "${String(value)}"`, { value: String(value) });
  }
  return parsed;
}

/**
 * Exact decimal amount in one currency. Arithmetic keeps full precision;
 * rounding only happens through `round` / `toFixed`.
 */
export class Money {
  private constructor(
    readonly amount: Decimal,
    readonly currency: string
  ) {}

  static of(value: Decimal.Value, currency: string): Money {
    return new Money(parseAmount(value), normalizeCurrency(currency));
  }

  static zero(currency: string): Money {
    return new Money(new Exact(0), normalizeCurrency(currency));
  }

  static sum(values: Iterable<Money>, currency: string): Money {
    let total = Money.zero(currency);
    for (const value of values) {
      total = total.plus(value);
    }
    return total;
  }

  plus(other: Money): Money {
    this.assertSameCurrency(other);
    return new Money(this.amount.plus(other.amount), this.currency);
  }

  minus(other: Money): Money {
    this.assertSameCurrency(other);
    return new Money(this.amount.minus(other.amount), this.currency);
  }

  negated(): Money {
    return new Money(this.amount.negated(), this.currency);
  }

  abs(): Money {
    return new Money(this.amount.abs(), this.currency);
  }

  compare(other: Money): number {
    this.assertSameCurrency(other);
    return this.amount.comparedTo(other.amount);
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.amount.equals(other.amount);
  }

  isZero(): boolean {
    return this.amount.isZero();
  }

  isPositive(): boolean {
    return this.amount.greaterThan(0);
  }

  isNegative(): boolean {
    return this.amount.lessThan(0);
  }

  round(scale: number): Money {
    return new Money(this.amount.toDecimalPlaces(scale, Decimal.ROUND_HALF_UP), this.currency);
  }

  /** True when the amount rounds to zero at the given scale. */
  isNegligible(scale: number): boolean {
    return this.amount.abs().toDecimalPlaces(scale, Decimal.ROUND_HALF_UP).isZero();
  }

  /** True when the magnitude is less than one rounding unit. */
  isBelowUnit(scale: number): boolean {
    return this.amount.abs().lessThan(unitOf(scale));
  }

  toFixed(scale: number): string {
    const fixed = this.amount.toFixed(scale, Decimal.ROUND_HALF_UP);
    // decimal.js keeps the sign of values that round to zero ("-0.00")
    return /^-0(\.0+)?$/.test(fixed) ? fixed.slice(1) : fixed;
  }

  /** Full precision, never in exponent notation. */
  toDecimalString(): string {
    return this.amount.toFixed();
  }

  toString(): string {
    return `${this.amount.toString()} ${this.currency}`;
  }

  private assertSameCurrency(other: Money): void {
    if (other.currency !== this.currency) {
      throw new CurrencyMismatchError(this.currency, other.currency);
    }
  }
}
