import { UnknownCurrencyError } from "../errors.js";
import { normalizeCurrency } from "./money.js";

/**
 * Resolves the number of fractional digits for a currency code.
 * Throws UnknownCurrencyError instead of guessing.
 */
export type ScaleResolver = (currency: string) => number;

export function createScaleResolver(
  decimalsByCode: ReadonlyMap<string, number> | Record<string, number>
): ScaleResolver {
  const table = new Map<string, number>(
    decimalsByCode instanceof Map ? decimalsByCode : Object.entries(decimalsByCode)
  );

  return (currency: string): number => {
    const code = normalizeCurrency(currency);
    const decimals = table.get(code);
    if (decimals === undefined) {
      throw new UnknownCurrencyError(code);
    }
    return decimals;
  };
}
