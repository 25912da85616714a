/**
 * Domain errors. Each carries a stable `code` that the HTTP layer maps to a
 * status; see `src/api/errors.ts`.
 */
export class LedgerError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ShareMismatchError extends LedgerError {
  constructor(readonly expected: string, readonly actual: string) {
    super(
      "SHARE_MISMATCH",
      `Shares must sum to the transaction amount (${expected}), got ${actual}`,
      { field: "shares", expected, actual }
    );
  }
}

export type MemberField = "paidBy" | "shares" | "transferFrom" | "transferTo" | "userId";

export class InvalidMemberError extends LedgerError {
  constructor(readonly userId: string, readonly field: MemberField) {
    super("INVALID_MEMBER", `User ${userId} in "${field}" is not a member of the group`, {
      field,
      userId,
    });
  }
}

export class UnknownCurrencyError extends LedgerError {
  constructor(readonly currency: string) {
    super("UNKNOWN_CURRENCY", `No rounding scale known for currency "${currency}"`, {
      currency,
    });
  }
}

export class CurrencyMismatchError extends LedgerError {
  constructor(left: string, right: string) {
    super("CURRENCY_MISMATCH", `Cannot combine ${left} with ${right}`, { left, right });
  }
}

export class BalanceComputationError extends LedgerError {
  constructor(readonly transactionIds: string[]) {
    super(
      "BALANCE_COMPUTATION_FAILED",
      `Balances are incomplete: ${transactionIds.length} transaction(s) could not be read`,
      { transactionIds }
    );
  }
}

export class ValidationError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
  }
}

export class NotFoundError extends LedgerError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} ${id} not found`, { entity, id });
  }
}

export class ConflictError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFLICT", message, details);
  }
}
