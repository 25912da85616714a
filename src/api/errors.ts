import type { ErrorRequestHandler } from "express";
import { LedgerError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

const STATUS_MAP: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  SHARE_MISMATCH: 422,
  INVALID_MEMBER: 422,
  // data integrity problems, not user input
  UNKNOWN_CURRENCY: 500,
  CURRENCY_MISMATCH: 500,
  BALANCE_COMPUTATION_FAILED: 500,
};

const INTERNAL_MESSAGE = "Something went wrong on our side. Please try again or contact support.";

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Global error handler. Domain errors map to their status; 5xx responses
 * never carry internal details.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isJsonSyntaxError(err)) {
      res.status(400).json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"));
      return;
    }

    if (err instanceof LedgerError) {
      const status = STATUS_MAP[err.code] ?? 500;
      if (status < 500) {
        res.status(status).json(createErrorEnvelope(err.code, err.message, err.details));
        return;
      }
    }

    logger.error({ err, method: req.method, path: req.path }, "request failed");
    const code = err instanceof LedgerError ? err.code : "INTERNAL_ERROR";
    res.status(500).json(createErrorEnvelope(code, INTERNAL_MESSAGE));
  };
}
