import { ZodError } from "zod";

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONTH"
  | "INVALID_FIELD"
  | "BUDGET_EXCEEDED"
  | "NOT_FOUND"
  | "PERSISTENCE_FAILURE";

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}

export interface NormalisedError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export function normaliseError(error: unknown): NormalisedError {
  if (error instanceof LedgerError) {
    return {
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return {
      code: "INVALID_INPUT",
      message: "Input validation failed",
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path,
          message: issue.message,
          code: issue.code,
        })),
      },
    };
  }

  if (error instanceof Error) {
    return {
      code: "INTERNAL_ERROR",
      message: error.message,
    };
  }

  return {
    code: "UNKNOWN_ERROR",
    message: "Unexpected error",
  };
}
