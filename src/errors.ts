/**
 * Error types carrying the HTTP status and machine code the error handler
 * reports. Services throw these; routes let them bubble up.
 */

class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

class AccountNotFoundError extends AppError {
  constructor(scopeId: string, subjectId: string) {
    super(
      "A bank account is required. Open one with POST /api/bank/register",
      403,
      "ACCOUNT_REQUIRED",
      { serverId: scopeId, memberId: subjectId },
    );
  }
}

class AccountExistsError extends AppError {
  constructor() {
    super("A bank account already exists for this member", 409, "ACCOUNT_EXISTS");
  }
}

class InsufficientFundsError extends AppError {
  constructor(balance: number, cost: number) {
    super(`You have ${balance} credits, but that costs ${cost}`, 402, "INSUFFICIENT_FUNDS", {
      balance,
      cost,
    });
  }
}

/** Non-negative integer check shared by every amount-taking operation. */
function assertCount(field: string, value: unknown, options: { positive?: boolean } = {}): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, { field });
  }
  if (options.positive && value === 0) {
    throw new ValidationError(`${field} must be greater than zero`, { field });
  }
  return value;
}

export {
  AppError,
  ValidationError,
  AccountNotFoundError,
  AccountExistsError,
  InsufficientFundsError,
  assertCount,
};
