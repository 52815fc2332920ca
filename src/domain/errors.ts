import { AppError } from "../infra/app-error.js";

export class ProviderUnavailableError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
  ) {
    super(503, "provider_unavailable", message);
    this.name = "ProviderUnavailableError";
  }
}

export class ProviderRejectedError extends AppError {
  constructor(
    public readonly provider: string,
    public readonly reason: string,
    message: string,
  ) {
    super(422, "provider_rejected", message);
    this.name = "ProviderRejectedError";
  }
}

export class MalformedCallbackError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
  ) {
    super(400, "malformed_callback", message);
    this.name = "MalformedCallbackError";
  }
}

export class UnbalancedTransactionError extends AppError {
  constructor(
    public readonly transactionGroupId: string,
    message: string,
  ) {
    super(500, "unbalanced_transaction", message);
    this.name = "UnbalancedTransactionError";
  }
}

export class DuplicateReferenceError extends AppError {
  constructor(
    public readonly transactionGroupId: string,
    message: string,
  ) {
    super(500, "duplicate_ledger_reference", message);
    this.name = "DuplicateReferenceError";
  }
}

export function isLedgerInvariantViolation(
  error: unknown,
): error is UnbalancedTransactionError | DuplicateReferenceError {
  return error instanceof UnbalancedTransactionError || error instanceof DuplicateReferenceError;
}
