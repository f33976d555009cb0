/**
 * Ledger adapter error types
 */

/**
 * Error code table
 */
export const ErrorCode = {
  INVALID_PARAMS: "INVALID_PARAMS",

  // Transactions
  TRANSACTION_PENDING: "TRANSACTION_PENDING",

  // Signing
  SIGNER_NOT_AVAILABLE: "SIGNER_NOT_AVAILABLE",
  SIGNER_MISMATCH: "SIGNER_MISMATCH",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error raised by the EVM client and wallet.
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }

  static transactionPending(txHash: string, cause: unknown): LedgerError {
    return new LedgerError(
      `Transaction ${txHash} was sent but its confirmation status is unknown`,
      ErrorCode.TRANSACTION_PENDING,
      { txHash },
      { cause },
    );
  }

  static signerNotAvailable(reason: string, cause?: unknown): LedgerError {
    return new LedgerError(
      `Signer not available: ${reason}`,
      ErrorCode.SIGNER_NOT_AVAILABLE,
      undefined,
      { cause },
    );
  }

  static signerMismatch(expected: string, actual: string): LedgerError {
    return new LedgerError(
      `Key file belongs to ${actual}, but the configured account is ${expected}`,
      ErrorCode.SIGNER_MISMATCH,
      { expected, actual },
    );
  }
}
