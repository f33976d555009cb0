/**
 * Stable error codes for the evidence custody client.
 * Every ledger and upload operation reports failures with one of these.
 */

export enum CustodyErrorCode {
  /**
   * Ledger node or storage daemon unreachable.
   * Examples:
   * - connection refused
   * - RPC request timeout
   */
  E_CONNECTION = "E_CONNECTION",

  /**
   * The node rejected the transaction or the contract reverted it.
   * Examples:
   * - duplicate evidence id
   * - insufficient funds for gas
   * - receipt with status "reverted"
   */
  E_TRANSACTION = "E_TRANSACTION",

  /** Malformed EVM address. */
  E_INVALID_ADDRESS = "E_INVALID_ADDRESS",

  /** The contract has no record for the (case, evidence) pair. */
  E_NOT_FOUND = "E_NOT_FOUND",

  /**
   * Attachment upload failed.
   * Examples:
   * - file not found
   * - IPFS daemon not running
   */
  E_UPLOAD = "E_UPLOAD",

  /**
   * Transaction was sent but its confirmation could not be observed.
   * It may still be mined; it must not be resubmitted blindly.
   */
  E_PENDING_UNKNOWN = "E_PENDING_UNKNOWN",

  /** The contract refused the caller (e.g. "Not authorized"). */
  E_ACCESS_DENIED = "E_ACCESS_DENIED",

  /** Local input rejected before any remote call. */
  E_INVALID_ARGUMENT = "E_INVALID_ARGUMENT",

  /** Configuration, contract descriptor or key material unusable. */
  E_CONFIG = "E_CONFIG",
}

/** Display names, as printed in front of error messages. */
export const ERROR_CODE_NAMES: Record<CustodyErrorCode, string> = {
  [CustodyErrorCode.E_CONNECTION]: "ConnectionError",
  [CustodyErrorCode.E_TRANSACTION]: "TransactionError",
  [CustodyErrorCode.E_INVALID_ADDRESS]: "InvalidAddress",
  [CustodyErrorCode.E_NOT_FOUND]: "NotFound",
  [CustodyErrorCode.E_UPLOAD]: "UploadError",
  [CustodyErrorCode.E_PENDING_UNKNOWN]: "PendingUnknown",
  [CustodyErrorCode.E_ACCESS_DENIED]: "AccessDenied",
  [CustodyErrorCode.E_INVALID_ARGUMENT]: "InvalidArgument",
  [CustodyErrorCode.E_CONFIG]: "ConfigError",
};

/** Hints shown under an error, where the user can act on it. */
export const ERROR_CODE_HINTS: Partial<Record<CustodyErrorCode, string>> = {
  [CustodyErrorCode.E_CONNECTION]: "Check that the node is running and retry from the menu.",
  [CustodyErrorCode.E_PENDING_UNKNOWN]:
    "Look the transaction up on the node before submitting the same operation again.",
  [CustodyErrorCode.E_UPLOAD]: "Evidence was not registered.",
};
