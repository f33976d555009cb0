import {
  BaseError,
  ContractFunctionRevertedError,
  ExecutionRevertedError,
  HttpRequestError,
  InsufficientFundsError,
  InvalidAddressError,
  NonceTooLowError,
  TimeoutError,
  WaitForTransactionReceiptTimeoutError,
} from "viem";
import { ErrorCode as LedgerErrorCode, LedgerError } from "../../ledger-adapter/src/index.js";
import { CustodyErrorCode, ERROR_CODE_HINTS, ERROR_CODE_NAMES } from "./errors/codes.js";

export { CustodyErrorCode } from "./errors/codes.js";

export class CustodyError extends Error {
  constructor(
    public readonly code: CustodyErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = ERROR_CODE_NAMES[code];
  }

  get hint(): string | undefined {
    return ERROR_CODE_HINTS[this.code];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }

  static invalidArgument(message: string): CustodyError {
    return new CustodyError(CustodyErrorCode.E_INVALID_ARGUMENT, message);
  }

  static invalidAddress(value: string): CustodyError {
    return new CustodyError(
      CustodyErrorCode.E_INVALID_ADDRESS,
      `"${value}" is not a valid EVM address`,
      { value },
    );
  }

  static notFound(caseId: string, evidenceId: string): CustodyError {
    return new CustodyError(
      CustodyErrorCode.E_NOT_FOUND,
      `No evidence ${evidenceId} recorded for case ${caseId}`,
      { caseId, evidenceId },
    );
  }

  static upload(message: string, cause?: unknown): CustodyError {
    return new CustodyError(CustodyErrorCode.E_UPLOAD, message, undefined, { cause });
  }

  static config(message: string, cause?: unknown): CustodyError {
    return new CustodyError(CustodyErrorCode.E_CONFIG, message, undefined, { cause });
  }
}

/** Outcome of every custody operation; failures are values, not exceptions. */
export type CustodyResult<T> = { ok: true; value: T } | { ok: false; error: CustodyError };

export function ok<T>(value: T): CustodyResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: CustodyError): CustodyResult<T> {
  return { ok: false, error };
}

/** "TransactionError: Evidence already exists" */
export function formatCustodyError(error: CustodyError): string {
  return `${error.name}: ${error.message}`;
}

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

/**
 * Strip credentials from error text before it reaches the console.
 * URLs keep only their origin; bearer tokens and JWTs are masked.
 */
export function redactSensitiveInfo(message: string): string {
  let redacted = message.replace(/https?:\/\/[^\s"'<>)\]]+/g, (raw) => {
    try {
      return new URL(raw).origin;
    } catch {
      return "[URL]";
    }
  });
  redacted = redacted.replace(/eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, "[TOKEN]");
  redacted = redacted.replace(/\bBearer\s+[^\s]+/gi, "Bearer [REDACTED]");
  return redacted;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const ACCESS_DENIED_PATTERN = /not authori[sz]ed|access denied|caller is not/i;
const NOT_FOUND_PATTERN = /not found|does not exist|not registered|no such evidence/i;
const CONNECTION_PATTERN =
  /ECONNREFUSED|ECONNRESET|ENOTFOUND|EHOSTUNREACH|ETIMEDOUT|fetch failed|socket hang up/i;

function causeChain(err: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = err;
  while (current !== undefined && current !== null && chain.length < 16) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function textOf(err: unknown): string {
  if (err instanceof BaseError) {
    return [err.shortMessage, err.details].filter(Boolean).join(" ");
  }
  return messageOf(err) ?? String(err ?? "");
}

function messageOf(err: unknown): string | undefined {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null && "message" in err) {
    return typeof err.message === "string" ? err.message : undefined;
  }
  return undefined;
}

/**
 * viem's outer short message is generic ("Missing or invalid parameters.").
 * Prefer a decoded revert reason, then the node's own wording from the
 * innermost non-viem cause ("VM Exception while processing transaction: revert ...").
 */
function headlineOf(err: unknown, chain: unknown[]): string {
  let raw = textOf(err);
  if (err instanceof BaseError) {
    const revert = chain.find(
      (cause): cause is ContractFunctionRevertedError =>
        cause instanceof ContractFunctionRevertedError && Boolean(cause.reason),
    );
    const nodeMessage = chain
      .filter((cause) => !(cause instanceof BaseError))
      .map(messageOf)
      .reverse()
      .find((message) => message !== undefined && message.trim() !== "");
    raw = revert?.reason ?? nodeMessage ?? err.shortMessage;
  }
  const collapsed = raw.replace(/\s*\n\s*/g, " ").trim();
  return redactSensitiveInfo(collapsed.length > 0 ? collapsed : "unknown error");
}

function classifyRevert(text: string): CustodyErrorCode {
  if (ACCESS_DENIED_PATTERN.test(text)) return CustodyErrorCode.E_ACCESS_DENIED;
  if (NOT_FOUND_PATTERN.test(text)) return CustodyErrorCode.E_NOT_FOUND;
  return CustodyErrorCode.E_TRANSACTION;
}

function fromLedgerError(err: LedgerError): CustodyErrorCode | undefined {
  switch (err.code) {
    case LedgerErrorCode.TRANSACTION_PENDING:
      return CustodyErrorCode.E_PENDING_UNKNOWN;
    case LedgerErrorCode.SIGNER_NOT_AVAILABLE:
    case LedgerErrorCode.SIGNER_MISMATCH:
    case LedgerErrorCode.INVALID_PARAMS:
      return CustodyErrorCode.E_CONFIG;
    default:
      return undefined;
  }
}

function decisiveCode(err: unknown): CustodyErrorCode | undefined {
  if (err instanceof CustodyError) return err.code;
  if (err instanceof LedgerError) return fromLedgerError(err);
  if (err instanceof InvalidAddressError) return CustodyErrorCode.E_INVALID_ADDRESS;
  if (err instanceof WaitForTransactionReceiptTimeoutError) {
    return CustodyErrorCode.E_PENDING_UNKNOWN;
  }
  if (err instanceof HttpRequestError || err instanceof TimeoutError) {
    return CustodyErrorCode.E_CONNECTION;
  }
  if (err instanceof ContractFunctionRevertedError) {
    return classifyRevert([err.reason, textOf(err)].filter(Boolean).join(" "));
  }
  if (err instanceof ExecutionRevertedError) {
    return classifyRevert(textOf(err));
  }
  if (err instanceof InsufficientFundsError || err instanceof NonceTooLowError) {
    return CustodyErrorCode.E_TRANSACTION;
  }
  return undefined;
}

/**
 * Map anything thrown by the ledger stack onto the custody taxonomy.
 *
 * Walks the cause chain from the outermost error inwards; the first error
 * with a known meaning decides the code. When none does, the combined text
 * is matched for revert reasons and network failures before `fallback`.
 */
export function classifyLedgerError(
  err: unknown,
  fallback: CustodyErrorCode = CustodyErrorCode.E_TRANSACTION,
): CustodyError {
  if (err instanceof CustodyError) {
    return err;
  }

  const chain = causeChain(err);
  const message = headlineOf(err, chain);
  const details = err instanceof LedgerError && isRecord(err.details) ? err.details : undefined;

  for (const cause of chain) {
    const code = decisiveCode(cause);
    if (code !== undefined) {
      return new CustodyError(code, message, details, { cause: err });
    }
  }

  const text = chain.map(textOf).join(" ");
  let code = fallback;
  if (CONNECTION_PATTERN.test(text)) {
    code = CustodyErrorCode.E_CONNECTION;
  } else if (/revert/i.test(text)) {
    code = classifyRevert(text);
  }
  return new CustodyError(code, message, details, { cause: err });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
