import { formatUnits, getAddress, isAddress } from "viem";
import type { Address, TxHash, TxReceipt } from "../../../ledger-adapter/src/index.js";
import {
  classifyLedgerError,
  CustodyError,
  CustodyErrorCode,
  fail,
  ok,
  type CustodyResult,
} from "../errors.js";
import type { CustodyLogger } from "../logger.js";
import type { ClientSession } from "../session.js";
import type { CustodyWrite, EvidenceCustodyGateway } from "./gateway.js";
import {
  DEFAULT_REGISTER_ACTION,
  DEFAULT_TRANSFER_ACTION,
  type AccountBalance,
  type CustodyReceipt,
  type EvidenceRecord,
  type HistoryEntry,
  type RegisterEvidenceInput,
  type TransferEvidenceInput,
} from "./types.js";

type RecordKey = { caseId: string; evidenceId: string };

/**
 * Remote ledger client for the EvidenceChainOfCustody contract.
 *
 * Every operation resolves to a CustodyResult; remote failures never throw.
 * State-changing calls run strictly in sequence: pending nonce, submit with
 * that nonce, wait for the receipt. They are never retried.
 */
export class EvidenceLedgerClient {
  constructor(
    private readonly session: ClientSession,
    private readonly gateway: EvidenceCustodyGateway,
    private readonly logger: CustodyLogger,
  ) {}

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  async register(input: RegisterEvidenceInput): Promise<CustodyResult<CustodyReceipt>> {
    const key = requireKey(input.caseId, input.evidenceId);
    if (!key.ok) return key;
    const { caseId, evidenceId } = key.value;

    return this.send(
      {
        functionName: "registerEvidence",
        args: [
          caseId,
          evidenceId,
          input.holderName,
          input.description,
          input.attachmentHash,
          input.action || DEFAULT_REGISTER_ACTION,
        ],
      },
      `register ${caseId}/${evidenceId}`,
    );
  }

  async transfer(input: TransferEvidenceInput): Promise<CustodyResult<CustodyReceipt>> {
    const key = requireKey(input.caseId, input.evidenceId);
    if (!key.ok) return key;
    const recipient = checksum(input.newHolderAddress);
    if (!recipient.ok) return recipient;
    const { caseId, evidenceId } = key.value;

    return this.send(
      {
        functionName: "transferEvidence",
        args: [
          caseId,
          evidenceId,
          recipient.value,
          input.newHolderName,
          input.action || DEFAULT_TRANSFER_ACTION,
          input.description ?? "",
        ],
      },
      `transfer ${caseId}/${evidenceId} to ${recipient.value}`,
    );
  }

  async delete(caseId: string, evidenceId: string): Promise<CustodyResult<CustodyReceipt>> {
    const key = requireKey(caseId, evidenceId);
    if (!key.ok) return key;

    return this.send(
      { functionName: "deleteEvidence", args: [key.value.caseId, key.value.evidenceId] },
      `delete ${key.value.caseId}/${key.value.evidenceId}`,
    );
  }

  async grantAccess(
    caseId: string,
    evidenceId: string,
    viewer: string,
  ): Promise<CustodyResult<CustodyReceipt>> {
    const key = requireKey(caseId, evidenceId);
    if (!key.ok) return key;
    const user = checksum(viewer);
    if (!user.ok) return user;

    return this.send(
      { functionName: "grantAccess", args: [key.value.caseId, key.value.evidenceId, user.value] },
      `grant ${user.value} on ${key.value.caseId}/${key.value.evidenceId}`,
    );
  }

  async revokeAccess(
    caseId: string,
    evidenceId: string,
    viewer: string,
  ): Promise<CustodyResult<CustodyReceipt>> {
    const key = requireKey(caseId, evidenceId);
    if (!key.ok) return key;
    const user = checksum(viewer);
    if (!user.ok) return user;

    return this.send(
      { functionName: "revokeAccess", args: [key.value.caseId, key.value.evidenceId, user.value] },
      `revoke ${user.value} on ${key.value.caseId}/${key.value.evidenceId}`,
    );
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async view(caseId: string, evidenceId: string): Promise<CustodyResult<EvidenceRecord>> {
    const key = requireKey(caseId, evidenceId);
    if (!key.ok) return key;

    try {
      const [id, recordCase, currentHolder, holderName, description, ipfsHash, isDeleted] =
        await this.gateway.viewEvidence(key.value.caseId, key.value.evidenceId);
      // Unknown pairs come back as the default struct
      if (id === "") {
        return fail(CustodyError.notFound(key.value.caseId, key.value.evidenceId));
      }
      return ok({
        caseId: recordCase,
        evidenceId: id,
        currentHolder,
        holderName,
        description,
        contentHash: ipfsHash,
        deleted: isDeleted,
      });
    } catch (err) {
      return fail(this.readFailure(err, key.value, "viewEvidence"));
    }
  }

  async history(caseId: string, evidenceId: string): Promise<CustodyResult<HistoryEntry[]>> {
    const key = requireKey(caseId, evidenceId);
    if (!key.ok) return key;

    try {
      const entries = await this.gateway.getHistory(key.value.caseId, key.value.evidenceId);
      return ok(
        entries.map((entry) => ({
          holder: entry.holder,
          holderName: entry.holderName,
          action: entry.action,
          description: entry.description,
          timestamp: Number(entry.timestamp),
        })),
      );
    } catch (err) {
      const error = this.readFailure(err, key.value, "getHistory");
      // No history is an empty list, not an error
      if (error.code === CustodyErrorCode.E_NOT_FOUND) {
        return ok([]);
      }
      return fail(error);
    }
  }

  async listAllEvidenceIds(): Promise<CustodyResult<string[]>> {
    try {
      const ids = await this.gateway.getAllEvidenceIds();
      return ok([...ids]);
    } catch (err) {
      return fail(this.connectionFailure(err, "getAllEvidenceIds"));
    }
  }

  async getBalance(address?: string): Promise<CustodyResult<AccountBalance>> {
    let target: Address = this.session.account;
    if (address !== undefined && address.trim() !== "") {
      const checked = checksum(address);
      if (!checked.ok) return checked;
      target = checked.value;
    }

    try {
      const wei = await this.gateway.getBalance(target);
      const { decimals, symbol } = this.session.config.chain;
      return ok({ address: target, wei, formatted: formatUnits(wei, decimals), symbol });
    } catch (err) {
      return fail(this.connectionFailure(err, "getBalance"));
    }
  }

  async listAccounts(): Promise<CustodyResult<Address[]>> {
    try {
      const accounts = await this.gateway.listAccounts();
      return ok([...accounts]);
    } catch (err) {
      return fail(this.connectionFailure(err, "eth_accounts"));
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async send(call: CustodyWrite, label: string): Promise<CustodyResult<CustodyReceipt>> {
    let nonce: number;
    try {
      nonce = await this.gateway.getPendingNonce(this.session.account);
    } catch (err) {
      return fail(this.connectionFailure(err, label));
    }

    let txHash: TxHash;
    try {
      this.logger.debug?.(`${label}: submitting ${call.functionName} with nonce ${nonce}`);
      txHash = await this.gateway.submit(call, { nonce });
    } catch (err) {
      return fail(this.logFailure(classifyLedgerError(err, CustodyErrorCode.E_TRANSACTION), label));
    }

    this.logger.info(`${label}: sent ${txHash}`);

    let receipt: TxReceipt;
    try {
      receipt = await this.gateway.waitForReceipt(txHash);
    } catch (err) {
      return fail(this.logFailure(pendingUnknown(txHash, err), label));
    }

    if (receipt.status === "reverted") {
      return fail(
        this.logFailure(
          new CustodyError(
            CustodyErrorCode.E_TRANSACTION,
            `Transaction ${txHash} reverted in block ${receipt.blockNumber}`,
            { txHash, blockNumber: receipt.blockNumber },
          ),
          label,
        ),
      );
    }

    this.logger.debug?.(`${label}: mined in block ${receipt.blockNumber}`);
    return ok({ txHash, blockNumber: receipt.blockNumber, status: receipt.status });
  }

  private readFailure(err: unknown, key: RecordKey, method: string): CustodyError {
    const classified = classifyLedgerError(err, CustodyErrorCode.E_CONNECTION);
    if (classified.code === CustodyErrorCode.E_NOT_FOUND) {
      return new CustodyError(
        CustodyErrorCode.E_NOT_FOUND,
        CustodyError.notFound(key.caseId, key.evidenceId).message,
        { caseId: key.caseId, evidenceId: key.evidenceId },
        { cause: err },
      );
    }
    return this.logFailure(classified, method);
  }

  private connectionFailure(err: unknown, label: string): CustodyError {
    return this.logFailure(classifyLedgerError(err, CustodyErrorCode.E_CONNECTION), label);
  }

  private logFailure(error: CustodyError, label: string): CustodyError {
    this.logger.warn(`${label} failed: ${error.name}: ${error.message}`);
    return error;
  }
}

/** Anything after the hash is known: the transaction may still be mined. */
function pendingUnknown(txHash: TxHash, err: unknown): CustodyError {
  return new CustodyError(
    CustodyErrorCode.E_PENDING_UNKNOWN,
    `Transaction ${txHash} was sent but its confirmation status is unknown`,
    { txHash },
    { cause: err },
  );
}

function requireKey(caseId: string, evidenceId: string): CustodyResult<RecordKey> {
  const trimmedCase = caseId.trim();
  const trimmedEvidence = evidenceId.trim();
  if (!trimmedCase) {
    return fail(CustodyError.invalidArgument("Case ID must not be empty"));
  }
  if (!trimmedEvidence) {
    return fail(CustodyError.invalidArgument("Evidence ID must not be empty"));
  }
  return ok({ caseId: trimmedCase, evidenceId: trimmedEvidence });
}

function checksum(value: string): CustodyResult<Address> {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) {
    return fail(CustodyError.invalidAddress(value));
  }
  return ok(getAddress(trimmed));
}
