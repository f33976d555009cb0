import type { Address, TxHash, TxReceipt } from "../../../ledger-adapter/src/index.js";
import type {
  CustodyWrite,
  EvidenceCustodyGateway,
  RawEvidence,
  RawHistoryEntry,
} from "./gateway.js";

type StoredEvidence = {
  evidenceId: string;
  caseId: string;
  currentHolder: Address;
  holderName: string;
  description: string;
  ipfsHash: string;
  isDeleted: boolean;
  viewers: Set<Address>;
  history: RawHistoryEntry[];
};

type GatewayMethod = keyof EvidenceCustodyGateway;

const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

class RevertError extends Error {
  constructor(reason: string) {
    super(`execution reverted: ${reason}`);
    this.name = "RevertError";
  }
}

/**
 * In-memory EvidenceChainOfCustody. Writes apply when their receipt is
 * awaited, in nonce order, the way a single-account dev node mines them.
 */
export class InMemoryCustodyGateway implements EvidenceCustodyGateway {
  readonly calls: Array<{ method: GatewayMethod; detail?: string }> = [];
  readonly balances = new Map<Address, bigint>();
  accounts: Address[] = [];
  /** Account the next calls are sent from */
  caller: Address;
  /** Block timestamp of the next mined transaction */
  clock = 1_700_000_000;
  /** Receipts for these functions come back reverted without applying */
  revertOnReceipt = new Set<CustodyWrite["functionName"]>();

  private readonly records = new Map<string, StoredEvidence>();
  private readonly pending = new Map<TxHash, { call: CustodyWrite; from: Address }>();
  private readonly failures = new Map<GatewayMethod, Error>();
  private nonce = 0;
  private block = 0;

  constructor(
    caller: Address,
    private readonly admin: Address = caller,
  ) {
    this.caller = caller;
  }

  /** Make the next call to `method` throw `error`. */
  failNext(method: GatewayMethod, error: Error): void {
    this.failures.set(method, error);
  }

  record(caseId: string, evidenceId: string): StoredEvidence | undefined {
    return this.records.get(keyOf(caseId, evidenceId));
  }

  async getPendingNonce(account: Address): Promise<number> {
    this.track("getPendingNonce", account);
    return this.nonce;
  }

  async submit(call: CustodyWrite, options: { nonce: number }): Promise<TxHash> {
    this.track("submit", `${call.functionName}#${options.nonce}`);
    if (options.nonce !== this.nonce) {
      throw new Error(`nonce too low: expected ${this.nonce}, got ${options.nonce}`);
    }
    this.preflight(call, this.caller);
    this.nonce += 1;
    const txHash = toTxHash(this.nonce);
    this.pending.set(txHash, { call, from: this.caller });
    return txHash;
  }

  async waitForReceipt(txHash: TxHash): Promise<TxReceipt> {
    this.track("waitForReceipt", txHash);
    const tx = this.pending.get(txHash);
    if (!tx) {
      throw new Error(`unknown transaction ${txHash}`);
    }
    this.pending.delete(txHash);
    this.block += 1;
    this.clock += 12;

    const reverted = this.revertOnReceipt.has(tx.call.functionName);
    if (!reverted) {
      this.apply(tx.call, tx.from);
    }
    return {
      txHash,
      blockNumber: this.block,
      status: reverted ? "reverted" : "success",
      from: tx.from,
    };
  }

  async viewEvidence(caseId: string, evidenceId: string): Promise<RawEvidence> {
    this.track("viewEvidence", `${caseId}/${evidenceId}`);
    const stored = this.records.get(keyOf(caseId, evidenceId));
    if (!stored) {
      return ["", "", ZERO_ADDRESS, "", "", "", false];
    }
    this.requireViewer(stored, this.caller);
    return [
      stored.evidenceId,
      stored.caseId,
      stored.currentHolder,
      stored.holderName,
      stored.description,
      stored.ipfsHash,
      stored.isDeleted,
    ];
  }

  async getHistory(caseId: string, evidenceId: string): Promise<readonly RawHistoryEntry[]> {
    this.track("getHistory", `${caseId}/${evidenceId}`);
    const stored = this.records.get(keyOf(caseId, evidenceId));
    return stored ? stored.history.map((entry) => ({ ...entry })) : [];
  }

  async getAllEvidenceIds(): Promise<readonly string[]> {
    this.track("getAllEvidenceIds");
    return [...this.records.values()].map((stored) => stored.evidenceId);
  }

  async getBalance(address: Address): Promise<bigint> {
    this.track("getBalance", address);
    return this.balances.get(address) ?? 0n;
  }

  async listAccounts(): Promise<readonly Address[]> {
    this.track("listAccounts");
    return this.accounts;
  }

  private track(method: GatewayMethod, detail?: string): void {
    this.calls.push({ method, detail });
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }

  /** Gas estimation: the node rejects calls that would revert. */
  private preflight(call: CustodyWrite, from: Address): void {
    const [caseId, evidenceId] = call.args;
    const stored = this.records.get(keyOf(caseId, evidenceId));
    if (call.functionName === "registerEvidence") {
      if (stored) throw new RevertError("Evidence already exists");
      return;
    }
    if (!stored) throw new RevertError("Evidence does not exist");
    if (stored.isDeleted) throw new RevertError("Evidence is deleted");
    if (stored.currentHolder !== from) throw new RevertError("Not authorized");
  }

  private apply(call: CustodyWrite, from: Address): void {
    switch (call.functionName) {
      case "registerEvidence": {
        const [caseId, evidenceId, holderName, description, ipfsHash, action] = call.args;
        this.records.set(keyOf(caseId, evidenceId), {
          evidenceId,
          caseId,
          currentHolder: from,
          holderName,
          description,
          ipfsHash,
          isDeleted: false,
          viewers: new Set(),
          history: [
            { holder: from, holderName, action, description, timestamp: BigInt(this.clock) },
          ],
        });
        return;
      }
      case "transferEvidence": {
        const [caseId, evidenceId, newHolder, newHolderName, action, description] = call.args;
        const stored = this.mustGet(caseId, evidenceId);
        stored.currentHolder = newHolder;
        stored.holderName = newHolderName;
        stored.history.push({
          holder: newHolder,
          holderName: newHolderName,
          action,
          description,
          timestamp: BigInt(this.clock),
        });
        return;
      }
      case "deleteEvidence": {
        const [caseId, evidenceId] = call.args;
        this.mustGet(caseId, evidenceId).isDeleted = true;
        return;
      }
      case "grantAccess": {
        const [caseId, evidenceId, user] = call.args;
        this.mustGet(caseId, evidenceId).viewers.add(user);
        return;
      }
      case "revokeAccess": {
        const [caseId, evidenceId, user] = call.args;
        this.mustGet(caseId, evidenceId).viewers.delete(user);
        return;
      }
    }
  }

  private mustGet(caseId: string, evidenceId: string): StoredEvidence {
    const stored = this.records.get(keyOf(caseId, evidenceId));
    if (!stored) throw new RevertError("Evidence does not exist");
    return stored;
  }

  private requireViewer(stored: StoredEvidence, from: Address): void {
    if (from === this.admin || from === stored.currentHolder || stored.viewers.has(from)) {
      return;
    }
    throw new RevertError("Not authorized");
  }
}

function keyOf(caseId: string, evidenceId: string): string {
  return `${caseId}\u0000${evidenceId}`;
}

function toTxHash(n: number): TxHash {
  return `0x${n.toString(16).padStart(64, "0")}`;
}
