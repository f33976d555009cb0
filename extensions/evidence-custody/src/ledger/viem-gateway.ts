import type { Transport } from "viem";
import {
  EvmClient,
  EvmWallet,
  type Address,
  type ConfirmationOptions,
  type SignerMode,
  type TxHash,
  type TxReceipt,
} from "../../../ledger-adapter/src/index.js";
import type { ClientSession } from "../session.js";
import { EVIDENCE_CUSTODY_ABI } from "./abi.js";
import type {
  CustodyWrite,
  EvidenceCustodyGateway,
  RawEvidence,
  RawHistoryEntry,
} from "./gateway.js";

/**
 * EvidenceChainOfCustody over viem.
 * Reads are issued with the configured account as `from`, so that
 * access-controlled views see the caller.
 */
export class ViemCustodyGateway implements EvidenceCustodyGateway {
  constructor(
    private readonly client: EvmClient,
    private readonly wallet: EvmWallet,
    private readonly contractAddress: Address,
    private readonly confirmation: ConfirmationOptions = {},
  ) {}

  async getPendingNonce(account: Address): Promise<number> {
    return this.client.getPendingNonce(account);
  }

  async submit(call: CustodyWrite, options: { nonce: number }): Promise<TxHash> {
    const account = await this.wallet.resolveAccount();
    const walletClient = this.wallet.walletClient;
    const common = {
      address: this.contractAddress,
      abi: EVIDENCE_CUSTODY_ABI,
      account,
      chain: this.client.chain ?? null,
      nonce: options.nonce,
    };

    switch (call.functionName) {
      case "registerEvidence":
        return walletClient.writeContract({
          ...common,
          functionName: "registerEvidence",
          args: call.args,
        });
      case "transferEvidence":
        return walletClient.writeContract({
          ...common,
          functionName: "transferEvidence",
          args: call.args,
        });
      case "deleteEvidence":
        return walletClient.writeContract({
          ...common,
          functionName: "deleteEvidence",
          args: call.args,
        });
      case "grantAccess":
        return walletClient.writeContract({
          ...common,
          functionName: "grantAccess",
          args: call.args,
        });
      case "revokeAccess":
        return walletClient.writeContract({
          ...common,
          functionName: "revokeAccess",
          args: call.args,
        });
    }
  }

  async waitForReceipt(txHash: TxHash): Promise<TxReceipt> {
    return this.client.waitForTransaction(txHash, this.confirmation);
  }

  async viewEvidence(caseId: string, evidenceId: string): Promise<RawEvidence> {
    return this.client.publicClient.readContract({
      address: this.contractAddress,
      abi: EVIDENCE_CUSTODY_ABI,
      functionName: "viewEvidence",
      args: [caseId, evidenceId],
      account: this.wallet.address,
    });
  }

  async getHistory(caseId: string, evidenceId: string): Promise<readonly RawHistoryEntry[]> {
    return this.client.publicClient.readContract({
      address: this.contractAddress,
      abi: EVIDENCE_CUSTODY_ABI,
      functionName: "getHistory",
      args: [caseId, evidenceId],
      account: this.wallet.address,
    });
  }

  async getAllEvidenceIds(): Promise<readonly string[]> {
    return this.client.publicClient.readContract({
      address: this.contractAddress,
      abi: EVIDENCE_CUSTODY_ABI,
      functionName: "getAllEvidenceIds",
      account: this.wallet.address,
    });
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.client.getBalance(address);
  }

  async listAccounts(): Promise<readonly Address[]> {
    return this.wallet.listNodeAccounts();
  }
}

/**
 * Wire the viem gateway from a session.
 * `transport` replaces HTTP (in-process providers).
 */
export function createViemCustodyGateway(
  session: ClientSession,
  options: { transport?: Transport } = {},
): ViemCustodyGateway {
  const { chain, ledger, signer } = session.config;
  const client = new EvmClient(
    {
      id: chain.chainId,
      name: chain.name,
      symbol: chain.symbol,
      decimals: chain.decimals,
      rpcUrl: session.rpcUrl,
    },
    {
      transport: options.transport,
      pollingIntervalMs: ledger.pollingIntervalMs,
      retryCount: ledger.readRetries,
      requestTimeoutMs: ledger.rpcTimeoutMs,
    },
  );

  const signerMode: SignerMode =
    signer.mode === "private-key"
      ? { type: "private-key", account: session.account, keyFile: session.keyFile }
      : { type: "node", account: session.account };

  return new ViemCustodyGateway(client, new EvmWallet(client, signerMode), session.contractAddress, {
    confirmations: ledger.confirmations,
    timeoutMs: ledger.confirmationTimeoutMs,
  });
}
