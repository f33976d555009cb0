/**
 * Contract gateway interface: the boundary between the custody client and
 * the ledger. Default implementation: viem (viem-gateway.ts).
 */

import type { Address, TxHash, TxReceipt } from "../../../ledger-adapter/src/index.js";

/** viewEvidence outputs, in contract order */
export type RawEvidence = readonly [
  evidenceId: string,
  caseId: string,
  currentHolder: Address,
  holderName: string,
  description: string,
  ipfsHash: string,
  isDeleted: boolean,
];

export type RawHistoryEntry = {
  holder: Address;
  holderName: string;
  action: string;
  description: string;
  timestamp: bigint;
};

/** State-changing contract calls */
export type CustodyWrite =
  | {
      functionName: "registerEvidence";
      args: readonly [string, string, string, string, string, string];
    }
  | {
      functionName: "transferEvidence";
      args: readonly [string, string, Address, string, string, string];
    }
  | { functionName: "deleteEvidence"; args: readonly [string, string] }
  | { functionName: "grantAccess"; args: readonly [string, string, Address] }
  | { functionName: "revokeAccess"; args: readonly [string, string, Address] };

export interface EvidenceCustodyGateway {
  /** Next nonce for the account, including pending transactions */
  getPendingNonce(account: Address): Promise<number>;

  /** Sign and broadcast with the given nonce; resolves once the node accepts it */
  submit(call: CustodyWrite, options: { nonce: number }): Promise<TxHash>;

  /** Block until mined (or the configured timeout elapses) */
  waitForReceipt(txHash: TxHash): Promise<TxReceipt>;

  viewEvidence(caseId: string, evidenceId: string): Promise<RawEvidence>;

  getHistory(caseId: string, evidenceId: string): Promise<readonly RawHistoryEntry[]>;

  getAllEvidenceIds(): Promise<readonly string[]>;

  getBalance(address: Address): Promise<bigint>;

  /** Accounts the node manages */
  listAccounts(): Promise<readonly Address[]>;
}
