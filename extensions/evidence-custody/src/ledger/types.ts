import type { Address, TxHash } from "../../../ledger-adapter/src/index.js";

/**
 * Evidence record as held by the custody contract.
 */
export type EvidenceRecord = {
  caseId: string;
  evidenceId: string;
  currentHolder: Address;
  holderName: string;
  description: string;
  /** Content hash (CID) of the attachment */
  contentHash: string;
  /** Soft-delete flag; deleted records stay readable */
  deleted: boolean;
};

/**
 * One custody event. The contract appends one per register / transfer.
 */
export type HistoryEntry = {
  holder: Address;
  holderName: string;
  action: string;
  description: string;
  /** Unix seconds, as recorded by the block */
  timestamp: number;
};

export type CustodyReceipt = {
  txHash: TxHash;
  blockNumber: number;
  status: "success" | "reverted";
};

export type AccountBalance = {
  address: Address;
  /** Smallest unit */
  wei: bigint;
  /** `wei` divided by the chain's decimal factor */
  formatted: string;
  symbol: string;
};

export type RegisterEvidenceInput = {
  caseId: string;
  evidenceId: string;
  holderName: string;
  description: string;
  attachmentHash: string;
  /** Defaults to "collected" */
  action?: string;
};

export type TransferEvidenceInput = {
  caseId: string;
  evidenceId: string;
  newHolderAddress: string;
  newHolderName: string;
  /** Defaults to "transferred" */
  action?: string;
  description?: string;
};

export const DEFAULT_REGISTER_ACTION = "collected";
export const DEFAULT_TRANSFER_ACTION = "transferred";
