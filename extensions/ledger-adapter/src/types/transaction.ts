/**
 * Transaction types
 */

/** 0x-prefixed EVM address */
export type Address = `0x${string}`;

/** 0x-prefixed transaction hash */
export type TxHash = `0x${string}`;

/**
 * Transaction receipt
 */
export interface TxReceipt {
  txHash: TxHash;
  blockNumber: number;
  blockHash?: string;
  status: "success" | "reverted";
  from: Address;
  to?: Address;
  gasUsed?: bigint;
}

/**
 * Confirmation wait settings
 */
export interface ConfirmationOptions {
  /** Blocks to wait on top of the inclusion block (default: 1) */
  confirmations?: number;
  /** Give up waiting after this many milliseconds (default: 120s) */
  timeoutMs?: number;
}

/**
 * Signer settings
 */
export type SignerMode =
  /** The node signs with an account it has unlocked (`eth_sendTransaction`) */
  | { type: "node"; account: Address }
  /** Sign locally with a key read from disk on every send */
  | { type: "private-key"; account: Address; keyFile: string };
