/**
 * Ledger adapter
 *
 * EVM read client and signing wallet used by the evidence custody client.
 */

export type { ChainInfo } from "./types/chain.js";
export type {
  Address,
  TxHash,
  TxReceipt,
  ConfirmationOptions,
  SignerMode,
} from "./types/transaction.js";
export { ErrorCode, LedgerError } from "./types/error.js";

export { EvmClient, type EvmClientOptions } from "./providers/evm/client.js";
export { EvmWallet } from "./providers/evm/wallet.js";
export { toViemChain } from "./providers/evm/chain.js";
