/**
 * EVM PublicClient wrapper
 *
 * Read-only ledger interaction:
 * - native balance
 * - pending nonce
 * - receipt confirmation
 */

import {
  createPublicClient,
  http,
  type Chain,
  type Hash,
  type PublicClient,
  type Transport,
} from "viem";
import type { ChainInfo } from "../../types/chain.js";
import { LedgerError } from "../../types/error.js";
import type { Address, ConfirmationOptions, TxReceipt } from "../../types/transaction.js";
import { toViemChain } from "./chain.js";

export interface EvmClientOptions {
  /** Replace the HTTP transport (in-process providers, tests) */
  transport?: Transport;
  /** Receipt polling interval (default: 4s) */
  pollingIntervalMs?: number;
  /** Transport-level retries for reads; `submitTransport` never retries */
  retryCount?: number;
  /** Per-request timeout */
  requestTimeoutMs?: number;
}

export class EvmClient {
  public readonly publicClient: PublicClient;
  public readonly transport: Transport;
  public readonly submitTransport: Transport;
  public readonly chainInfo: ChainInfo;
  public readonly chain: Chain | undefined;

  constructor(chainInfo: ChainInfo, options: EvmClientOptions = {}) {
    this.chainInfo = chainInfo;
    this.chain = toViemChain(chainInfo);
    this.transport =
      options.transport ??
      http(chainInfo.rpcUrl, {
        retryCount: options.retryCount,
        timeout: options.requestTimeoutMs,
      });
    this.submitTransport =
      options.transport ??
      http(chainInfo.rpcUrl, { retryCount: 0, timeout: options.requestTimeoutMs });

    this.publicClient = createPublicClient({
      chain: this.chain,
      transport: this.transport,
      pollingInterval: options.pollingIntervalMs ?? 4_000,
    });
  }

  // ==================== Balances ====================

  async getBalance(address: Address): Promise<bigint> {
    return this.publicClient.getBalance({ address });
  }

  // ==================== Nonce ====================

  /**
   * Next nonce for the account, counting transactions still in the pool.
   */
  async getPendingNonce(address: Address): Promise<number> {
    return this.publicClient.getTransactionCount({ address, blockTag: "pending" });
  }

  // ==================== Receipts ====================

  /**
   * Wait for a submitted transaction to be mined.
   * Any failure here leaves the transaction in an unknown state, reported
   * as TRANSACTION_PENDING with the hash attached.
   */
  async waitForTransaction(txHash: Hash, options: ConfirmationOptions = {}): Promise<TxReceipt> {
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({
        hash: txHash,
        confirmations: options.confirmations ?? 1,
        timeout: options.timeoutMs ?? 120_000,
      });

      return {
        txHash: receipt.transactionHash,
        blockNumber: Number(receipt.blockNumber),
        blockHash: receipt.blockHash,
        status: receipt.status,
        from: receipt.from,
        to: receipt.to ?? undefined,
        gasUsed: receipt.gasUsed,
      };
    } catch (error) {
      throw LedgerError.transactionPending(txHash, error);
    }
  }
}
