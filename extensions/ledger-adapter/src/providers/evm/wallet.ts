/**
 * EVM WalletClient + signer resolution
 *
 * Two signer modes:
 * 1. node        - the node signs for an unlocked account (eth_sendTransaction)
 * 2. private-key - key read from disk on every send, signed locally
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { createWalletClient, isAddressEqual, type Account, type WalletClient } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { LedgerError } from "../../types/error.js";
import type { Address, SignerMode } from "../../types/transaction.js";
import type { EvmClient } from "./client.js";

const PRIVATE_KEY_PATTERN = /^(0x)?[0-9a-fA-F]{64}$/;

export class EvmWallet {
  public readonly walletClient: WalletClient;

  constructor(
    client: EvmClient,
    public readonly signerMode: SignerMode,
  ) {
    this.walletClient = createWalletClient({
      chain: client.chain,
      transport: client.submitTransport,
    });
  }

  /** Configured sending account */
  get address(): Address {
    return this.signerMode.account;
  }

  /**
   * Resolve the account to send from.
   * In private-key mode the key file is read on every call and must
   * derive the configured account.
   */
  async resolveAccount(): Promise<Account | Address> {
    if (this.signerMode.type === "node") {
      return this.signerMode.account;
    }

    const keyFile = this.signerMode.keyFile;
    let raw: string;
    try {
      raw = await readFile(keyFile, "utf8");
    } catch (error) {
      throw LedgerError.signerNotAvailable(`cannot read key file ${path.basename(keyFile)}`, error);
    }

    const key = raw.trim();
    if (!PRIVATE_KEY_PATTERN.test(key)) {
      throw LedgerError.signerNotAvailable(
        `${path.basename(keyFile)} does not contain a 32-byte hex private key`,
      );
    }

    const account = privateKeyToAccount(key.startsWith("0x") ? `0x${key.slice(2)}` : `0x${key}`);
    if (!isAddressEqual(account.address, this.signerMode.account)) {
      throw LedgerError.signerMismatch(this.signerMode.account, account.address);
    }
    return account;
  }

  /**
   * Accounts the connected node manages (eth_accounts).
   */
  async listNodeAccounts(): Promise<Address[]> {
    return this.walletClient.getAddresses();
  }
}
