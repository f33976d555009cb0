import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { custom, getAddress } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../../types/error.js";
import { EvmClient } from "./client.js";
import { EvmWallet } from "./wallet.js";

const NODE_ACCOUNT = "0x2222222222222222222222222222222222222222";

function createChainClient() {
  return new EvmClient(
    { name: "Localhost", symbol: "ETH", decimals: 18, rpcUrl: "http://127.0.0.1:8545" },
    {
      transport: custom(
        {
          async request({ method }: { method: string }) {
            if (method === "eth_accounts") {
              return ["0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa", NODE_ACCOUNT];
            }
            throw new Error(`unexpected ${method}`);
          },
        },
        { retryCount: 0 },
      ),
    },
  );
}

describe("EvmWallet", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ledger-wallet-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("sends as the configured address in node mode", async () => {
    const wallet = new EvmWallet(createChainClient(), { type: "node", account: NODE_ACCOUNT });
    await expect(wallet.resolveAccount()).resolves.toBe(NODE_ACCOUNT);
    expect(wallet.address).toBe(NODE_ACCOUNT);
  });

  it("lists node accounts checksummed", async () => {
    const wallet = new EvmWallet(createChainClient(), { type: "node", account: NODE_ACCOUNT });
    await expect(wallet.listNodeAccounts()).resolves.toEqual([
      getAddress("0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa"),
      NODE_ACCOUNT,
    ]);
  });

  it("reads the key file and derives a local account", async () => {
    const key = generatePrivateKey();
    const expected = privateKeyToAccount(key).address;
    const keyFile = path.join(dir, "privatekey.txt");
    await writeFile(keyFile, `${key.slice(2)}\n`);

    const wallet = new EvmWallet(createChainClient(), {
      type: "private-key",
      account: expected,
      keyFile,
    });
    const account = await wallet.resolveAccount();
    expect(typeof account === "string" ? account : account.address).toBe(expected);
  });

  it("refuses a key that belongs to another account", async () => {
    const keyFile = path.join(dir, "privatekey.txt");
    await writeFile(keyFile, generatePrivateKey());

    const wallet = new EvmWallet(createChainClient(), {
      type: "private-key",
      account: NODE_ACCOUNT,
      keyFile,
    });
    await expect(wallet.resolveAccount()).rejects.toMatchObject({
      code: ErrorCode.SIGNER_MISMATCH,
    });
  });

  it("reports a missing or malformed key file as signer unavailable", async () => {
    const missing = new EvmWallet(createChainClient(), {
      type: "private-key",
      account: NODE_ACCOUNT,
      keyFile: path.join(dir, "absent.txt"),
    });
    await expect(missing.resolveAccount()).rejects.toMatchObject({
      code: ErrorCode.SIGNER_NOT_AVAILABLE,
      message: "Signer not available: cannot read key file absent.txt",
    });

    const keyFile = path.join(dir, "privatekey.txt");
    await writeFile(keyFile, "test-secret");
    const malformed = new EvmWallet(createChainClient(), {
      type: "private-key",
      account: NODE_ACCOUNT,
      keyFile,
    });
    await expect(malformed.resolveAccount()).rejects.toMatchObject({
      code: ErrorCode.SIGNER_NOT_AVAILABLE,
      message: "Signer not available: privatekey.txt does not contain a 32-byte hex private key",
    });
  });
});
