import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("returns the defaults when no config is provided", () => {
    const cfg = resolveConfig();
    expect(cfg.paths.addressBook).toBe("addr_list.json");
    expect(cfg.paths.contractDescriptor).toBe("build/contracts/EvidenceChainOfCustody.json");
    expect(cfg.chain.chainId).toBeUndefined();
    expect(cfg.ledger.readRetries).toBe(0);
    expect(cfg.signer.mode).toBe("node");
    expect(cfg.storage.provider).toBe("kubo");
    expect(cfg.storage.apiUrl).toBe("http://127.0.0.1:5001");
  });

  it("returns a copy that callers may not mutate through", () => {
    const cfg = resolveConfig();
    cfg.ledger.confirmations = 9;
    expect(DEFAULT_CONFIG.ledger.confirmations).toBe(1);
  });

  it("merges partial sections with defaults", () => {
    const cfg = resolveConfig({
      chain: { chainId: 1337 },
      storage: { provider: "pinata", pinataJwt: "test-secret" },
    });
    expect(cfg.chain.chainId).toBe(1337);
    expect(cfg.chain.symbol).toBe("ETH");
    expect(cfg.storage.provider).toBe("pinata");
    expect(cfg.storage.pinataJwt).toBe("test-secret");
    expect(cfg.storage.timeoutMs).toBe(30_000);
    expect(cfg.ledger).toEqual(DEFAULT_CONFIG.ledger);
  });

  it("handles an empty object", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });
});
