import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Value } from "@sinclair/typebox/value";
import { getAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./config.js";
import { CustodyErrorCode } from "./errors.js";
import { EVIDENCE_CUSTODY_ABI } from "./ledger/abi.js";
import { ContractDescriptorSchema } from "./schema.js";
import { loadClientSession, missingFunctions } from "./session.js";

const CONTRACT = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";
const DEMO_USER = "0x1111111111111111111111111111111111111111";
const ANOTHER_USER = "0x2222222222222222222222222222222222222222";

describe("loadClientSession", () => {
  let dir: string;

  async function writeJson(relative: string, value: unknown) {
    const file = path.join(dir, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify(value), "utf8");
  }

  async function writeDefaults() {
    await writeJson("addr_list.json", {
      HttpProvider: "http://127.0.0.1:8545",
      EvidenceChainOfCustody: CONTRACT,
      DemoUser: DEMO_USER,
      AnotherUser: ANOTHER_USER,
    });
    await writeJson("build/contracts/EvidenceChainOfCustody.json", {
      contractName: "EvidenceChainOfCustody",
      abi: EVIDENCE_CUSTODY_ABI,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "custody-session-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the addressing file and descriptor with default config", async () => {
    await writeDefaults();

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const session = result.value;
    expect(session.rpcUrl).toBe("http://127.0.0.1:8545");
    expect(session.contractAddress).toBe(getAddress(CONTRACT));
    expect(session.contractName).toBe("EvidenceChainOfCustody");
    expect(session.account).toBe(DEMO_USER);
    expect(session.alternateAccount).toBe(ANOTHER_USER);
    expect(session.keyFile).toBe(path.join(dir, "privatekey.txt"));
    expect(session.config).toEqual(DEFAULT_CONFIG);
    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.config)).toBe(true);
    for (const section of Object.values(session.config)) {
      expect(Object.isFrozen(section)).toBe(true);
    }
    expect(Object.isFrozen(DEFAULT_CONFIG.ledger)).toBe(false);
  });

  it("merges custody.config.json over the defaults", async () => {
    await writeDefaults();
    await writeJson("custody.config.json", {
      ledger: { confirmations: 2 },
      signer: { mode: "private-key", keyFile: "keys/dev.txt" },
    });

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.config.ledger.confirmations).toBe(2);
    expect(result.value.config.ledger.pollingIntervalMs).toBe(1_000);
    expect(result.value.config.signer.mode).toBe("private-key");
    expect(result.value.keyFile).toBe(path.join(dir, "keys", "dev.txt"));
  });

  it("reads the config path from CUSTODY_CONFIG", async () => {
    await writeDefaults();
    await writeJson("conf/alt.json", { paths: { addressBook: "conf/addresses.json" } });
    await writeJson("conf/addresses.json", {
      HttpProvider: "http://10.0.0.5:8545",
      EvidenceChainOfCustody: CONTRACT,
      DemoUser: DEMO_USER,
    });

    const result = await loadClientSession({
      cwd: dir,
      env: { CUSTODY_CONFIG: "conf/alt.json" },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.rpcUrl).toBe("http://10.0.0.5:8545");
    expect(result.value.alternateAccount).toBeUndefined();
  });

  it("fails when CUSTODY_CONFIG names a missing file", async () => {
    await writeDefaults();

    const result = await loadClientSession({
      cwd: dir,
      env: { CUSTODY_CONFIG: "missing.json" },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(CustodyErrorCode.E_CONFIG);
    expect(result.error.message).toBe("missing.json not found (CUSTODY_CONFIG)");
  });

  it("rejects unknown config keys", async () => {
    await writeDefaults();
    await writeJson("custody.config.json", { ledger: { retries: 3 } });

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(CustodyErrorCode.E_CONFIG);
    expect(result.error.message.startsWith("custody.config.json is invalid (/ledger")).toBe(true);
  });

  it("fails when the addressing file is missing", async () => {
    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe("ConfigError");
    expect(result.error.message).toBe("addr_list.json not found");
  });

  it("fails on malformed JSON", async () => {
    await writeFile(path.join(dir, "addr_list.json"), "{ not json", "utf8");

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("addr_list.json is not valid JSON");
  });

  it("rejects a malformed account address", async () => {
    await writeDefaults();
    await writeJson("addr_list.json", {
      HttpProvider: "http://127.0.0.1:8545",
      EvidenceChainOfCustody: CONTRACT,
      DemoUser: "0x1234",
    });

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('addr_list.json: DemoUser "0x1234" is not a valid address');
  });

  it("rejects a non-http provider URL", async () => {
    await writeDefaults();
    await writeJson("addr_list.json", {
      HttpProvider: "ws://127.0.0.1:8545",
      EvidenceChainOfCustody: CONTRACT,
      DemoUser: DEMO_USER,
    });

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("addr_list.json: HttpProvider must be an http(s) URL");
  });

  it("rejects a descriptor that lacks a called function", async () => {
    await writeDefaults();
    await writeJson("build/contracts/EvidenceChainOfCustody.json", {
      abi: EVIDENCE_CUSTODY_ABI.filter((item) => item.name !== "getAllEvidenceIds"),
    });

    const result = await loadClientSession({ cwd: dir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "EvidenceChainOfCustody.json does not expose getAllEvidenceIds()",
    );
  });
});

describe("missingFunctions", () => {
  it("compares parameter types, not just names", () => {
    const abi = EVIDENCE_CUSTODY_ABI.map((item) =>
      item.name === "deleteEvidence"
        ? { type: "function", name: "deleteEvidence", inputs: [{ name: "id", type: "uint256" }] }
        : item,
    );

    expect(missingFunctions(abi)).toEqual(["deleteEvidence(string,string)"]);
  });

  it("accepts the client's own ABI", () => {
    expect(missingFunctions(EVIDENCE_CUSTODY_ABI)).toEqual([]);
  });

  it("accepts the shipped contract descriptor", async () => {
    const file = fileURLToPath(new URL("../../../config/EvidenceChainOfCustody.json", import.meta.url));
    const descriptor: unknown = JSON.parse(await readFile(file, "utf8"));

    expect(Value.Check(ContractDescriptorSchema, descriptor)).toBe(true);
    if (!Value.Check(ContractDescriptorSchema, descriptor)) return;
    expect(missingFunctions(descriptor.abi)).toEqual([]);
  });
});
