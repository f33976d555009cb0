import { describe, expect, it } from "vitest";
import { CustodyError } from "../../extensions/evidence-custody/src/index.js";
import {
  formatEvidence,
  formatEvidenceIds,
  formatFailure,
  formatHistory,
  formatReceipt,
  formatTimestamp,
} from "./custody-format.js";

describe("custody formatting", () => {
  it("formats block timestamps in UTC", () => {
    expect(formatTimestamp(1_700_000_000)).toBe("2023-11-14 22:13:20 UTC");
    expect(formatTimestamp(0)).toBe("1970-01-01 00:00:00 UTC");
  });

  it("prints raw seconds for timestamps a Date cannot hold", () => {
    expect(formatTimestamp(1e16)).toBe("10000000000000000 (unix seconds)");

    const lines = formatHistory([
      {
        holder: "0x1111111111111111111111111111111111111111",
        holderName: "Alice",
        action: "collected",
        description: "found at scene",
        timestamp: 1e16,
      },
      {
        holder: "0x2222222222222222222222222222222222222222",
        holderName: "Bob",
        action: "transferred",
        description: "",
        timestamp: 1_700_000_012,
      },
    ]);
    expect(lines[6]).toBe("  Timestamp: 10000000000000000 (unix seconds)");
    expect(lines[13]).toBe("  Timestamp: 2023-11-14 22:13:32 UTC");
  });

  it("formats a receipt", () => {
    expect(
      formatReceipt("registered", { txHash: "0xabc", blockNumber: 7, status: "success" }),
    ).toBe("Evidence registered with Tx Hash: 0xabc (block 7)");
  });

  it("formats an evidence record", () => {
    expect(
      formatEvidence({
        caseId: "CASE1",
        evidenceId: "EVID1",
        currentHolder: "0x1111111111111111111111111111111111111111",
        holderName: "Alice",
        description: "found at scene",
        contentHash: "bafy123",
        deleted: true,
      }),
    ).toEqual([
      "",
      "Case ID: CASE1",
      "Evidence ID: EVID1",
      "Current Holder: 0x1111111111111111111111111111111111111111",
      "Holder Name: Alice",
      "Description: found at scene",
      "IPFS Hash: bafy123",
      "Deleted: Yes",
    ]);
  });

  it("numbers history entries from one", () => {
    const lines = formatHistory([
      {
        holder: "0x1111111111111111111111111111111111111111",
        holderName: "Alice",
        action: "collected",
        description: "found at scene",
        timestamp: 1_700_000_000,
      },
    ]);
    expect(lines).toEqual([
      "",
      "Entry #1:",
      "  Holder Address: 0x1111111111111111111111111111111111111111",
      "  Holder Name: Alice",
      "  Action: collected",
      "  Description: found at scene",
      "  Timestamp: 2023-11-14 22:13:20 UTC",
    ]);
    expect(formatHistory([])).toEqual(["No history found."]);
  });

  it("lists evidence ids", () => {
    expect(formatEvidenceIds(["EVID1", "EVID2"])).toEqual([
      "",
      "All evidence IDs:",
      " - EVID1",
      " - EVID2",
    ]);
    expect(formatEvidenceIds([])).toEqual(["No evidence registered yet."]);
  });

  it("adds the hint under a failure", () => {
    expect(formatFailure("Upload", CustodyError.upload("File not found: a.jpg"))).toEqual([
      "Upload: UploadError: File not found: a.jpg",
      "Evidence was not registered.",
    ]);
  });
});
