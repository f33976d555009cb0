import type {
  AccountBalance,
  CustodyError,
  CustodyReceipt,
  EvidenceRecord,
  HistoryEntry,
} from "../../extensions/evidence-custody/src/index.js";

/** "2023-11-14 22:13:20 UTC"; raw seconds when outside the Date range */
export function formatTimestamp(seconds: number): string {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) {
    return `${seconds} (unix seconds)`;
  }
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function formatReceipt(verb: string, receipt: CustodyReceipt): string {
  return `Evidence ${verb} with Tx Hash: ${receipt.txHash} (block ${receipt.blockNumber})`;
}

export function formatEvidence(record: EvidenceRecord): string[] {
  return [
    "",
    `Case ID: ${record.caseId}`,
    `Evidence ID: ${record.evidenceId}`,
    `Current Holder: ${record.currentHolder}`,
    `Holder Name: ${record.holderName}`,
    `Description: ${record.description}`,
    `IPFS Hash: ${record.contentHash}`,
    `Deleted: ${record.deleted ? "Yes" : "No"}`,
  ];
}

export function formatHistory(entries: HistoryEntry[]): string[] {
  if (entries.length === 0) {
    return ["No history found."];
  }
  return entries.flatMap((entry, index) => [
    "",
    `Entry #${index + 1}:`,
    `  Holder Address: ${entry.holder}`,
    `  Holder Name: ${entry.holderName}`,
    `  Action: ${entry.action}`,
    `  Description: ${entry.description}`,
    `  Timestamp: ${formatTimestamp(entry.timestamp)}`,
  ]);
}

export function formatEvidenceIds(ids: string[]): string[] {
  if (ids.length === 0) {
    return ["No evidence registered yet."];
  }
  return ["", "All evidence IDs:", ...ids.map((id) => ` - ${id}`)];
}

export function formatBalance(balance: AccountBalance): string {
  return `Balance of ${balance.address}: ${balance.formatted} ${balance.symbol}`;
}

export function formatAccounts(accounts: string[]): string[] {
  if (accounts.length === 0) {
    return ["The node manages no accounts."];
  }
  return ["", "Node accounts:", ...accounts.map((account, index) => ` ${index}. ${account}`)];
}

/** Error line plus an optional hint line. */
export function formatFailure(context: string, error: CustodyError): string[] {
  const lines = [`${context}: ${error.name}: ${error.message}`];
  if (error.hint) {
    lines.push(error.hint);
  }
  return lines;
}
