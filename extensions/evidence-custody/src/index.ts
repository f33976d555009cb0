/**
 * Evidence custody
 *
 * Provides:
 * - Session:   addressing file, contract descriptor and tuning config, loaded once
 * - Ledger:    EvidenceLedgerClient over the EvidenceChainOfCustody contract
 * - Storage:   AttachmentUploader over a local IPFS daemon or Pinata
 */

import type { Transport } from "viem";
import { EvidenceLedgerClient } from "./ledger/evidence-client.js";
import { createViemCustodyGateway } from "./ledger/viem-gateway.js";
import type { CustodyLogger } from "./logger.js";
import type { ClientSession } from "./session.js";
import { createStorageAdapter } from "./storage/adapter.js";
import { AttachmentUploader } from "./storage/uploader.js";

export type { CustodyClientConfig } from "./config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./config.js";
export {
  classifyLedgerError,
  CustodyError,
  CustodyErrorCode,
  fail,
  formatCustodyError,
  ok,
  redactSensitiveInfo,
  type CustodyResult,
} from "./errors.js";
export type { CustodyLogger } from "./logger.js";
export { noopLogger } from "./logger.js";
export { loadClientSession, type ClientSession, type LoadSessionOptions } from "./session.js";
export { EvidenceLedgerClient } from "./ledger/evidence-client.js";
export type { EvidenceCustodyGateway } from "./ledger/gateway.js";
export type {
  AccountBalance,
  CustodyReceipt,
  EvidenceRecord,
  HistoryEntry,
  RegisterEvidenceInput,
  TransferEvidenceInput,
} from "./ledger/types.js";
export { AttachmentUploader, type UploadedAttachment } from "./storage/uploader.js";

export type EvidenceCustody = {
  client: EvidenceLedgerClient;
  uploader: AttachmentUploader;
};

/**
 * Wire the ledger client and uploader for a session.
 * `transport` replaces the HTTP transport to the node.
 */
export function createEvidenceCustody(
  session: ClientSession,
  options: {
    ledgerLogger: CustodyLogger;
    storageLogger: CustodyLogger;
    transport?: Transport;
  },
): EvidenceCustody {
  const gateway = createViemCustodyGateway(session, { transport: options.transport });
  return {
    client: new EvidenceLedgerClient(session, gateway, options.ledgerLogger),
    uploader: new AttachmentUploader(createStorageAdapter(session.config), options.storageLogger),
  };
}
