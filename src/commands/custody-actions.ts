import type {
  AttachmentUploader,
  ClientSession,
  CustodyError,
  EvidenceLedgerClient,
} from "../../extensions/evidence-custody/src/index.js";
import type { Prompter } from "../cli/prompt.js";
import { danger, info, success } from "../globals.js";
import type { RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";
import {
  formatAccounts,
  formatBalance,
  formatEvidence,
  formatEvidenceIds,
  formatFailure,
  formatHistory,
  formatReceipt,
} from "./custody-format.js";

export type CustodyActionContext = {
  client: EvidenceLedgerClient;
  uploader: AttachmentUploader;
  session: ClientSession;
  prompter: Prompter;
  runtime: RuntimeEnv;
};

export type CustodyAction = (ctx: CustodyActionContext) => Promise<void>;

function reportFailure(runtime: RuntimeEnv, context: string, error: CustodyError) {
  const [headline, ...hints] = formatFailure(context, error);
  runtime.error(danger(headline));
  for (const hint of hints) {
    runtime.error(theme.muted(hint));
  }
}

function printLines(runtime: RuntimeEnv, lines: string[]) {
  for (const line of lines) {
    runtime.log(line);
  }
}

async function askRecordKey(prompter: Prompter) {
  const caseId = await prompter.ask("Enter case ID: ");
  const evidenceId = await prompter.ask("Enter evidence ID: ");
  return { caseId, evidenceId };
}

export const registerEvidenceAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);
  const holderName = await ctx.prompter.ask("Your holder name: ");
  const description = await ctx.prompter.ask("Evidence description: ");
  const filePath = await ctx.prompter.ask("Enter path to evidence file to upload: ");

  const upload = await ctx.uploader.upload(filePath);
  if (!upload.ok) {
    reportFailure(ctx.runtime, "Failed to upload file to IPFS", upload.error);
    return;
  }
  ctx.runtime.log(info(`File uploaded to IPFS with hash: ${upload.value.cid}`));

  const result = await ctx.client.register({
    caseId,
    evidenceId,
    holderName,
    description,
    attachmentHash: upload.value.cid,
  });
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error registering evidence", result.error);
    return;
  }
  ctx.runtime.log(success(formatReceipt("registered", result.value)));
};

export const transferEvidenceAction: CustodyAction = async (ctx) => {
  const alternate = ctx.session.alternateAccount;
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);
  const recipient = await ctx.prompter.ask(
    alternate
      ? `Enter recipient Ethereum address [${alternate}]: `
      : "Enter recipient Ethereum address: ",
  );
  const recipientName = await ctx.prompter.ask("Enter recipient name: ");
  const description = await ctx.prompter.ask("Transfer description: ");

  const result = await ctx.client.transfer({
    caseId,
    evidenceId,
    newHolderAddress: recipient.trim() || alternate || "",
    newHolderName: recipientName,
    description,
  });
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error transferring evidence", result.error);
    return;
  }
  ctx.runtime.log(success(formatReceipt("transferred", result.value)));
};

export const deleteEvidenceAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);

  const result = await ctx.client.delete(caseId, evidenceId);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error deleting evidence", result.error);
    return;
  }
  ctx.runtime.log(success(formatReceipt("deleted", result.value)));
};

export const viewEvidenceAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);

  const result = await ctx.client.view(caseId, evidenceId);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error viewing evidence", result.error);
    return;
  }
  printLines(ctx.runtime, formatEvidence(result.value));
};

export const evidenceHistoryAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);

  const result = await ctx.client.history(caseId, evidenceId);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error fetching history", result.error);
    return;
  }
  printLines(ctx.runtime, formatHistory(result.value));
};

export const listEvidenceIdsAction: CustodyAction = async (ctx) => {
  const result = await ctx.client.listAllEvidenceIds();
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error listing evidence", result.error);
    return;
  }
  printLines(ctx.runtime, formatEvidenceIds(result.value));
};

export const accountBalanceAction: CustodyAction = async (ctx) => {
  const address = await ctx.prompter.ask(`Account address [${ctx.session.account}]: `);

  const result = await ctx.client.getBalance(address);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error fetching balance", result.error);
    return;
  }
  ctx.runtime.log(formatBalance(result.value));
};

export const nodeAccountsAction: CustodyAction = async (ctx) => {
  const result = await ctx.client.listAccounts();
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error listing accounts", result.error);
    return;
  }
  printLines(ctx.runtime, formatAccounts(result.value));
};

export const grantAccessAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);
  const viewer = await ctx.prompter.ask("Viewer Ethereum address: ");

  const result = await ctx.client.grantAccess(caseId, evidenceId, viewer);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error granting access", result.error);
    return;
  }
  ctx.runtime.log(success(`Access granted with Tx Hash: ${result.value.txHash}`));
};

export const revokeAccessAction: CustodyAction = async (ctx) => {
  const { caseId, evidenceId } = await askRecordKey(ctx.prompter);
  const viewer = await ctx.prompter.ask("Viewer Ethereum address: ");

  const result = await ctx.client.revokeAccess(caseId, evidenceId, viewer);
  if (!result.ok) {
    reportFailure(ctx.runtime, "Error revoking access", result.error);
    return;
  }
  ctx.runtime.log(success(`Access revoked with Tx Hash: ${result.value.txHash}`));
};
