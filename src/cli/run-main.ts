import type { Transport } from "viem";
import {
  createEvidenceCustody,
  formatCustodyError,
  loadClientSession,
  redactSensitiveInfo,
} from "../../extensions/evidence-custody/src/index.js";
import { danger, logVerbose, setVerbose } from "../globals.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { runCustodyMenu } from "./custody-menu.js";
import { createReadlinePrompter, type Prompter } from "./prompt.js";

export type RunCliOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runtime?: RuntimeEnv;
  prompter?: Prompter;
  /** Replaces the HTTP transport to the ledger node */
  transport?: Transport;
};

export function isTruthyEnvValue(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Load the session, wire the client and run the menu.
 * Resolves with the process exit code.
 */
export async function runCli(options: RunCliOptions = {}): Promise<number> {
  const runtime = options.runtime ?? defaultRuntime;
  const env = options.env ?? process.env;
  setVerbose(isTruthyEnvValue(env.CUSTODY_VERBOSE));

  const loaded = await loadClientSession({ cwd: options.cwd, env });
  if (!loaded.ok) {
    runtime.error(danger(formatCustodyError(loaded.error)));
    return 1;
  }
  const session = loaded.value;
  logVerbose(
    `${session.contractName} at ${session.contractAddress} via ${redactSensitiveInfo(session.rpcUrl)}, ` +
      `account ${session.account} (${session.config.signer.mode} signer)`,
  );

  const custody = createEvidenceCustody(session, {
    ledgerLogger: createSubsystemLogger("ledger", runtime),
    storageLogger: createSubsystemLogger("storage", runtime),
    transport: options.transport,
  });

  const prompter = options.prompter ?? createReadlinePrompter();
  try {
    return await runCustodyMenu({ ...custody, session, prompter, runtime });
  } finally {
    prompter.close();
  }
}
