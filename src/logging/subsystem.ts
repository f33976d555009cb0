import type { CustodyLogger } from "../../extensions/evidence-custody/src/index.js";
import { isVerbose } from "../globals.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";

export type LogSubsystem = "ledger" | "storage";

/**
 * Logger for one subsystem. Lines go to stderr so they never mix with
 * command output; debug lines only when verbose.
 */
export function createSubsystemLogger(
  subsystem: LogSubsystem,
  runtime: RuntimeEnv = defaultRuntime,
): CustodyLogger {
  const prefix = `[${subsystem}]`;
  return {
    debug: (message) => {
      if (isVerbose()) {
        runtime.error(theme.muted(`${prefix} ${message}`));
      }
    },
    info: (message) => {
      runtime.error(`${theme.muted(prefix)} ${message}`);
    },
    warn: (message) => {
      runtime.error(`${theme.muted(prefix)} ${theme.warn(message)}`);
    },
    error: (message) => {
      runtime.error(`${theme.muted(prefix)} ${theme.error(message)}`);
    },
  };
}
