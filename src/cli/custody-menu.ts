import {
  accountBalanceAction,
  deleteEvidenceAction,
  evidenceHistoryAction,
  grantAccessAction,
  listEvidenceIdsAction,
  nodeAccountsAction,
  registerEvidenceAction,
  revokeAccessAction,
  transferEvidenceAction,
  viewEvidenceAction,
  type CustodyAction,
  type CustodyActionContext,
} from "../commands/custody-actions.js";
import { danger, warn } from "../globals.js";
import { theme } from "../terminal/theme.js";
import { InputClosedError } from "./prompt.js";

export type MenuOption = {
  key: string;
  label: string;
  run: CustodyAction;
};

export const MENU_OPTIONS: readonly MenuOption[] = [
  { key: "1", label: "Register new evidence", run: registerEvidenceAction },
  { key: "2", label: "Transfer evidence", run: transferEvidenceAction },
  { key: "3", label: "Delete evidence", run: deleteEvidenceAction },
  { key: "4", label: "View evidence details", run: viewEvidenceAction },
  { key: "5", label: "Get evidence history", run: evidenceHistoryAction },
  { key: "6", label: "List all evidence IDs", run: listEvidenceIdsAction },
  { key: "7", label: "Show account balance", run: accountBalanceAction },
  { key: "8", label: "List node accounts", run: nodeAccountsAction },
  { key: "9", label: "Grant viewer access", run: grantAccessAction },
  { key: "10", label: "Revoke viewer access", run: revokeAccessAction },
];

export const MENU_TITLE = "Evidence Chain of Custody";
export const EXIT_KEY = "0";
export const INVALID_CHOICE_MESSAGE = "Invalid choice. Please select a valid option.";

export function renderMenu(): string[] {
  const rule = "=".repeat(MENU_TITLE.length);
  return [
    "",
    theme.heading(rule),
    theme.heading(MENU_TITLE),
    theme.heading(rule),
    ...MENU_OPTIONS.map((option) => `${option.key}. ${option.label}`),
    `${EXIT_KEY}. Exit`,
  ];
}

/**
 * Menu loop: one choice, one action, repeat.
 * Resolves with the process exit code once the user exits or input closes.
 */
export async function runCustodyMenu(ctx: CustodyActionContext): Promise<number> {
  const { runtime, prompter } = ctx;

  for (;;) {
    for (const line of renderMenu()) {
      runtime.log(line);
    }

    try {
      const choice = (await prompter.ask("Choose an option: ")).trim();
      if (choice === EXIT_KEY) {
        runtime.log("Exiting CLI.");
        return 0;
      }

      const option = MENU_OPTIONS.find((candidate) => candidate.key === choice);
      if (!option) {
        runtime.log(warn(INVALID_CHOICE_MESSAGE));
        continue;
      }
      await option.run(ctx);
    } catch (err) {
      if (err instanceof InputClosedError) {
        runtime.log("");
        runtime.log("Exiting CLI.");
        return 0;
      }
      const message = err instanceof Error ? err.message : String(err);
      runtime.error(danger(`Unexpected error: ${message}`));
    }
  }
}
