import { stripVTControlCharacters } from "node:util";
import { getAddress } from "viem";
import {
  AttachmentUploader,
  EvidenceLedgerClient,
  noopLogger,
  resolveConfig,
  type ClientSession,
} from "../../extensions/evidence-custody/src/index.js";
import { InMemoryCustodyGateway } from "../../extensions/evidence-custody/src/ledger/gateway.test-mocks.js";
import type { DecentralizedStorageAdapter } from "../../extensions/evidence-custody/src/storage/types.js";
import type { Address } from "../../extensions/ledger-adapter/src/index.js";
import type { CustodyActionContext } from "../commands/custody-actions.js";
import type { RuntimeEnv } from "../runtime.js";
import { InputClosedError, type Prompter } from "./prompt.js";

export const CALLER: Address = "0x1111111111111111111111111111111111111111";
export const BOB = getAddress("0x000000000000000000000000000000000000beef");

export function scriptedPrompter(answers: string[]): Prompter & { questions: string[] } {
  const queue = [...answers];
  const questions: string[] = [];
  return {
    questions,
    async ask(question) {
      questions.push(question);
      const next = queue.shift();
      if (next === undefined) {
        throw new InputClosedError();
      }
      return next;
    },
    close() {},
  };
}

export function captureRuntime() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exits: number[] = [];
  const render = (args: unknown[]) => stripVTControlCharacters(args.map(String).join(" "));
  const runtime: RuntimeEnv = {
    log: (...args) => stdout.push(render(args)),
    error: (...args) => stderr.push(render(args)),
    exit: (code) => exits.push(code),
  };
  return { runtime, stdout, stderr, exits };
}

export const stubAdapter: DecentralizedStorageAdapter = {
  providerId: "stub",
  async put() {
    return { cid: "bafy123", uri: "https://ipfs.io/ipfs/bafy123", size: 8 };
  },
};

export function createMenuHarness(
  answers: string[],
  opts: { alternateAccount?: Address; adapter?: DecentralizedStorageAdapter | null } = {},
) {
  const session: ClientSession = Object.freeze({
    rpcUrl: "http://127.0.0.1:8545",
    contractAddress: "0x3333333333333333333333333333333333333333",
    contractName: "EvidenceChainOfCustody",
    account: CALLER,
    alternateAccount: opts.alternateAccount,
    keyFile: "/tmp/privatekey.txt",
    config: resolveConfig(),
  });
  const gateway = new InMemoryCustodyGateway(CALLER);
  const prompter = scriptedPrompter(answers);
  const captured = captureRuntime();
  const ctx: CustodyActionContext = {
    client: new EvidenceLedgerClient(session, gateway, noopLogger),
    uploader: new AttachmentUploader(
      opts.adapter === undefined ? stubAdapter : opts.adapter,
      noopLogger,
    ),
    session,
    prompter,
    runtime: captured.runtime,
  };
  return { ctx, gateway, prompter, ...captured };
}
