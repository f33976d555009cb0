/**
 * Client session: everything the client needs to reach the contract,
 * loaded once at startup from the tuning config, the addressing file and
 * the contract descriptor.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { getAddress, isAddress } from "viem";
import type { Address } from "../../ledger-adapter/src/index.js";
import {
  freezeConfig,
  resolveConfig,
  type CustodyClientConfig,
  type FrozenCustodyConfig,
} from "./config.js";
import { CustodyError, fail, ok, type CustodyResult } from "./errors.js";
import {
  functionSignature,
  REQUIRED_FUNCTION_SIGNATURES,
  type AbiParameterShape,
} from "./ledger/abi.js";
import {
  AddressBookSchema,
  ConfigFileSchema,
  ContractDescriptorSchema,
  firstSchemaIssue,
} from "./schema.js";

export const DEFAULT_CONFIG_FILE = "custody.config.json";
export const DEFAULT_CONTRACT_NAME = "EvidenceChainOfCustody";

export type ClientSession = Readonly<{
  rpcUrl: string;
  contractAddress: Address;
  contractName: string;
  /** Caller account (DemoUser) */
  account: Address;
  /** AnotherUser, when the addressing file names one */
  alternateAccount?: Address;
  /** Absolute path; read on demand in private-key mode */
  keyFile: string;
  config: FrozenCustodyConfig;
}>;

export type LoadSessionOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

type JsonFile = { found: false } | { found: true; value: unknown };

async function readJsonFile(file: string, label: string): Promise<CustodyResult<JsonFile>> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      return ok({ found: false });
    }
    return fail(CustodyError.config(`Cannot read ${label}`, err));
  }
  try {
    return ok({ found: true, value: JSON.parse(text) });
  } catch (err) {
    return fail(CustodyError.config(`${label} is not valid JSON`, err));
  }
}

async function readRequiredJson(file: string, label: string): Promise<CustodyResult<unknown>> {
  const read = await readJsonFile(file, label);
  if (!read.ok) return read;
  if (!read.value.found) {
    return fail(CustodyError.config(`${label} not found`));
  }
  return ok(read.value.value);
}

function checkSchema<T extends TSchema>(
  schema: T,
  value: unknown,
  label: string,
): CustodyResult<Static<T>> {
  if (Value.Check(schema, value)) {
    return ok(value);
  }
  const issue = firstSchemaIssue(schema, value) ?? "unexpected shape";
  return fail(CustodyError.config(`${label} is invalid (${issue})`));
}

function toChecksumAddress(
  value: string,
  field: string,
  label: string,
): CustodyResult<Address> {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) {
    return fail(CustodyError.config(`${label}: ${field} "${value}" is not a valid address`));
  }
  return ok(getAddress(trimmed));
}

async function loadConfigFile(
  cwd: string,
  env: NodeJS.ProcessEnv,
): Promise<CustodyResult<CustodyClientConfig>> {
  const explicit = env.CUSTODY_CONFIG?.trim();
  const file = path.resolve(cwd, explicit || DEFAULT_CONFIG_FILE);
  const label = path.basename(file);

  const read = await readJsonFile(file, label);
  if (!read.ok) return read;
  if (!read.value.found) {
    if (explicit) {
      return fail(CustodyError.config(`${label} not found (CUSTODY_CONFIG)`));
    }
    return ok(resolveConfig());
  }

  const checked = checkSchema(ConfigFileSchema, read.value.value, label);
  if (!checked.ok) return checked;
  return ok(resolveConfig(checked.value));
}

type AbiEntryShape = {
  readonly type: string;
  readonly name?: string;
  readonly inputs?: readonly AbiParameterShape[];
};

/**
 * Signatures the client calls that the descriptor's ABI does not expose
 * with the same parameter types.
 */
export function missingFunctions(abi: readonly AbiEntryShape[]): string[] {
  const exposed = new Set<string>();
  for (const item of abi) {
    if (item.type === "function" && item.name) {
      exposed.add(functionSignature({ name: item.name, inputs: item.inputs }));
    }
  }
  return REQUIRED_FUNCTION_SIGNATURES.filter((signature) => !exposed.has(signature));
}

export async function loadClientSession(
  options: LoadSessionOptions = {},
): Promise<CustodyResult<ClientSession>> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configResult = await loadConfigFile(cwd, env);
  if (!configResult.ok) return configResult;
  const config = configResult.value;

  // Addressing file
  const bookFile = path.resolve(cwd, config.paths.addressBook);
  const bookLabel = path.basename(bookFile);
  const bookRaw = await readRequiredJson(bookFile, bookLabel);
  if (!bookRaw.ok) return bookRaw;
  const book = checkSchema(AddressBookSchema, bookRaw.value, bookLabel);
  if (!book.ok) return book;

  const rpcUrl = book.value.HttpProvider.trim();
  if (!/^https?:\/\//i.test(rpcUrl)) {
    return fail(CustodyError.config(`${bookLabel}: HttpProvider must be an http(s) URL`));
  }
  const contractAddress = toChecksumAddress(
    book.value.EvidenceChainOfCustody,
    "EvidenceChainOfCustody",
    bookLabel,
  );
  if (!contractAddress.ok) return contractAddress;
  const account = toChecksumAddress(book.value.DemoUser, "DemoUser", bookLabel);
  if (!account.ok) return account;

  let alternateAccount: Address | undefined;
  const another = book.value.AnotherUser?.trim();
  if (another) {
    const checked = toChecksumAddress(another, "AnotherUser", bookLabel);
    if (!checked.ok) return checked;
    alternateAccount = checked.value;
  }

  // Contract descriptor
  const descriptorFile = path.resolve(cwd, config.paths.contractDescriptor);
  const descriptorLabel = path.basename(descriptorFile);
  const descriptorRaw = await readRequiredJson(descriptorFile, descriptorLabel);
  if (!descriptorRaw.ok) return descriptorRaw;
  const descriptor = checkSchema(ContractDescriptorSchema, descriptorRaw.value, descriptorLabel);
  if (!descriptor.ok) return descriptor;

  const missing = missingFunctions(descriptor.value.abi);
  if (missing.length > 0) {
    return fail(
      CustodyError.config(`${descriptorLabel} does not expose ${missing.join(", ")}`),
    );
  }

  const session: ClientSession = Object.freeze({
    rpcUrl,
    contractAddress: contractAddress.value,
    contractName: descriptor.value.contractName || DEFAULT_CONTRACT_NAME,
    account: account.value,
    alternateAccount,
    keyFile: path.resolve(cwd, config.signer.keyFile),
    config: freezeConfig(config),
  });
  return ok(session);
}

function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
