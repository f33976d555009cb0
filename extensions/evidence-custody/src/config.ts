/**
 * Client configuration types and defaults.
 *
 * Ledger default: a local development node (addresses come from the addressing file).
 * Storage default: the local IPFS daemon RPC on port 5001.
 */

import type { ConfigFile } from "./schema.js";

// ---------------------------------------------------------------------------
// File locations
// ---------------------------------------------------------------------------

export type PathsConfig = {
  /** Addressing file: node URL, contract address, accounts */
  addressBook: string;
  /** Contract interface descriptor (build artifact with an `abi` array) */
  contractDescriptor: string;
};

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

export type ChainConfig = {
  /** Assert this chain id when signing; omit to accept the node's */
  chainId?: number;
  name: string;
  symbol: string;
  decimals: number;
};

// ---------------------------------------------------------------------------
// Ledger calls
// ---------------------------------------------------------------------------

export type LedgerConfig = {
  /** Blocks required on top of the inclusion block */
  confirmations: number;
  /** Give up waiting for a receipt after this long (status becomes unknown) */
  confirmationTimeoutMs: number;
  /** Receipt polling interval */
  pollingIntervalMs: number;
  /** Per-request RPC timeout */
  rpcTimeoutMs: number;
  /** Transport retries for read calls; transaction submission is never retried */
  readRetries: number;
};

// ---------------------------------------------------------------------------
// Signer
// ---------------------------------------------------------------------------

export type SignerModeName = "node" | "private-key";

export type SignerConfig = {
  mode: SignerModeName;
  /** Read on demand, only in private-key mode */
  keyFile: string;
};

// ---------------------------------------------------------------------------
// Attachment storage
// ---------------------------------------------------------------------------

export type StorageProvider = "kubo" | "pinata";

export type StorageConfig = {
  provider: StorageProvider;
  /** Kubo RPC API base URL */
  apiUrl: string;
  /** Public gateway used to build retrieval URIs */
  gateway: string;
  pinataJwt?: string;
  timeoutMs: number;
};

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export type CustodyClientConfig = {
  paths: PathsConfig;
  chain: ChainConfig;
  ledger: LedgerConfig;
  signer: SignerConfig;
  storage: StorageConfig;
};

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: CustodyClientConfig = {
  paths: {
    addressBook: "addr_list.json",
    contractDescriptor: "build/contracts/EvidenceChainOfCustody.json",
  },
  chain: {
    name: "Localhost",
    symbol: "ETH",
    decimals: 18,
  },
  ledger: {
    confirmations: 1,
    confirmationTimeoutMs: 120_000,
    pollingIntervalMs: 1_000,
    rpcTimeoutMs: 10_000,
    readRetries: 0,
  },
  signer: {
    mode: "node",
    keyFile: "privatekey.txt",
  },
  storage: {
    provider: "kubo",
    apiUrl: "http://127.0.0.1:5001",
    gateway: "https://ipfs.io",
    timeoutMs: 30_000,
  },
};

/** Every section frozen, so a session's config cannot change after load. */
export type FrozenCustodyConfig = {
  readonly [K in keyof CustodyClientConfig]: Readonly<CustodyClientConfig[K]>;
};

export function freezeConfig(config: CustodyClientConfig): FrozenCustodyConfig {
  return Object.freeze({
    paths: Object.freeze({ ...config.paths }),
    chain: Object.freeze({ ...config.chain }),
    ledger: Object.freeze({ ...config.ledger }),
    signer: Object.freeze({ ...config.signer }),
    storage: Object.freeze({ ...config.storage }),
  });
}

/** Merge a validated config file over the defaults, section by section. */
export function resolveConfig(raw?: ConfigFile): CustodyClientConfig {
  if (!raw) return structuredClone(DEFAULT_CONFIG);
  return {
    paths: { ...DEFAULT_CONFIG.paths, ...raw.paths },
    chain: { ...DEFAULT_CONFIG.chain, ...raw.chain },
    ledger: { ...DEFAULT_CONFIG.ledger, ...raw.ledger },
    signer: { ...DEFAULT_CONFIG.signer, ...raw.signer },
    storage: { ...DEFAULT_CONFIG.storage, ...raw.storage },
  };
}
