import type { Chain } from "viem";
import type { ChainInfo } from "../../types/chain.js";
import { ErrorCode, LedgerError } from "../../types/error.js";

/**
 * Build a viem Chain from configured chain info.
 * Returns undefined when no chain id is configured, so that signing
 * falls back to whatever chain the node reports.
 */
export function toViemChain(chainInfo: ChainInfo): Chain | undefined {
  if (chainInfo.id === undefined) {
    return undefined;
  }
  if (!Number.isInteger(chainInfo.id) || chainInfo.id <= 0) {
    throw new LedgerError(`Invalid EVM chain ID: ${chainInfo.id}`, ErrorCode.INVALID_PARAMS);
  }

  return {
    id: chainInfo.id,
    name: chainInfo.name,
    nativeCurrency: {
      name: chainInfo.symbol,
      symbol: chainInfo.symbol,
      decimals: chainInfo.decimals,
    },
    rpcUrls: {
      default: { http: [chainInfo.rpcUrl] },
    },
  };
}
