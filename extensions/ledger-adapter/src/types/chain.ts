/**
 * Chain metadata
 */
export interface ChainInfo {
  /** EVM chain id; when absent the node's own chain id is used for signing */
  id?: number;
  name: string;
  symbol: string;
  decimals: number;
  rpcUrl: string;
}

