/**
 * Decentralized storage adapter interface.
 * Implementations: local IPFS daemon (Kubo RPC), Pinata.
 */

export type PutResult = {
  /** Content identifier */
  cid: string;
  /** Full retrieval URI */
  uri: string;
  /** Size in bytes as reported by the storage node */
  size: number;
};

export type PutInput = { bytes: Uint8Array; contentType: string; name?: string };

export interface DecentralizedStorageAdapter {
  readonly providerId: string;

  /** Upload and pin content. Throws on any failure. */
  put(input: PutInput): Promise<PutResult>;
}
