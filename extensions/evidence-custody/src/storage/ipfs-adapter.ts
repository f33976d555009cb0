/**
 * IPFS storage adapter via Pinata pinning API.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { fileFormData, postForm } from "./form.js";
import type { DecentralizedStorageAdapter, PutInput, PutResult } from "./types.js";

const PINATA_PIN_FILE_URL = "https://api.pinata.cloud/pinning/pinFileToIPFS";

const PinResponseSchema = Type.Object({
  IpfsHash: Type.String({ minLength: 1 }),
  PinSize: Type.Number(),
});

export class IpfsStorageAdapter implements DecentralizedStorageAdapter {
  readonly providerId = "pinata";
  private readonly pinataJwt: string;
  private readonly gateway: string;
  private readonly timeoutMs: number;

  constructor(opts: { pinataJwt: string; gateway: string; timeoutMs: number }) {
    this.pinataJwt = opts.pinataJwt;
    this.gateway = opts.gateway.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
  }

  async put(input: PutInput): Promise<PutResult> {
    const res = await postForm(
      PINATA_PIN_FILE_URL,
      {
        body: fileFormData(input, "attachment.bin"),
        headers: { Authorization: `Bearer ${this.pinataJwt}` },
        timeoutMs: this.timeoutMs,
      },
      "Pinata",
    );

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Pinata upload failed (${res.status}): ${text.trim()}`);
    }

    const data: unknown = await res.json();
    if (!Value.Check(PinResponseSchema, data)) {
      throw new Error("Pinata response has no IpfsHash");
    }
    return {
      cid: data.IpfsHash,
      uri: `${this.gateway}/ipfs/${data.IpfsHash}`,
      size: data.PinSize,
    };
  }
}
