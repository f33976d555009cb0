/**
 * IPFS storage adapter over a local daemon's RPC API (Kubo).
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { fileFormData, postForm } from "./form.js";
import type { DecentralizedStorageAdapter, PutInput, PutResult } from "./types.js";

const AddResponseSchema = Type.Object({
  Name: Type.Optional(Type.String()),
  Hash: Type.String({ minLength: 1 }),
  Size: Type.Union([Type.String(), Type.Number()]),
});

export class KuboStorageAdapter implements DecentralizedStorageAdapter {
  readonly providerId = "kubo";
  private readonly apiUrl: string;
  private readonly gateway: string;
  private readonly timeoutMs: number;

  constructor(opts: { apiUrl: string; gateway: string; timeoutMs: number }) {
    this.apiUrl = opts.apiUrl.replace(/\/+$/, "");
    this.gateway = opts.gateway.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
  }

  async put(input: PutInput): Promise<PutResult> {
    const res = await postForm(
      `${this.apiUrl}/api/v0/add?pin=true`,
      { body: fileFormData(input, "attachment.bin"), timeoutMs: this.timeoutMs },
      "IPFS daemon",
    );

    const text = await res.text();
    if (!res.ok) {
      throw new Error(`IPFS add failed (${res.status}): ${text.trim()}`);
    }

    // One JSON object per added entry; the file itself is the last line
    const lines = text.split("\n").filter((line) => line.trim() !== "");
    const last = lines.at(-1);
    let data: unknown;
    try {
      data = last === undefined ? undefined : JSON.parse(last);
    } catch (err) {
      throw new Error("IPFS add returned malformed JSON", { cause: err });
    }
    if (!Value.Check(AddResponseSchema, data)) {
      throw new Error("IPFS add response has no Hash");
    }

    return {
      cid: data.Hash,
      uri: `${this.gateway}/ipfs/${data.Hash}`,
      size: Number(data.Size),
    };
  }
}
