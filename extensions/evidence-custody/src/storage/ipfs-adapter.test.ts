import { afterEach, describe, expect, it, vi } from "vitest";
import { IpfsStorageAdapter } from "./ipfs-adapter.js";

function createAdapter() {
  return new IpfsStorageAdapter({
    pinataJwt: "test-secret",
    gateway: "https://gateway.pinata.cloud/",
    timeoutMs: 1_000,
  });
}

const bytes = new TextEncoder().encode("hello");

describe("IpfsStorageAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("pins the file with the bearer token", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ IpfsHash: "bafypin", PinSize: 5 }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await createAdapter().put({ bytes, contentType: "text/plain" });

    expect(result).toEqual({
      cid: "bafypin",
      uri: "https://gateway.pinata.cloud/ipfs/bafypin",
      size: 5,
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.pinata.cloud/pinning/pinFileToIPFS");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret" });
  });

  it("rejects a response without a hash", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ PinSize: 5 }), { status: 200 })),
    );

    await expect(createAdapter().put({ bytes, contentType: "text/plain" })).rejects.toThrow(
      "Pinata response has no IpfsHash",
    );
  });

  it("reports HTTP errors with the status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("Unauthorized\n", { status: 401 })));

    await expect(createAdapter().put({ bytes, contentType: "text/plain" })).rejects.toThrow(
      "Pinata upload failed (401): Unauthorized",
    );
  });
});
