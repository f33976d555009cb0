import { afterEach, describe, expect, it, vi } from "vitest";
import { KuboStorageAdapter } from "./kubo-adapter.js";

function createAdapter() {
  return new KuboStorageAdapter({
    apiUrl: "http://127.0.0.1:5001/",
    gateway: "https://ipfs.io/",
    timeoutMs: 1_000,
  });
}

const bytes = new TextEncoder().encode("hello");

describe("KuboStorageAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the file to /api/v0/add and reads the hash", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ Name: "photo.jpg", Hash: "bafy123", Size: "13" }), {
          status: 200,
        }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await createAdapter().put({
      bytes,
      contentType: "application/octet-stream",
      name: "photo.jpg",
    });

    expect(result).toEqual({ cid: "bafy123", uri: "https://ipfs.io/ipfs/bafy123", size: 13 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://127.0.0.1:5001/api/v0/add?pin=true");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBeInstanceOf(FormData);
  });

  it("takes the last entry of a multi-line response", async () => {
    const body =
      JSON.stringify({ Name: "dir", Hash: "bafydir", Size: "1" }) +
      "\n" +
      JSON.stringify({ Name: "photo.jpg", Hash: "bafyfile", Size: "5" }) +
      "\n";
    vi.stubGlobal("fetch", vi.fn(async () => new Response(body, { status: 200 })));

    const result = await createAdapter().put({ bytes, contentType: "text/plain" });

    expect(result.cid).toBe("bafyfile");
  });

  it("reports HTTP errors with the daemon's message", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("file argument 'path' is required\n", { status: 400 })),
    );

    await expect(createAdapter().put({ bytes, contentType: "text/plain" })).rejects.toThrow(
      "IPFS add failed (400): file argument 'path' is required",
    );
  });

  it("reports an unreachable daemon", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(createAdapter().put({ bytes, contentType: "text/plain" })).rejects.toThrow(
      "IPFS daemon unreachable at http://127.0.0.1:5001",
    );
  });
});
