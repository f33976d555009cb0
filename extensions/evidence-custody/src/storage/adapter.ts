import type { CustodyClientConfig } from "../config.js";
import { IpfsStorageAdapter } from "./ipfs-adapter.js";
import { KuboStorageAdapter } from "./kubo-adapter.js";
import type { DecentralizedStorageAdapter } from "./types.js";

export function createStorageAdapter(
  config: CustodyClientConfig,
): DecentralizedStorageAdapter | null {
  const { storage } = config;

  if (storage.provider === "kubo") {
    return new KuboStorageAdapter({
      apiUrl: storage.apiUrl,
      gateway: storage.gateway,
      timeoutMs: storage.timeoutMs,
    });
  }

  if (storage.provider === "pinata") {
    if (!storage.pinataJwt) return null;
    return new IpfsStorageAdapter({
      pinataJwt: storage.pinataJwt,
      gateway: storage.gateway,
      timeoutMs: storage.timeoutMs,
    });
  }

  return null;
}
