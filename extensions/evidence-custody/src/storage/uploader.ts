import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { CustodyError, fail, ok, redactSensitiveInfo, type CustodyResult } from "../errors.js";
import type { CustodyLogger } from "../logger.js";
import type { DecentralizedStorageAdapter, PutResult } from "./types.js";

export type UploadedAttachment = PutResult;

/**
 * Uploads evidence attachments to content-addressed storage.
 * `upload` resolves to a result and never throws; on failure nothing was stored
 * and the evidence must not be registered.
 */
export class AttachmentUploader {
  constructor(
    private readonly adapter: DecentralizedStorageAdapter | null,
    private readonly logger: CustodyLogger,
  ) {}

  async upload(filePath: string): Promise<CustodyResult<UploadedAttachment>> {
    const target = filePath.trim();
    if (!target) {
      return fail(CustodyError.upload("No file path given"));
    }

    try {
      const info = await stat(target);
      if (!info.isFile()) {
        return fail(CustodyError.upload(`Not a regular file: ${target}`));
      }
    } catch (err) {
      return fail(CustodyError.upload(`File not found: ${target}`, err));
    }

    if (!this.adapter) {
      return fail(CustodyError.upload("No storage provider configured"));
    }

    const name = path.basename(target);
    try {
      const bytes = await readFile(target);
      this.logger.debug?.(
        `uploading ${name} (${bytes.byteLength} bytes) via ${this.adapter.providerId}`,
      );
      const result = await this.adapter.put({
        bytes,
        contentType: "application/octet-stream",
        name,
      });
      this.logger.info(`uploaded ${name} → ${result.cid}`);
      return ok(result);
    } catch (err) {
      const message = redactSensitiveInfo(err instanceof Error ? err.message : String(err));
      this.logger.warn(`upload of ${name} failed: ${message}`);
      return fail(CustodyError.upload(`Upload failed: ${message}`, err));
    }
  }
}
