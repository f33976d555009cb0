import { afterEach, describe, expect, it } from "vitest";
import { captureRuntime } from "../cli/custody-menu.test-mocks.js";
import { setVerbose } from "../globals.js";
import { createSubsystemLogger } from "./subsystem.js";

describe("createSubsystemLogger", () => {
  afterEach(() => {
    setVerbose(false);
  });

  it("prefixes lines with the subsystem and writes them to stderr", () => {
    const { runtime, stdout, stderr } = captureRuntime();
    const logger = createSubsystemLogger("ledger", runtime);

    logger.info("register CASE1/EVID1: sent 0xabc");
    logger.warn("register CASE1/EVID1 failed");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "[ledger] register CASE1/EVID1: sent 0xabc",
      "[ledger] register CASE1/EVID1 failed",
    ]);
  });

  it("emits debug lines only when verbose", () => {
    const { runtime, stderr } = captureRuntime();
    const logger = createSubsystemLogger("storage", runtime);

    logger.debug?.("hidden");
    setVerbose(true);
    logger.debug?.("uploading photo.jpg");

    expect(stderr).toEqual(["[storage] uploading photo.jpg"]);
  });
});
