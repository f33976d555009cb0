#!/usr/bin/env node
import { runCli } from "./cli/run-main.js";

runCli().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[custody] CLI failed:", err instanceof Error ? (err.stack ?? err.message) : err);
    process.exitCode = 1;
  },
);
