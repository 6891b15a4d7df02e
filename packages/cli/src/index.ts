#!/usr/bin/env node
import { createDefaultContext, runCli } from "./program.js";

runCli(process.argv.slice(2), createDefaultContext()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[cli] Fatal error:", error);
    process.exitCode = 1;
  }
);
