#!/usr/bin/env node
import "dotenv/config";
import { logError } from "./logger";
import { runCli } from "./run";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  logError(error, { phase: "bom-rollup" });
  process.exitCode = 1;
}
