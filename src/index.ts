#!/usr/bin/env node
import "dotenv/config";
import readline from "readline";
import { startApp } from "./cli/app";
import { createConsoleIO } from "./cli/helpers";
import { log } from "./cli/logger";
import { errorMessage } from "./db/connection";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

/**
 * Main application entry point
 */
async function main(): Promise<number> {
  try {
    return await startApp(process.env, createConsoleIO(rl));
  } finally {
    rl.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    log(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
