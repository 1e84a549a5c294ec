#!/usr/bin/env node
// src/archive.ts
// Walks articles already sent to the Kindle, records feedback and moves
// finished ones to the Archive folder.

import { loadConfig, loadDotenv } from "./config.js";
import { runArchive } from "./commands.js";
import { errorMessage } from "./errors.js";
import { log, setLogLevel } from "./logger.js";

async function main(): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return runArchive(config);
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    log(`❌ ${errorMessage(error)}`, "error");
    process.exit(1);
  });
