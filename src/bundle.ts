#!/usr/bin/env node
// src/bundle.ts
/**
 * Bundle unsent Inbox articles into one epub and mail it to a Kindle.
 *
 * Usage
 *   kindle-bundle [--auto | --interactive] [--newest] [--words 20000]
 *                 [--inbox ./Inbox] [--out .] [--to you@kindle.com] [--from you@example.com]
 *
 * SMTP_PASSWORD must be set (in the environment or .env). Articles that went
 * out get `sent-to-kindle: yes` and are picked up by `kindle-archive` later.
 */

import { loadConfig, loadDotenv } from "./config.js";
import { runBundle } from "./commands.js";
import { errorMessage } from "./errors.js";
import { log, setLogLevel } from "./logger.js";

async function main(): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return runBundle(config);
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    log(`❌ ${errorMessage(error)}`, "error");
    process.exit(1);
  });
