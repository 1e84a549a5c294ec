// src/config.ts

import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import type { Config, DeliveryConfig, LogLevel, SelectionMode } from "./types.js";

export const DEFAULT_TARGET_WORDS = 20000;

export function getArg(flag: string, fallback?: string, argv: string[] = process.argv): string | undefined {
  const i = argv.indexOf(flag);
  if (i >= 0 && i + 1 < argv.length) return argv[i + 1];
  return fallback;
}

export function hasFlag(flag: string, argv: string[] = process.argv): boolean {
  return argv.includes(flag);
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function parseLogLevel(argv: string[], raw: string | undefined): LogLevel {
  if (hasFlag("--quiet", argv)) return "quiet";
  if (hasFlag("--verbose", argv)) return "verbose";
  if (raw === undefined || raw === "") return "normal";
  if (raw === "quiet" || raw === "normal" || raw === "verbose") return raw;
  throw new ConfigError(`LOG_LEVEL must be quiet, normal or verbose, got "${raw}"`);
}

function parseMode(argv: string[]): SelectionMode | undefined {
  const auto = hasFlag("--auto", argv);
  const interactive = hasFlag("--interactive", argv);
  if (auto && interactive) {
    throw new ConfigError("--auto and --interactive cannot be combined");
  }
  if (auto) return "auto";
  if (interactive) return "interactive";
  return undefined;
}

/**
 * Builds the run configuration. Flags override environment values; `.env`
 * is only read by {@link loadDotenv}, so tests can pass a bare env object.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const dir = (flag: string, key: string, fallback: string): string =>
    path.resolve(cwd, getArg(flag, env[key] || fallback, argv) ?? fallback);

  return {
    inboxDir: dir("--inbox", "INBOX_DIR", "Inbox"),
    archiveDir: dir("--archive", "ARCHIVE_DIR", "Archive"),
    outputDir: dir("--out", "OUTPUT_DIR", "."),
    targetWords: positiveInt("TARGET_WORDS", getArg("--words", env.TARGET_WORDS, argv), DEFAULT_TARGET_WORDS),
    mode: parseMode(argv),
    newestFirst: hasFlag("--newest", argv),
    kindleAddress: getArg("--to", env.KINDLE_ADDRESS, argv) || undefined,
    smtpUser: getArg("--from", env.SMTP_USER, argv) || undefined,
    smtpRelay: env.SMTP_RELAY || "smtp.gmail.com",
    smtpPort: positiveInt("SMTP_PORT", env.SMTP_PORT, 587),
    smtpEncryption: env.SMTP_ENCRYPTION || "TLS",
    smtpPassword: env.SMTP_PASSWORD || undefined,
    pandocBin: env.PANDOC_BIN || "pandoc",
    calibreSmtpBin: env.CALIBRE_SMTP_BIN || "calibre-smtp",
    logLevel: parseLogLevel(argv, env.LOG_LEVEL),
  };
}

export function loadDotenv(): void {
  dotenv.config();
}

/** Everything the delivery step needs, or a ConfigError naming what is missing. */
export function requireDelivery(config: Config): DeliveryConfig {
  const missing: string[] = [];
  if (!config.kindleAddress) missing.push("KINDLE_ADDRESS (or --to)");
  if (!config.smtpUser) missing.push("SMTP_USER (or --from)");
  if (!config.smtpPassword) missing.push("SMTP_PASSWORD");

  if (!config.kindleAddress || !config.smtpUser || !config.smtpPassword) {
    throw new ConfigError(`Missing delivery settings: ${missing.join(", ")}`);
  }

  return {
    to: config.kindleAddress,
    from: config.smtpUser,
    relay: config.smtpRelay,
    port: config.smtpPort,
    encryption: config.smtpEncryption,
    password: config.smtpPassword,
  };
}
