// src/logger.ts

import type { LogLevel } from "./types.js";

let currentLogLevel: LogLevel = "normal";

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function log(message: string, level: "info" | "warn" | "error" = "info"): void {
  if (currentLogLevel === "quiet" && level !== "error") return;

  if (level === "error") {
    console.error(message);
  } else if (level === "warn") {
    console.warn(message);
  } else {
    console.log(message);
  }
}

export function verbose(message: string): void {
  if (currentLogLevel === "verbose") {
    console.log(`[DEBUG] ${message}`);
  }
}

export function always(message: string): void {
  console.log(message);
}

export function rule(char = "=", width = 80): void {
  always(char.repeat(width));
}

/** Prints a heading between two rules; suppressed in quiet mode. */
export function banner(title: string, lines: string[] = []): void {
  if (currentLogLevel === "quiet") return;
  always("");
  rule();
  always(title);
  for (const line of lines) always(line);
  rule();
}
