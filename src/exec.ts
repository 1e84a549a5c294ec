// src/exec.ts

import { spawn } from "child_process";
import { verbose } from "./logger.js";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * Runs an external tool to completion. A tool that cannot be started
 * resolves with code 127 and the spawn error as stderr.
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    verbose(`exec: ${command} ${args.length} arg(s)`);
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => (stdout += chunk.toString()));
    child.stderr.on("data", (chunk: Buffer) => (stderr += chunk.toString()));
    child.on("error", (err) => resolve({ code: 127, stdout, stderr: err.message }));
    child.on("close", (code) => resolve({ code: code ?? 1, stdout, stderr }));
  });
