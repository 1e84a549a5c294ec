// src/prompts.ts

import { createInterface, type Interface } from "readline/promises";
import { PromptClosedError } from "./errors.js";

export interface PromptProvider {
  ask(question: string): Promise<string>;
  close(): void;
}

export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === "y" || a === "yes";
}

export class TerminalPrompts implements PromptProvider {
  private readonly rl: Interface;
  private closed = false;
  private rejectPending?: (e: Error) => void;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
    this.rl.on("SIGINT", () => this.rl.close());
    this.rl.on("close", () => {
      this.closed = true;
      this.rejectPending?.(new PromptClosedError());
    });
  }

  ask(question: string): Promise<string> {
    if (this.closed) return Promise.reject(new PromptClosedError());

    return new Promise<string>((resolve, reject) => {
      this.rejectPending = reject;
      this.rl.question(question).then(resolve, reject);
    }).finally(() => {
      this.rejectPending = undefined;
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

/** Replays canned answers in order; runs out like a closed terminal. */
export class ScriptedPrompts implements PromptProvider {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (next === undefined) throw new PromptClosedError();
    return next;
  }

  remaining(): number {
    return this.answers.length;
  }

  close(): void {
    this.answers.length = 0;
  }
}
