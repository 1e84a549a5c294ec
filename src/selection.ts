// src/selection.ts

import { EmptySelectionError, SelectionCancelledError } from "./errors.js";
import { dateOf, titleOf, wordCount } from "./frontmatter.js";
import { isSent } from "./lifecycle.js";
import { always, banner, log, rule } from "./logger.js";
import type { PromptProvider } from "./prompts.js";
import { createdTime, type ArticleStore } from "./store.js";
import type { Candidate } from "./types.js";

/** Interactive guidance band around the budget. */
export const TOLERANCE = 0.1;

const fmt = (n: number): string => n.toLocaleString("en-US");

/**
 * Unsent records in the pending collection, oldest first unless
 * `newestFirst`. Undated records come last either way.
 */
export async function listCandidates(store: ArticleStore, newestFirst = false): Promise<Candidate[]> {
  const records = await store.list("pending", (r) => !isSent(r.metadata));
  const candidates = records.map((record) => ({ record, wordCount: wordCount(record.body) }));
  if (!newestFirst) return candidates;

  const dated = candidates.filter((c) => createdTime(c.record) !== undefined);
  const undated = candidates.filter((c) => createdTime(c.record) === undefined);
  return [...dated.reverse(), ...undated];
}

export function totalWords(candidates: Candidate[]): number {
  return candidates.reduce((sum, c) => sum + c.wordCount, 0);
}

/**
 * Walks the candidates in order and keeps adding while the running total
 * stays within `budget`. The walk stops at the first record that would go
 * over, except that the first record is always taken so the bundle is never
 * empty.
 */
export function selectAutomatic(candidates: Candidate[], budget: number): Candidate[] {
  if (candidates.length === 0) throw new EmptySelectionError();

  const selected: Candidate[] = [];
  let total = 0;

  for (const c of candidates) {
    if (total + c.wordCount > budget && selected.length > 0) break;

    selected.push(c);
    total += c.wordCount;
    log(`  Added: ${titleOf(c.record).slice(0, 60)} (${fmt(c.wordCount)} words)`);

    if (total > budget) break;
  }

  log(`\nAutomatically selected: ${selected.length} articles, ${fmt(total)} words`);
  log(`Progress: ${((total / budget) * 100).toFixed(1)}% of target`);
  return selected;
}

export function progressLines(total: number, budget: number): string[] {
  const lines = [`Progress: ${((total / budget) * 100).toFixed(1)}% of target`];
  if (total < budget * (1 - TOLERANCE)) {
    lines.push("Status: Below target range (add more articles)");
  } else if (total > budget * (1 + TOLERANCE)) {
    lines.push("Status: Above target range (consider removing articles)");
  } else {
    lines.push("Status: Within target range ±10% ✓");
  }
  return lines;
}

export function formatCandidateRow(index: number, c: Candidate): string {
  const title = titleOf(c.record);
  const shown = title.length > 50 ? `${title.slice(0, 47)}...` : title;
  const date = dateOf(c.record.metadata) ?? "unknown";
  return `${String(index).padEnd(4)} ${fmt(c.wordCount).padStart(8)}  ${date.padEnd(12)}  ${shown}`;
}

function printCandidates(candidates: Candidate[], budget: number): void {
  banner("ARTICLE SELECTION", [
    `Target word count: ${fmt(budget)} words`,
    `Tolerance: ±10% (${fmt(Math.floor(budget * (1 - TOLERANCE)))} - ${fmt(Math.floor(budget * (1 + TOLERANCE)))} words)`,
  ]);
  always(`\nAvailable articles (${candidates.length} total):\n`);
  always(`${"#".padEnd(4)} ${"Words".padStart(8)}  ${"Date".padEnd(12)}  Title`);
  rule("-");
  candidates.forEach((c, i) => always(formatCandidateRow(i + 1, c)));

  banner("SELECTION INSTRUCTIONS:", [
    "  - Enter article numbers (space-separated) to add: e.g., '1 3 5'",
    "  - Enter 'r <numbers>' to remove: e.g., 'r 3'",
    "  - Enter 'done' to finish selection",
    "  - Enter 'quit' to cancel",
  ]);
}

function parseIndices(input: string): number[] | undefined {
  const parts = input.split(/\s+/).filter(Boolean);
  if (parts.length === 0 || !parts.every((p) => /^\d+$/.test(p))) return undefined;
  return parts.map(Number);
}

/**
 * Lets the user pick records by their 1-based index. Returns the picks in
 * list order, whatever order they were entered in.
 */
export async function selectInteractive(
  candidates: Candidate[],
  prompts: PromptProvider,
  budget: number
): Promise<Candidate[]> {
  if (candidates.length === 0) throw new EmptySelectionError();

  printCandidates(candidates, budget);
  const chosen = new Set<number>();
  let total = 0;

  for (;;) {
    if (chosen.size > 0) {
      always(`\nCurrently selected: ${chosen.size} articles, ${fmt(total)} words`);
      progressLines(total, budget).forEach((l) => always(l));
    } else {
      always("\nNo articles selected yet.");
    }

    const input = (await prompts.ask("\nEnter selection: ")).trim().toLowerCase();

    if (input === "done") {
      if (chosen.size === 0) {
        log("Error: No articles selected. Please select at least one article.", "warn");
        continue;
      }
      break;
    }
    if (input === "quit") throw new SelectionCancelledError();

    const removing = input.startsWith("r ");
    const indices = parseIndices(removing ? input.slice(2) : input);
    if (!indices) {
      log(
        removing
          ? "Error: Invalid input. Use format 'r <numbers>'"
          : "Error: Invalid input. Enter article numbers or 'done'/'quit'",
        "warn"
      );
      continue;
    }

    for (const idx of indices) {
      if (idx < 1 || idx > candidates.length) {
        log(`Error: Invalid article number ${idx}`, "warn");
        continue;
      }
      const c = candidates[idx - 1];
      const title = titleOf(c.record);

      if (removing) {
        if (!chosen.delete(idx - 1)) {
          always(`Article ${idx} was not selected.`);
          continue;
        }
        total -= c.wordCount;
        always(`Removed: ${title} (${fmt(c.wordCount)} words)`);
      } else {
        if (chosen.has(idx - 1)) {
          always(`Article ${idx} already selected.`);
          continue;
        }
        chosen.add(idx - 1);
        total += c.wordCount;
        always(`Added: ${title} (${fmt(c.wordCount)} words)`);
      }
    }
  }

  const selected = [...chosen].sort((a, b) => a - b).map((i) => candidates[i]);
  always(`\nFinal selection: ${selected.length} articles, ${fmt(total)} words`);
  return selected;
}
