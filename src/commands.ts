// src/commands.ts

import { requireDelivery } from "./config.js";
import { PandocConverter, type DocumentConverter } from "./converter.js";
import { CalibreSmtpDelivery, type DeliveryService } from "./delivery.js";
import { EmptySelectionError, PartialMarkError, SelectionCancelledError } from "./errors.js";
import { exportBundle } from "./exporter.js";
import { processArchive } from "./archiver.js";
import { today as todayString } from "./lifecycle.js";
import { always, log } from "./logger.js";
import { TerminalPrompts, type PromptProvider } from "./prompts.js";
import { listCandidates, selectAutomatic, selectInteractive } from "./selection.js";
import { FileArticleStore, type ArticleStore } from "./store.js";
import type { Config, SelectionMode } from "./types.js";

export interface CommandDeps {
  store?: ArticleStore;
  prompts?: PromptProvider;
  converter?: DocumentConverter;
  delivery?: DeliveryService;
  today?: string;
}

/** Creates the terminal prompt only when a question is actually asked. */
function lazyPrompts(injected?: PromptProvider): { get(): PromptProvider; close(): void } {
  let created: PromptProvider | undefined;
  return {
    get() {
      if (injected) return injected;
      created ??= new TerminalPrompts();
      return created;
    },
    close() {
      created?.close();
    },
  };
}

async function askMode(prompts: PromptProvider): Promise<SelectionMode> {
  for (;;) {
    const answer = (await prompts.ask("Selection mode (a=automatic, i=interactive): ")).trim().toLowerCase();
    if (["a", "auto", "automatic"].includes(answer)) return "auto";
    if (["i", "interactive", "manual", ""].includes(answer)) return "interactive";
    always("Please enter 'a' for automatic or 'i' for interactive.");
  }
}

function storeFor(config: Config, deps: CommandDeps): ArticleStore {
  return deps.store ?? new FileArticleStore(config.inboxDir, config.archiveDir);
}

/** Export flow. Resolves to the process exit code. */
export async function runBundle(config: Config, deps: CommandDeps = {}): Promise<number> {
  // Settle delivery settings before anything is selected or converted.
  const delivery = deps.delivery ?? new CalibreSmtpDelivery(requireDelivery(config), config.calibreSmtpBin);
  const converter = deps.converter ?? new PandocConverter(config.pandocBin);
  const store = storeFor(config, deps);
  const prompts = lazyPrompts(deps.prompts);

  try {
    always(`Target word count: ${config.targetWords.toLocaleString("en-US")} words\n`);

    const candidates = await listCandidates(store, config.newestFirst);
    if (candidates.length === 0) {
      always("No unsent articles found in Inbox.");
      return 0;
    }
    always(`Found ${candidates.length} unsent article(s) available for selection.\n`);

    const mode = config.mode ?? (await askMode(prompts.get()));
    const selected =
      mode === "auto"
        ? selectAutomatic(candidates, config.targetWords)
        : await selectInteractive(candidates, prompts.get(), config.targetWords);

    await exportBundle(
      selected.map((c) => c.record),
      { store, converter, delivery, outputDir: config.outputDir, today: deps.today ?? todayString() }
    );
    return 0;
  } catch (e) {
    if (e instanceof EmptySelectionError || e instanceof SelectionCancelledError) {
      always(e.message);
      return 0;
    }
    if (e instanceof PartialMarkError) {
      log(`❌ ${e.message}`, "error");
      log(`   Marked: ${e.marked.join(", ") || "none"}`, "error");
      for (const u of e.uncertain) log(`   Uncertain: ${u.id} (${u.reason})`, "error");
      log("   Fix these records by hand; running the export again would send them twice.", "error");
      return 1;
    }
    throw e;
  } finally {
    prompts.close();
  }
}

/** Archival flow. Per-record failures are reported, not fatal. */
export async function runArchive(config: Config, deps: CommandDeps = {}): Promise<number> {
  const store = storeFor(config, deps);
  const prompts = lazyPrompts(deps.prompts);

  always("Article Processor");
  always("-".repeat(40));

  try {
    const summary = await processArchive({ store, prompts: prompts.get(), today: deps.today ?? todayString() });

    always("\n" + "=".repeat(60));
    always(
      `Processed: ${summary.processed} | Skipped: ${summary.skipped} | ` +
        `Archived: ${summary.archived} | Failed: ${summary.failed.length}`
    );
    for (const f of summary.failed) log(`   ${f.id}: ${f.reason}`, "warn");
    always("=".repeat(60));
    return 0;
  } finally {
    prompts.close();
  }
}
