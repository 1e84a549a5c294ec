// src/archiver.ts

import { PromptClosedError, errorMessage } from "./errors.js";
import { authorOf, titleOf } from "./frontmatter.js";
import { isSent, markRead } from "./lifecycle.js";
import { always, banner, log } from "./logger.js";
import { isAffirmative, type PromptProvider } from "./prompts.js";
import type { ArticleStore } from "./store.js";
import type { ArchiveSummary, ArticleRecord } from "./types.js";

export interface ArchiveDeps {
  store: ArticleStore;
  prompts: PromptProvider;
  today: string;
}

type Outcome = "skipped" | "saved" | "archived";

async function processRecord(record: ArticleRecord, deps: ArchiveDeps): Promise<Outcome> {
  const { prompts, store } = deps;

  banner(`Title: ${titleOf(record)}`, [`Author: ${authorOf(record.metadata) ?? "Unknown"}`]);

  const skip = await prompts.ask("\n[1/4] Skip this article? (y to skip, Enter to continue): ");
  if (isAffirmative(skip)) {
    always("Skipping...");
    return "skipped";
  }

  const liked = isAffirmative(await prompts.ask("[2/4] Like this article? (y/n, Enter for no): "));
  const notes = (await prompts.ask("[3/4] Quick notes (or Enter to skip): ")).trim();
  const archive = isAffirmative(await prompts.ask("[4/4] Archive this article? (y/n, Enter for no): "));

  await store.update("pending", record.id, (r) => ({
    ...r,
    metadata: markRead(r.metadata, { liked, notes }, deps.today, record.id),
  }));
  if (liked) always("Marked as liked.");
  if (notes) always("Notes saved.");

  if (!archive) {
    always("Changes saved (not archived).");
    return "saved";
  }

  await store.relocate(record.id, "pending", "archived");
  always(`Archived to: ${record.id}`);
  return "archived";
}

/**
 * Walks sent records oldest first and asks for feedback on each. A failure
 * on one record is reported and the walk moves on; closed input ends it.
 */
export async function processArchive(deps: ArchiveDeps): Promise<ArchiveSummary> {
  const summary: ArchiveSummary = { processed: 0, skipped: 0, archived: 0, failed: [], interrupted: false };

  const records = await deps.store.list("pending", (r) => isSent(r.metadata));
  if (records.length === 0) {
    always("No articles found with 'sent-to-kindle: yes' in Inbox.");
    return summary;
  }

  always(`Found ${records.length} article(s) to process.\n`);

  for (const [i, record] of records.entries()) {
    always(`\n[Article ${i + 1}/${records.length}]`);
    try {
      const outcome = await processRecord(record, deps);
      if (outcome === "skipped") {
        summary.skipped++;
        continue;
      }
      summary.processed++;
      if (outcome === "archived") summary.archived++;
    } catch (e) {
      if (e instanceof PromptClosedError) {
        always("\n\nExiting...");
        summary.interrupted = true;
        break;
      }
      log(`❌ ${record.id}: ${errorMessage(e)}`, "error");
      summary.failed.push({ id: record.id, reason: errorMessage(e) });
    }
  }

  return summary;
}
