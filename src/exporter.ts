// src/exporter.ts

import fs from "fs/promises";
import path from "path";
import { bundleTitle, buildBundleMetadata, type DocumentConverter } from "./converter.js";
import type { DeliveryService } from "./delivery.js";
import {
  ConversionFailedError,
  DeliveryFailedError,
  EmptySelectionError,
  PartialMarkError,
  errorMessage,
} from "./errors.js";
import { authorOf, dateOf, titleOf } from "./frontmatter.js";
import { markSent } from "./lifecycle.js";
import { always, log } from "./logger.js";
import type { ArticleStore } from "./store.js";
import type { ArticleRecord, BundleResult, Chapter } from "./types.js";

export interface ExportDeps {
  store: ArticleStore;
  converter: DocumentConverter;
  delivery: DeliveryService;
  outputDir: string;
  today: string;
}

export function toChapter(record: ArticleRecord): Chapter {
  return {
    id: record.id,
    title: titleOf(record),
    author: authorOf(record.metadata),
    date: dateOf(record.metadata),
    body: record.body,
  };
}

export function artifactPathFor(outputDir: string, today: string): string {
  return path.join(outputDir, `articles-${today}.epub`);
}

async function reportSize(file: string): Promise<void> {
  try {
    const { size } = await fs.stat(file);
    always(`Size: ${(size / 1024).toFixed(1)} KB`);
  } catch {
    log(`Could not stat ${file}`, "warn");
  }
}

/**
 * Converts and delivers the selection, then flags each record as sent.
 * Nothing is flagged unless both collaborators succeed.
 */
export async function exportBundle(selected: ArticleRecord[], deps: ExportDeps): Promise<BundleResult> {
  if (selected.length === 0) throw new EmptySelectionError("Nothing selected for the bundle");

  const chapters = selected.map(toChapter);
  const metadata = buildBundleMetadata(chapters, deps.today);
  const artifactPath = artifactPathFor(deps.outputDir, deps.today);
  const title = bundleTitle(deps.today);

  always("\nCreating epub...");
  try {
    await deps.converter.convert(chapters, metadata, artifactPath);
  } catch (e) {
    if (e instanceof ConversionFailedError) throw e;
    throw new ConversionFailedError(`Conversion failed: ${errorMessage(e)}`);
  }
  always(`Created: ${artifactPath}`);
  await reportSize(artifactPath);

  always("\nSending to Kindle...");
  try {
    await deps.delivery.deliver(artifactPath, title);
  } catch (e) {
    if (e instanceof DeliveryFailedError) throw e;
    throw new DeliveryFailedError(`Delivery failed: ${errorMessage(e)}`);
  }
  always("Sent successfully!");

  always("\nMarking articles as sent-to-kindle...");
  const marked: string[] = [];
  const uncertain: Array<{ id: string; reason: string }> = [];

  for (const record of selected) {
    try {
      await deps.store.update("pending", record.id, (r) => ({
        ...r,
        metadata: markSent(r.metadata, record.id),
      }));
      marked.push(record.id);
    } catch (e) {
      log(`❌ Could not mark ${record.id} as sent: ${errorMessage(e)}`, "error");
      uncertain.push({ id: record.id, reason: errorMessage(e) });
    }
  }

  if (uncertain.length > 0) throw new PartialMarkError(marked, uncertain);

  always(`Updated ${marked.length} article(s).`);
  return { artifactPath, title, marked };
}
