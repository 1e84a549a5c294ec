// src/converter.ts

import fs from "fs/promises";
import os from "os";
import path from "path";
import YAML from "yaml";
import { ConversionFailedError } from "./errors.js";
import { runCommand, type CommandRunner } from "./exec.js";
import type { BundleMetadata, Chapter } from "./types.js";

export interface DocumentConverter {
  /** Writes one artifact at `outputPath` or throws ConversionFailedError. */
  convert(chapters: Chapter[], metadata: BundleMetadata, outputPath: string): Promise<void>;
}

export function bundleTitle(date: string): string {
  return `Articles Bundle - ${date}`;
}

export function buildBundleMetadata(chapters: Chapter[], today: string): BundleMetadata {
  const dates = chapters.map((c) => c.date).filter((d): d is string => Boolean(d)).sort();

  let range = "various dates";
  if (dates.length) {
    const oldest = dates[0];
    const newest = dates[dates.length - 1];
    range = oldest === newest ? oldest : `${oldest} to ${newest}`;
  }

  return {
    title: bundleTitle(today),
    subtitle: `Collection of ${chapters.length} articles from ${range}`,
    author: "Various Authors",
    date: today,
    lang: "en",
  };
}

/**
 * One chapter per article: headings in the body move down a level so the
 * article title is the only level-1 heading.
 */
export function prepareChapter(chapter: Chapter): string {
  const body = chapter.body.replace(/^(#{1,5}) /gm, "#$1 ");
  const byline = chapter.author ? `*${chapter.author}*\n\n` : "";
  return `# ${chapter.title}\n\n${byline}${body}`;
}

export class PandocConverter implements DocumentConverter {
  constructor(
    private readonly bin = "pandoc",
    private readonly run: CommandRunner = runCommand
  ) {}

  async convert(chapters: Chapter[], metadata: BundleMetadata, outputPath: string): Promise<void> {
    const tmpdir = await fs.mkdtemp(path.join(os.tmpdir(), "bundle-"));

    try {
      const metadataFile = path.join(tmpdir, "metadata.yaml");
      await fs.writeFile(metadataFile, `---\n${YAML.stringify(metadata, { lineWidth: 0 })}---\n\n`, "utf8");

      const files: string[] = [];
      for (const [i, chapter] of chapters.entries()) {
        const file = path.join(tmpdir, `${String(i).padStart(2, "0")}_${chapter.id}`);
        await fs.writeFile(file, prepareChapter(chapter), "utf8");
        files.push(file);
      }

      // A leftover artifact from an earlier run must not pass for this one.
      await fs.rm(outputPath, { force: true });
      const result = await this.run(this.bin, [
        metadataFile,
        ...files,
        "-o",
        outputPath,
        "--toc",
        "--toc-depth=1",
        "--epub-chapter-level=1",
        "--file-scope",
      ]);
      if (result.code !== 0) {
        throw new ConversionFailedError(`${this.bin} exited with code ${result.code}`, result.stderr);
      }

      try {
        await fs.access(outputPath);
      } catch {
        throw new ConversionFailedError(`${this.bin} reported success but wrote no file at ${outputPath}`);
      }
    } finally {
      await fs.rm(tmpdir, { recursive: true, force: true });
    }
  }
}
