// src/store.ts

import fs from "fs/promises";
import { constants as fsConstants } from "fs";
import path from "path";
import { ConflictError, InvalidTransitionError, MalformedRecordError, NotFoundError } from "./errors.js";
import { metaString, parseRecord, serializeRecord } from "./frontmatter.js";
import { assertArchivable } from "./lifecycle.js";
import { log, verbose } from "./logger.js";
import type { ArticleRecord, Collection, RecordMutator, RecordPredicate } from "./types.js";

export interface ArticleStore {
  list(collection: Collection, predicate?: RecordPredicate): Promise<ArticleRecord[]>;
  get(collection: Collection, id: string): Promise<ArticleRecord>;
  update(collection: Collection, id: string, mutator: RecordMutator): Promise<ArticleRecord>;
  relocate(id: string, from: Collection, to: Collection): Promise<void>;
}

/** Parsed `created` date of a record, if it has a usable one. */
export function createdTime(record: ArticleRecord): number | undefined {
  const created = metaString(record.metadata.created);
  if (!created) return undefined;
  const t = Date.parse(created);
  return Number.isNaN(t) ? undefined : t;
}

/** Oldest `created` first; undated records last; file name breaks ties. */
export function compareOldestFirst(a: ArticleRecord, b: ArticleRecord): number {
  const ta = createdTime(a);
  const tb = createdTime(b);
  if (ta !== undefined && tb !== undefined && ta !== tb) return ta - tb;
  if (ta === undefined && tb !== undefined) return 1;
  if (ta !== undefined && tb === undefined) return -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Store logic shared by every backing: parsing, ordering, the
 * read-modify-write cycle and the collection rules. Subclasses only move
 * raw text around.
 */
export abstract class TextRecordStore implements ArticleStore {
  protected abstract listIds(collection: Collection): Promise<string[]>;
  protected abstract readRaw(collection: Collection, id: string): Promise<string | undefined>;
  /** Must replace the record in one step; readers never see a half-written file. */
  protected abstract writeRaw(collection: Collection, id: string, raw: string): Promise<void>;
  protected abstract move(id: string, from: Collection, to: Collection): Promise<void>;

  async list(collection: Collection, predicate?: RecordPredicate): Promise<ArticleRecord[]> {
    const records: ArticleRecord[] = [];

    for (const id of await this.listIds(collection)) {
      const raw = await this.readRaw(collection, id);
      if (raw === undefined) continue;

      try {
        const record: ArticleRecord = { id, collection, ...parseRecord(raw, id) };
        if (!predicate || predicate(record)) records.push(record);
      } catch (e) {
        if (!(e instanceof MalformedRecordError)) throw e;
        log(`⚠️  Skipping malformed record: ${e.message}`, "warn");
      }
    }

    return records.sort(compareOldestFirst);
  }

  async get(collection: Collection, id: string): Promise<ArticleRecord> {
    const raw = await this.readRaw(collection, id);
    if (raw === undefined) {
      throw new NotFoundError(`No record in ${collection}`, id);
    }
    return { id, collection, ...parseRecord(raw, id) };
  }

  async update(collection: Collection, id: string, mutator: RecordMutator): Promise<ArticleRecord> {
    if (collection === "archived") {
      throw new InvalidTransitionError("Archived records are read-only", id);
    }

    const current = await this.get(collection, id);
    const next = mutator({ metadata: current.metadata, body: current.body, format: current.format });
    await this.writeRaw(collection, id, serializeRecord(next.metadata, next.body, next.format));
    verbose(`Updated ${collection}/${id}`);

    return { id, collection, ...next };
  }

  async relocate(id: string, from: Collection, to: Collection): Promise<void> {
    if (from === to) return;
    if (from === "archived") {
      throw new InvalidTransitionError("Archived records cannot be moved back", id);
    }

    const record = await this.get(from, id);
    if (to === "archived") assertArchivable(record);

    if ((await this.readRaw(to, id)) !== undefined) {
      throw new ConflictError(`A record with this name already exists in ${to}`, id);
    }

    await this.move(id, from, to);
    verbose(`Moved ${id}: ${from} -> ${to}`);
  }
}

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

/** Collections are directories of `.md` files; the file name is the id. */
export class FileArticleStore extends TextRecordStore {
  private readonly dirs: Record<Collection, string>;

  constructor(pendingDir: string, archivedDir: string) {
    super();
    this.dirs = { pending: pendingDir, archived: archivedDir };
  }

  pathOf(collection: Collection, id: string): string {
    if (path.basename(id) !== id || id.startsWith(".")) {
      throw new NotFoundError(`Invalid record name`, id);
    }
    return path.join(this.dirs[collection], id);
  }

  protected async listIds(collection: Collection): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dirs[collection], { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(".md") && !e.name.startsWith("."))
        .map((e) => e.name);
    } catch (e) {
      if (isErrno(e, "ENOENT")) return [];
      throw e;
    }
  }

  protected async readRaw(collection: Collection, id: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.pathOf(collection, id), "utf8");
    } catch (e) {
      if (isErrno(e, "ENOENT")) return undefined;
      throw e;
    }
  }

  protected async writeRaw(collection: Collection, id: string, raw: string): Promise<void> {
    const target = this.pathOf(collection, id);
    const tmp = path.join(path.dirname(target), `.${id}.${process.pid}.tmp`);
    await fs.writeFile(tmp, raw, "utf8");
    try {
      await fs.rename(tmp, target);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }

  protected async move(id: string, from: Collection, to: Collection): Promise<void> {
    const src = this.pathOf(from, id);
    const dest = this.pathOf(to, id);
    await fs.mkdir(this.dirs[to], { recursive: true });

    try {
      await fs.rename(src, dest);
    } catch (e) {
      if (!isErrno(e, "EXDEV")) throw e;
      // Different filesystems: copy without clobbering, then drop the source.
      await fs.copyFile(src, dest, fsConstants.COPYFILE_EXCL);
      await fs.unlink(src);
    }
  }
}
