// src/__tests__/store.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { FileArticleStore } from "../store.js";
import { MemoryArticleStore } from "../memory-store.js";
import { ConflictError, InvalidTransitionError, NotFoundError } from "../errors.js";
import { setLogLevel } from "../logger.js";
import { markSent } from "../lifecycle.js";

const article = (created: string | null, extra = ""): string =>
  `---\ntitle: Article\n${created ? `created: ${created}\n` : ""}${extra}---\nBody text.\n`;

const READ = "sent-to-kindle: yes\nread-status: read\ndate-read: 2026-10-18\n";

describe("Article store ordering", () => {
  it("should list oldest first with undated records last", async () => {
    const store = new MemoryArticleStore()
      .put("pending", "b.md", article("2024-03-01"))
      .put("pending", "d.md", article("not a date"))
      .put("pending", "a.md", article("2024-01-01"))
      .put("pending", "c.md", article(null))
      .put("pending", "e.md", article("2024-01-01"));

    const ids = (await store.list("pending")).map((r) => r.id);

    expect(ids).toEqual(["a.md", "e.md", "b.md", "c.md", "d.md"]);
  });

  it("should apply the predicate", async () => {
    const store = new MemoryArticleStore()
      .put("pending", "a.md", article("2024-01-01"))
      .put("pending", "b.md", article("2024-01-02", "sent-to-kindle: yes\n"));

    const records = await store.list("pending", (r) => r.metadata["sent-to-kindle"] === "yes");

    expect(records.map((r) => r.id)).toEqual(["b.md"]);
  });
});

describe("Memory article store", () => {
  let store: MemoryArticleStore;

  beforeEach(() => {
    setLogLevel("normal");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new MemoryArticleStore().put("pending", "a.md", article("2024-01-01", "custom: kept\n"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should skip malformed records with a warning", async () => {
    store.put("pending", "bad.md", "---\ntitle: never closed\n");

    const records = await store.list("pending");

    expect(records.map((r) => r.id)).toEqual(["a.md"]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("should fail with NotFound for a missing record", async () => {
    await expect(store.get("pending", "missing.md")).rejects.toThrow(NotFoundError);
  });

  it("should update metadata and keep body and unknown keys", async () => {
    await store.update("pending", "a.md", (r) => ({ ...r, metadata: { ...r.metadata, liked: true } }));

    expect(store.raw("pending", "a.md")).toBe(
      "---\ntitle: Article\ncreated: 2024-01-01\ncustom: kept\nliked: yes\n---\nBody text.\n"
    );
  });

  it("should mark a CRLF record sent without adding a second header", async () => {
    store.put("pending", "w.md", "---\r\ntitle: T\r\n---\r\nbody");

    await store.update("pending", "w.md", (r) => ({ ...r, metadata: markSent(r.metadata, "w.md") }));

    expect(store.raw("pending", "w.md")).toBe("---\r\ntitle: T\r\nsent-to-kindle: yes\r\n---\r\nbody");
  });

  it("should keep the byte order mark when rewriting a record", async () => {
    store.put("pending", "b.md", "\uFEFF---\ntitle: B # shown in lists\n---\nbody");

    await store.update("pending", "b.md", (r) => ({ ...r, metadata: markSent(r.metadata, "b.md") }));

    expect(store.raw("pending", "b.md")).toBe("\uFEFF---\ntitle: B # shown in lists\nsent-to-kindle: yes\n---\nbody");
  });

  it("should refuse to mark a sent CRLF record again", async () => {
    store.put("pending", "w.md", "---\r\ntitle: T\r\nsent-to-kindle: yes\r\n---\r\nbody");

    await expect(
      store.update("pending", "w.md", (r) => ({ ...r, metadata: markSent(r.metadata, "w.md") }))
    ).rejects.toThrow(InvalidTransitionError);
    expect(store.raw("pending", "w.md")).toBe("---\r\ntitle: T\r\nsent-to-kindle: yes\r\n---\r\nbody");
  });

  it("should leave the record untouched when the mutator throws", async () => {
    const before = store.raw("pending", "a.md");

    await expect(
      store.update("pending", "a.md", () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(store.raw("pending", "a.md")).toBe(before);
  });

  it("should refuse to write archived records", async () => {
    store.put("archived", "old.md", article("2024-01-01", READ));

    await expect(store.update("archived", "old.md", (r) => r)).rejects.toThrow(InvalidTransitionError);
  });

  it("should relocate a read record", async () => {
    store.put("pending", "r.md", article("2024-01-01", READ));

    await store.relocate("r.md", "pending", "archived");

    expect(store.ids("pending")).toEqual(["a.md"]);
    expect(store.ids("archived")).toEqual(["r.md"]);
  });

  it("should refuse to archive an unread record", async () => {
    await expect(store.relocate("a.md", "pending", "archived")).rejects.toThrow(InvalidTransitionError);
    expect(store.ids("archived")).toEqual([]);
  });

  it("should fail with Conflict when the destination exists", async () => {
    store.put("pending", "r.md", article("2024-01-01", READ));
    store.put("archived", "r.md", article("2023-01-01", READ));

    await expect(store.relocate("r.md", "pending", "archived")).rejects.toThrow(ConflictError);
    expect(store.raw("pending", "r.md")).toBe(article("2024-01-01", READ));
  });

  it("should fail with NotFound when relocating a missing record", async () => {
    await expect(store.relocate("missing.md", "pending", "archived")).rejects.toThrow(NotFoundError);
  });
});

describe("File article store", () => {
  let root: string;
  let inbox: string;
  let archive: string;
  let store: FileArticleStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "store-test-"));
    inbox = path.join(root, "Inbox");
    archive = path.join(root, "Archive");
    await fs.mkdir(inbox);
    store = new FileArticleStore(inbox, archive);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("should list only markdown files", async () => {
    await fs.writeFile(path.join(inbox, "b.md"), article("2024-02-01"));
    await fs.writeFile(path.join(inbox, "a.md"), article("2024-01-01"));
    await fs.writeFile(path.join(inbox, "notes.txt"), "ignored");
    await fs.mkdir(path.join(inbox, "sub.md"));

    const ids = (await store.list("pending")).map((r) => r.id);

    expect(ids).toEqual(["a.md", "b.md"]);
  });

  it("should treat a missing directory as empty", async () => {
    expect(await store.list("archived")).toEqual([]);
  });

  it("should replace the file on update without leaving temp files", async () => {
    await fs.writeFile(path.join(inbox, "a.md"), article("2024-01-01"));

    await store.update("pending", "a.md", (r) => ({ ...r, metadata: { ...r.metadata, "sent-to-kindle": true } }));

    expect(await fs.readFile(path.join(inbox, "a.md"), "utf8")).toBe(
      "---\ntitle: Article\ncreated: 2024-01-01\nsent-to-kindle: yes\n---\nBody text.\n"
    );
    expect(await fs.readdir(inbox)).toEqual(["a.md"]);
  });

  it("should move a read record into the archive directory", async () => {
    await fs.writeFile(path.join(inbox, "a.md"), article("2024-01-01", READ));

    await store.relocate("a.md", "pending", "archived");

    expect(await fs.readdir(inbox)).toEqual([]);
    expect(await fs.readFile(path.join(archive, "a.md"), "utf8")).toBe(article("2024-01-01", READ));
  });

  it("should not overwrite an archived file", async () => {
    await fs.mkdir(archive);
    await fs.writeFile(path.join(inbox, "a.md"), article("2024-01-01", READ));
    await fs.writeFile(path.join(archive, "a.md"), "older copy");

    await expect(store.relocate("a.md", "pending", "archived")).rejects.toThrow(ConflictError);
    expect(await fs.readFile(path.join(archive, "a.md"), "utf8")).toBe("older copy");
  });

  it("should reject ids that escape the collection", async () => {
    await expect(store.get("pending", "../secret.md")).rejects.toThrow(NotFoundError);
  });
});
