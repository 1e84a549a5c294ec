// src/__tests__/commands.test.ts

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { runArchive, runBundle } from "../commands.js";
import { loadConfig } from "../config.js";
import { MemoryArticleStore } from "../memory-store.js";
import { ScriptedPrompts } from "../prompts.js";
import { parseRecord } from "../frontmatter.js";
import { isSent } from "../lifecycle.js";
import { ConfigError } from "../errors.js";
import type { DocumentConverter } from "../converter.js";
import type { DeliveryService } from "../delivery.js";

const TODAY = "2026-10-18";
const words = (n: number): string => "word ".repeat(n);

function inbox(): MemoryArticleStore {
  return new MemoryArticleStore()
    .put("pending", "a.md", `---\ntitle: A\ncreated: 2024-01-01\n---\n${words(5000)}`)
    .put("pending", "b.md", `---\ntitle: B\ncreated: 2024-01-02\n---\n${words(8000)}`)
    .put("pending", "c.md", `---\ntitle: C\ncreated: 2024-01-03\n---\n${words(9000)}`);
}

const sentIds = (store: MemoryArticleStore): string[] =>
  store.ids("pending").filter((id) => isSent(parseRecord(store.raw("pending", id) ?? "").metadata));

describe("Bundle command", () => {
  let convert: Mock<DocumentConverter["convert"]>;
  let deliver: Mock<DeliveryService["deliver"]>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    convert = vi.fn<DocumentConverter["convert"]>(async () => {});
    deliver = vi.fn<DeliveryService["deliver"]>(async () => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const deps = (store: MemoryArticleStore, answers: string[] = []) => ({
    store,
    prompts: new ScriptedPrompts(answers),
    converter: { convert },
    delivery: { deliver },
    today: TODAY,
  });

  it("should bundle the oldest articles within budget in automatic mode", async () => {
    const store = inbox();

    const code = await runBundle(loadConfig(["node", "bundle", "--auto"], {}), deps(store));

    expect(code).toBe(0);
    expect(convert.mock.calls[0][0].map((c) => c.id)).toEqual(["a.md", "b.md"]);
    expect(sentIds(store)).toEqual(["a.md", "b.md"]);
  });

  it("should honour a budget override", async () => {
    const store = inbox();

    await runBundle(loadConfig(["node", "bundle", "--auto", "--words", "30000"], {}), deps(store));

    expect(sentIds(store)).toEqual(["a.md", "b.md", "c.md"]);
  });

  it("should ask for the mode when no flag is given", async () => {
    const store = inbox();
    const d = deps(store, ["a"]);

    await runBundle(loadConfig(["node", "bundle"], {}), d);

    expect(d.prompts.questions[0]).toBe("Selection mode (a=automatic, i=interactive): ");
    expect(sentIds(store)).toEqual(["a.md", "b.md"]);
  });

  it("should export the interactive picks", async () => {
    const store = inbox();

    const code = await runBundle(loadConfig(["node", "bundle", "--interactive"], {}), deps(store, ["3", "done"]));

    expect(code).toBe(0);
    expect(sentIds(store)).toEqual(["c.md"]);
  });

  it("should exit cleanly with nothing to send", async () => {
    const store = new MemoryArticleStore().put("pending", "a.md", "---\ntitle: A\nsent-to-kindle: yes\n---\nx");

    const code = await runBundle(loadConfig(["node", "bundle", "--auto"], {}), deps(store));

    expect(code).toBe(0);
    expect(convert).not.toHaveBeenCalled();
  });

  it("should exit cleanly when the user quits", async () => {
    const store = inbox();

    const code = await runBundle(loadConfig(["node", "bundle", "--interactive"], {}), deps(store, ["1", "quit"]));

    expect(code).toBe(0);
    expect(convert).not.toHaveBeenCalled();
    expect(sentIds(store)).toEqual([]);
  });

  it("should propagate a conversion failure without marking anything", async () => {
    const store = inbox();
    convert.mockRejectedValueOnce(new Error("pandoc missing"));

    await expect(runBundle(loadConfig(["node", "bundle", "--auto"], {}), deps(store))).rejects.toThrow(
      "Conversion failed: pandoc missing"
    );
    expect(sentIds(store)).toEqual([]);
  });

  it("should require delivery settings before doing anything", async () => {
    const store = inbox();

    await expect(
      runBundle(loadConfig(["node", "bundle", "--auto"], {}), { store, converter: { convert }, today: TODAY })
    ).rejects.toThrow(ConfigError);
    expect(convert).not.toHaveBeenCalled();
  });
});

describe("Archive command", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should archive confirmed records and exit 0", async () => {
    const store = new MemoryArticleStore().put(
      "pending",
      "a.md",
      "---\ntitle: A\ncreated: 2024-01-01\nsent-to-kindle: yes\n---\nx"
    );

    const code = await runArchive(loadConfig(["node", "archive"], {}), {
      store,
      prompts: new ScriptedPrompts(["", "", "", "y"]),
      today: TODAY,
    });

    expect(code).toBe(0);
    expect(store.ids("archived")).toEqual(["a.md"]);
  });
});
