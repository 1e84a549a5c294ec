// src/memory-store.ts

import { TextRecordStore } from "./store.js";
import type { Collection } from "./types.js";

/** Holds record text in maps. Used where no filesystem is wanted. */
export class MemoryArticleStore extends TextRecordStore {
  private readonly files: Record<Collection, Map<string, string>> = {
    pending: new Map(),
    archived: new Map(),
  };

  put(collection: Collection, id: string, raw: string): this {
    this.files[collection].set(id, raw);
    return this;
  }

  raw(collection: Collection, id: string): string | undefined {
    return this.files[collection].get(id);
  }

  ids(collection: Collection): string[] {
    return [...this.files[collection].keys()];
  }

  protected async listIds(collection: Collection): Promise<string[]> {
    return this.ids(collection);
  }

  protected async readRaw(collection: Collection, id: string): Promise<string | undefined> {
    return this.files[collection].get(id);
  }

  protected async writeRaw(collection: Collection, id: string, raw: string): Promise<void> {
    this.files[collection].set(id, raw);
  }

  protected async move(id: string, from: Collection, to: Collection): Promise<void> {
    const raw = this.files[from].get(id);
    if (raw === undefined) return;
    this.files[to].set(id, raw);
    this.files[from].delete(id);
  }
}
