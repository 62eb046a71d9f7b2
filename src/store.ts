export type CollectionName = "quests" | "daily_logs" | "user_settings" | "reminders" | "backup_snapshots";

/**
 * Durable key-value persistence, one document per named collection.
 * Documents are plain JSON-shaped values; `load` returns null for a
 * collection that has never been saved. Read-modify-write, last write wins.
 */
export interface Store {
  load(name: CollectionName): Promise<unknown>;
  save(name: CollectionName, document: unknown): Promise<void>;
}

/** In-process store. Documents are deep-copied in and out. */
export class MemoryStore implements Store {
  private readonly documents = new Map<CollectionName, unknown>();

  /** Number of save calls per collection. */
  readonly writes = new Map<CollectionName, number>();

  /** When set, the next save to that collection rejects with this error. */
  failNextSave: { name: CollectionName; error: Error } | null = null;

  async load(name: CollectionName): Promise<unknown> {
    const doc = this.documents.get(name);
    return doc === undefined ? null : structuredClone(doc);
  }

  async save(name: CollectionName, document: unknown): Promise<void> {
    if (this.failNextSave && this.failNextSave.name === name) {
      const { error } = this.failNextSave;
      this.failNextSave = null;
      throw error;
    }
    this.documents.set(name, structuredClone(document));
    this.writes.set(name, (this.writes.get(name) ?? 0) + 1);
  }
}
