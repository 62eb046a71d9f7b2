import { MongoClient, Db, Collection } from "mongodb";
import type { CollectionName, Store } from "./store.js";

interface StoredDocument {
  _id: string;
  data: unknown;
  updated_at: Date;
}

const DOCUMENT_ID = "current";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function getDb(uri: string): Promise<Db> {
  if (db) return db;
  client = new MongoClient(uri, { ignoreUndefined: true });
  await client.connect();
  db = client.db();
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) await client.close();
  client = null;
  db = null;
}

/**
 * Keeps each named collection as a single `{ _id: "current", data }`
 * document in the MongoDB collection of the same name.
 */
export class MongoStore implements Store {
  constructor(private readonly uri: string) {}

  private async collection(name: CollectionName): Promise<Collection<StoredDocument>> {
    return (await getDb(this.uri)).collection<StoredDocument>(name);
  }

  async load(name: CollectionName): Promise<unknown> {
    const col = await this.collection(name);
    const doc = await col.findOne({ _id: DOCUMENT_ID });
    return doc?.data ?? null;
  }

  async save(name: CollectionName, document: unknown): Promise<void> {
    const col = await this.collection(name);
    await col.replaceOne(
      { _id: DOCUMENT_ID },
      { data: document, updated_at: new Date() },
      { upsert: true },
    );
  }
}
