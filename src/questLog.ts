#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { autoBackup } from "./backup.js";
import { systemClock } from "./clock.js";
import { loadConfig } from "./config.js";
import { MongoStore } from "./db.js";
import { createServer } from "./server.js";
import { MemoryStore } from "./store.js";
import type { Store } from "./store.js";
import { QuestTracker } from "./tracker.js";

const config = loadConfig();

// stdout carries the MCP transport; log to stderr only
const store: Store = config.store === "memory" ? new MemoryStore() : new MongoStore(config.mongoUri);
if (config.store === "memory") {
  console.error("[quest-log] Using in-memory store; data is lost on exit");
}

try {
  const snapshot = await autoBackup(store, systemClock, config.snapshotKeep);
  if (snapshot.created) console.error(`[quest-log] Snapshot taken for ${snapshot.date}`);
} catch (err) {
  console.error("[quest-log] Startup snapshot failed:", err);
}

const tracker = new QuestTracker(store, systemClock);
const server = createServer(tracker, store, { heatmapWeeks: config.heatmapWeeks });

const transport = new StdioServerTransport();
await server.connect(transport);
console.error("[quest-log] Server ready on stdio");
