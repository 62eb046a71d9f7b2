import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createBackup, restoreBackup, restoreSnapshot } from "../backup.js";
import type { Store } from "../store.js";
import type { QuestTracker } from "../tracker.js";
import { required, validateDate } from "../validation.js";
import { replyWith, textReply } from "./reply.js";

export function registerExportBackup(server: McpServer, store: Store, tracker: QuestTracker): void {
  server.registerTool(
    "export_backup",
    {
      title: "Export Backup",
      description: "Return every quest, daily log, setting and reminder as one JSON document.",
      inputSchema: {},
    },
    async () => {
      const backup = await createBackup(store, tracker.clock);
      return textReply(JSON.stringify(backup));
    },
  );
}

export function registerRestoreBackup(server: McpServer, store: Store): void {
  server.registerTool(
    "restore_backup",
    {
      title: "Restore Backup",
      description: "Replace stored data with the sections present in a backup produced by export_backup.",
      inputSchema: {
        backup: z.string().describe("The backup JSON text"),
      },
    },
    async ({ backup }) => replyWith(async () => {
      let raw: unknown;
      try {
        raw = JSON.parse(backup);
      } catch {
        return "Error: Backup is not valid JSON.";
      }
      const result = await restoreBackup(store, raw);
      if (!result.ok) return `Error: ${result.error}.`;
      return `Restored ${result.value.join(", ")}.`;
    }),
  );
}

export function registerRestoreSnapshot(server: McpServer, store: Store): void {
  server.registerTool(
    "restore_snapshot",
    {
      title: "Restore Snapshot",
      description: "Roll stored data back to one of the daily snapshots listed at quests://snapshots.",
      inputSchema: {
        date: z.string().describe("Snapshot date (YYYY-MM-DD)"),
      },
    },
    async ({ date }) => replyWith(async () => {
      const day = required(validateDate(date));
      const result = await restoreSnapshot(store, day);
      if (!result.ok) return `Error: ${result.error}.`;
      return `Restored ${result.value.join(", ")} from the ${day} snapshot.`;
    }),
  );
}
