import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Store } from "../store.js";
import type { QuestTracker } from "../tracker.js";
import { registerAnalyticsResources } from "./analytics.js";
import { registerJournalResources } from "./journal.js";
import { registerQuestResources } from "./quests.js";
import { registerSnapshotResources } from "./snapshots.js";

export function registerQuestLogResources(
  server: McpServer,
  tracker: QuestTracker,
  store: Store,
  heatmapWeeks: number,
): void {
  registerQuestResources(server, tracker);
  registerAnalyticsResources(server, tracker, heatmapWeeks);
  registerJournalResources(server, tracker);
  registerSnapshotResources(server, store);
}
