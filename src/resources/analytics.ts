import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestTracker } from "../tracker.js";
import { jsonContents } from "./json.js";

export function registerAnalyticsResources(server: McpServer, tracker: QuestTracker, heatmapWeeks: number): void {
  server.registerResource(
    "heatmap",
    "quests://heatmap",
    {
      title: "Completion Heatmap",
      description: "Completions per day in weekly rows ending today, bucketed into intensity levels, with summary stats.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, await tracker.heatmap(heatmapWeeks)),
  );

  server.registerResource(
    "weekly_review",
    "quests://weekly-review",
    {
      title: "Weekly Review",
      description: "Last 7 days: completion rate, best day, energy and reading insights, and energy by time slot.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, await tracker.weeklyReview()),
  );

  server.registerResource(
    "monthly_summary",
    "quests://monthly-summary",
    {
      title: "Monthly Summary",
      description: "Totals for the current calendar month.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, await tracker.monthlySummary()),
  );

  server.registerResource(
    "reading",
    "quests://reading",
    {
      title: "Reading Stats",
      description: "Pages and time read over the last 7 days.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, await tracker.readingStats()),
  );
}
