import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerQuestLogResources } from "./resources/index.js";
import type { Store } from "./store.js";
import { registerQuestTools } from "./tools/index.js";
import type { QuestTracker } from "./tracker.js";

const QUEST_LOG_INSTRUCTIONS = `QUEST LOG MCP: SESSION PROTOCOL

You help one person keep a log of daily, weekly and monthly quests,
track streaks, and reflect on how their energy shapes their days.

SESSION START:
1. Read quests://today for what is left and upcoming reminders
2. If no energy is set for today, ask how they feel and call check_in
3. Read quests://streak to celebrate or protect a running streak

RESOURCES (read anytime):
- quests://today: quests visible at today's energy, pending and done
- quests://all: every quest by cadence
- quests://quest/{id}: one quest with full history
- quests://streak: overall and per-quest streaks
- quests://heatmap: completions per day with intensity levels
- quests://weekly-review: last 7 days with insights
- quests://monthly-summary: this month's totals
- quests://reading: reading over the last 7 days
- quests://reminders: reminders and what fires later today
- quests://reflections: recent journal entries
- quests://settings: energy categories, time slots, notes
- quests://snapshots: dates of the retained daily snapshots

TOOLS (mutations):
- add_quest / update_quest / delete_quest / move_quest
- complete_quest / uncomplete_quest: optional date for backfilling
- adjust_progress / set_progress: progressive quests only
- skip_quest / unskip_quest: hide a quest for one day
- check_in: record current energy
- log_reflection / log_reading / set_persistent_notes
- update_settings
- add_reminder / update_reminder / delete_reminder
- export_backup / restore_backup / restore_snapshot

RULES:
- Energy categories are ordered highest first. Low energy hides demanding quests.
- Completing a quest twice on the same day changes nothing. Say so plainly.
- Celebrate streak milestones when a tool reports one.
- Never restore a backup or snapshot without the user's explicit confirmation.`;

export interface ServerOptions {
  heatmapWeeks: number;
}

export function createServer(tracker: QuestTracker, store: Store, options: ServerOptions): McpServer {
  const server = new McpServer(
    { name: "quest-log", version: "1.0.0" },
    {
      capabilities: { logging: {} },
      instructions: QUEST_LOG_INSTRUCTIONS,
    },
  );

  registerQuestLogResources(server, tracker, store, options.heatmapWeeks);
  registerQuestTools(server, tracker, store);
  return server;
}
