import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatRepeatDays, formatTimeUntil } from "../reminders.js";
import type { QuestTracker } from "../tracker.js";
import { jsonContents } from "./json.js";

export function registerJournalResources(server: McpServer, tracker: QuestTracker): void {
  server.registerResource(
    "reminders",
    "quests://reminders",
    {
      title: "Reminders",
      description: "All reminders, and the ones still to fire today.",
      mimeType: "application/json",
    },
    async (uri) => {
      const all = await tracker.reminders.list();
      const agenda = await tracker.reminderAgenda();
      const now = new Date(tracker.clock.now());
      return jsonContents(uri, {
        reminders: all.map(r => ({ ...r, repeat: formatRepeatDays(r.repeat_days) })),
        upcoming_today: agenda.upcoming.map(r => ({
          id: r.id,
          title: r.title,
          time: r.time,
          due: formatTimeUntil(r.time, now),
        })),
      });
    },
  );

  server.registerResource(
    "reflections",
    "quests://reflections",
    {
      title: "Reflections",
      description: "The five most recent journal reflections, newest first.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, await tracker.pastReflections()),
  );

  server.registerResource(
    "settings",
    "quests://settings",
    {
      title: "Settings",
      description: "Energy categories (highest first), time slots, quest categories, today's energy and notes.",
      mimeType: "application/json",
    },
    async (uri) => {
      const settings = await tracker.settings();
      return jsonContents(uri, {
        ...settings,
        today_energy: await tracker.currentEnergy() ?? null,
      });
    },
  );
}
