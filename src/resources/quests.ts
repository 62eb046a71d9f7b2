import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { isCompletedOnDate } from "../engine/completion.js";
import type { QuestTracker } from "../tracker.js";
import type { Quest } from "../types.js";
import { jsonContents } from "./json.js";

function summarize(quest: Quest, today: string) {
  return {
    id: quest.id,
    title: quest.title,
    cadence: quest.cadence,
    energy_required: quest.energy_required,
    time_slot: quest.time_slot ?? null,
    category: quest.category ?? null,
    done_today: isCompletedOnDate(quest, today),
    streak: quest.streak,
    progress: quest.is_progressive
      ? { current: quest.progress_current, target: quest.progress_target, unit: quest.progress_unit ?? null }
      : null,
    skipped_today: quest.skipped_date === today,
  };
}

export function registerQuestResources(server: McpServer, tracker: QuestTracker): void {
  server.registerResource(
    "quests_today",
    "quests://today",
    {
      title: "Today's Quests",
      description: "Quests visible at today's declared energy, split into pending and done, plus upcoming reminders.",
      mimeType: "application/json",
    },
    async (uri) => {
      const visible = await tracker.visibleQuests();
      const agenda = await tracker.reminderAgenda();
      return jsonContents(uri, {
        date: visible.date,
        energy: visible.energy ?? null,
        pending: visible.pending.map(q => summarize(q, visible.date)),
        done: visible.done.map(q => summarize(q, visible.date)),
        upcoming_reminders: agenda.upcoming.map(r => ({ id: r.id, title: r.title, time: r.time })),
      });
    },
  );

  server.registerResource(
    "quests_all",
    "quests://all",
    {
      title: "All Quests",
      description: "Every quest grouped by cadence, regardless of energy or skips.",
      mimeType: "application/json",
    },
    async (uri) => {
      const today = tracker.clock.today();
      const quests = await tracker.listQuests();
      return jsonContents(uri, {
        daily: quests.daily.map(q => summarize(q, today)),
        weekly: quests.weekly.map(q => summarize(q, today)),
        monthly: quests.monthly.map(q => summarize(q, today)),
      });
    },
  );

  server.registerResource(
    "quest_detail",
    new ResourceTemplate("quests://quest/{id}", { list: undefined }),
    {
      title: "Quest Detail",
      description: "One quest with its full completion history.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      const id = Array.isArray(params.id) ? params.id[0] : params.id;
      const found = await tracker.getQuest(id);
      if (!found) return jsonContents(uri, { error: `Quest ${id} not found` });
      return jsonContents(uri, found.quest);
    },
  );

  server.registerResource(
    "streak",
    "quests://streak",
    {
      title: "Streaks",
      description: "The overall daily streak and each quest's streak, longest first.",
      mimeType: "application/json",
    },
    async (uri) => {
      const settings = await tracker.settings();
      const quests = await tracker.listQuests();
      const perQuest = [...quests.daily, ...quests.weekly, ...quests.monthly]
        .filter(q => q.streak > 0)
        .sort((a, b) => b.streak - a.streak)
        .map(q => ({ id: q.id, title: q.title, streak: q.streak, last_completed: q.completed_date ?? null }));
      return jsonContents(uri, {
        current: settings.streak_data.current,
        longest: settings.streak_data.longest,
        last_completed_date: settings.streak_data.last_completed_date ?? null,
        quests: perQuest,
      });
    },
  );
}
