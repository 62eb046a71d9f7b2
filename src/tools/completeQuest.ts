import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestTracker } from "../tracker.js";
import { notFound, plural, replyWith } from "./reply.js";

const dateInput = z.string().optional().describe("Date (YYYY-MM-DD) to record against. Defaults to today.");

export function registerCompleteQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "complete_quest",
    {
      title: "Complete Quest",
      description: "Mark a quest done for today or an earlier date. Updates the quest streak, the day's totals and the overall streak.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        date: dateInput,
      },
    },
    async ({ id, date }) => replyWith(async () => {
      const outcome = await tracker.complete(id, date);
      if (!outcome) return notFound(id);

      const day = date ?? tracker.clock.today();
      if (!outcome.changed) return `"${outcome.quest.title}" was already completed on ${day}. Nothing changed.`;

      const parts = [
        `Completed "${outcome.quest.title}" for ${day}.`,
        `Quest streak: ${plural(outcome.quest.streak, "day")}.`,
        `Overall streak: ${plural(outcome.global_streak.current, "day")}.`,
      ];
      if (outcome.milestone) parts.push(`** ${outcome.milestone}-DAY STREAK MILESTONE! **`);
      return parts.join(" ");
    }),
  );
}

export function registerUncompleteQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "uncomplete_quest",
    {
      title: "Uncomplete Quest",
      description: "Undo a completion for today or an earlier date.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        date: dateInput,
      },
    },
    async ({ id, date }) => replyWith(async () => {
      const outcome = await tracker.uncomplete(id, date);
      if (!outcome) return notFound(id);

      const day = date ?? tracker.clock.today();
      if (!outcome.changed) return `"${outcome.quest.title}" was not completed on ${day}. Nothing changed.`;
      return `Unmarked "${outcome.quest.title}" for ${day}.`;
    }),
  );
}

export function registerSkipQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "skip_quest",
    {
      title: "Skip Quest",
      description: "Hide a quest for one day without affecting its streak.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        date: dateInput,
      },
    },
    async ({ id, date }) => replyWith(async () => {
      const quest = await tracker.skip(id, date);
      if (!quest) return notFound(id);
      return `Skipped "${quest.title}" for ${quest.skipped_date ?? date ?? tracker.clock.today()}.`;
    }),
  );
}

export function registerUnskipQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "unskip_quest",
    {
      title: "Unskip Quest",
      description: "Bring back a quest that was skipped.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
      },
    },
    async ({ id }) => replyWith(async () => {
      const quest = await tracker.unskip(id);
      if (!quest) return notFound(id);
      return `"${quest.title}" is back on the list.`;
    }),
  );
}
