import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestTracker } from "../tracker.js";
import { notFound, replyWith } from "./reply.js";

export function registerUpdateQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "update_quest",
    {
      title: "Update Quest",
      description: "Edit a quest's title, energy, time slot, category or progress target. Completion history is kept.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        title: z.string().optional(),
        energy_required: z.string().optional(),
        time_slot: z.string().optional(),
        category: z.string().optional(),
        progress_target: z.number().int().min(1).optional(),
        progress_unit: z.string().optional(),
      },
    },
    async ({ id, ...patch }) => replyWith(async () => {
      const quest = await tracker.updateQuest(id, patch);
      if (!quest) return notFound(id);
      return `Updated "${quest.title}".`;
    }),
  );
}

export function registerDeleteQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "delete_quest",
    {
      title: "Delete Quest",
      description: "Remove a quest and its completion history. Daily totals already logged are kept.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
      },
    },
    async ({ id }) => replyWith(async () => {
      const deleted = await tracker.deleteQuest(id);
      return deleted ? `Deleted quest ${id}.` : notFound(id);
    }),
  );
}

export function registerMoveQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "move_quest",
    {
      title: "Move Quest",
      description: "Move a quest to another cadence list, keeping its history and streak.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        cadence: z.enum(["daily", "weekly", "monthly"]).describe("Target list"),
      },
    },
    async ({ id, cadence }) => replyWith(async () => {
      const quest = await tracker.moveQuest(id, cadence);
      if (!quest) return notFound(id);
      return `"${quest.title}" is now a ${cadence} quest.`;
    }),
  );
}
