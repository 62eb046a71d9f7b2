import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestTracker } from "../tracker.js";
import { replyWith } from "./reply.js";

export function registerAddQuest(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "add_quest",
    {
      title: "Add Quest",
      description: "Create a daily, weekly or monthly quest. Progressive quests count toward a numeric target each day.",
      inputSchema: {
        cadence: z.enum(["daily", "weekly", "monthly"]).describe("Which list the quest belongs to"),
        title: z.string().describe("Short quest title"),
        energy_required: z.string().optional().describe("Energy category needed, or \"Any\" (default)"),
        time_slot: z.string().optional().describe("Preferred time slot, one of the configured slots"),
        category: z.string().optional().describe("Free-form category label"),
        is_progressive: z.boolean().optional().describe("Track a daily count instead of a single tick"),
        progress_target: z.number().int().min(1).optional().describe("Daily target for a progressive quest"),
        progress_unit: z.string().optional().describe("Unit shown with progress, e.g. \"pages\""),
      },
    },
    async ({ cadence, ...input }) => replyWith(async () => {
      const quest = await tracker.addQuest(cadence, input);
      const progress = quest.is_progressive
        ? ` Target: ${quest.progress_target}${quest.progress_unit ? ` ${quest.progress_unit}` : ""} per day.`
        : "";
      return `Added ${cadence} quest "${quest.title}" (id: ${quest.id}).${progress}`;
    }),
  );
}
