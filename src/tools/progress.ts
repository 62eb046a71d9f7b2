import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ProgressOutcome, QuestTracker } from "../tracker.js";
import { notFound, replyWith } from "./reply.js";

function describeProgress(outcome: ProgressOutcome): string {
  const { quest } = outcome;
  const unit = quest.progress_unit ? ` ${quest.progress_unit}` : "";
  const parts = [`"${quest.title}": ${quest.progress_current}/${quest.progress_target}${unit}.`];
  if (outcome.newlyCompleted) parts.push("Quest complete!");
  if (outcome.newlyUncompleted) parts.push("No longer complete for today.");
  if (outcome.milestone) parts.push(`** ${outcome.milestone}-DAY STREAK MILESTONE! **`);
  return parts.join(" ");
}

export function registerAdjustProgress(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "adjust_progress",
    {
      title: "Adjust Progress",
      description: "Step today's count on a progressive quest up or down by one. Reaching the target completes the quest.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        direction: z.enum(["increment", "decrement"]),
      },
    },
    async ({ id, direction }) => replyWith(async () => {
      const outcome = direction === "increment" ? await tracker.increment(id) : await tracker.decrement(id);
      return outcome ? describeProgress(outcome) : notFound(id);
    }),
  );
}

export function registerSetProgress(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "set_progress",
    {
      title: "Set Progress",
      description: "Set today's count on a progressive quest. Values above the target are capped.",
      inputSchema: {
        id: z.string().describe("Quest ID"),
        value: z.number().describe("New count for today"),
      },
    },
    async ({ id, value }) => replyWith(async () => {
      const outcome = await tracker.setProgress(id, value);
      return outcome ? describeProgress(outcome) : notFound(id);
    }),
  );
}
