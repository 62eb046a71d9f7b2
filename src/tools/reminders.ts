import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { WEEKDAYS } from "../constants.js";
import { formatRepeatDays } from "../reminders.js";
import type { QuestTracker } from "../tracker.js";
import { replyWith } from "./reply.js";

const repeatDays = z.array(z.enum(WEEKDAYS)).describe("Weekdays to repeat on (Sun..Sat). Empty for a one-off.");

export function registerAddReminder(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "add_reminder",
    {
      title: "Add Reminder",
      description: "Schedule a reminder at a time of day, once or on repeating weekdays.",
      inputSchema: {
        title: z.string(),
        time: z.string().describe("HH:MM, 24-hour"),
        repeat_days: repeatDays.optional(),
        start_date: z.string().optional().describe("First date (YYYY-MM-DD) the reminder may fire"),
      },
    },
    async (input) => replyWith(async () => {
      const reminder = await tracker.addReminder(input);
      return `Reminder "${reminder.title}" set for ${reminder.time} (${formatRepeatDays(reminder.repeat_days)}). id: ${reminder.id}`;
    }),
  );
}

export function registerUpdateReminder(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "update_reminder",
    {
      title: "Update Reminder",
      description: "Change a reminder's title, time, repeat days or start date, or pause it.",
      inputSchema: {
        id: z.string(),
        title: z.string().optional(),
        time: z.string().optional(),
        repeat_days: repeatDays.optional(),
        start_date: z.string().optional(),
        active: z.boolean().optional(),
      },
    },
    async ({ id, ...patch }) => replyWith(async () => {
      const reminder = await tracker.updateReminder(id, patch);
      if (!reminder) return `Reminder ${id} not found. Nothing changed.`;
      const state = reminder.active ? "" : " Paused.";
      return `Reminder "${reminder.title}" at ${reminder.time} (${formatRepeatDays(reminder.repeat_days)}).${state}`;
    }),
  );
}

export function registerDeleteReminder(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "delete_reminder",
    {
      title: "Delete Reminder",
      description: "Remove a reminder.",
      inputSchema: {
        id: z.string(),
      },
    },
    async ({ id }) => replyWith(async () => {
      const deleted = await tracker.deleteReminder(id);
      return deleted ? `Deleted reminder ${id}.` : `Reminder ${id} not found. Nothing changed.`;
    }),
  );
}
