import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestTracker } from "../tracker.js";
import { replyWith } from "./reply.js";

export function registerCheckIn(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "check_in",
    {
      title: "Energy Check-in",
      description: "Record how much energy the user has right now. Sets today's energy, which filters the quest list.",
      inputSchema: {
        energy: z.string().describe("One of the configured energy categories"),
        hour: z.number().int().min(0).max(23).optional().describe("Hour of the check-in. Defaults to now."),
      },
    },
    async ({ energy, hour }) => replyWith(async () => {
      const result = await tracker.checkIn(energy, hour);
      return `Energy set to ${result.energy} (${result.time_slot}). Check-ins today: ${result.entries_today}.`;
    }),
  );
}

export function registerLogReflection(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "log_reflection",
    {
      title: "Log Reflection",
      description: "Save today's journal reflection. Replaces an earlier reflection from the same day.",
      inputSchema: {
        text: z.string().describe("Reflection text, up to 2000 characters"),
      },
    },
    async ({ text }) => replyWith(async () => {
      const date = await tracker.saveReflection(text);
      return `Reflection saved for ${date}.`;
    }),
  );
}

export function registerLogReading(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "log_reading",
    {
      title: "Log Reading",
      description: "Record a day's reading totals. Feeds the reading insight on the weekly review.",
      inputSchema: {
        pages_read: z.number().int().min(0),
        time_spent: z.number().int().min(0).describe("Seconds spent reading"),
        current_book: z.string().optional(),
        sessions: z.number().int().min(0).optional(),
        date: z.string().optional().describe("Date (YYYY-MM-DD). Defaults to today."),
      },
    },
    async ({ date, ...reading }) => replyWith(async () => {
      const entry = await tracker.logReading(reading, date);
      const book = entry.current_book ? ` of ${entry.current_book}` : "";
      return `Logged ${entry.pages_read} pages${book} in ${Math.floor(entry.time_spent / 60)} min.`;
    }),
  );
}

export function registerSetPersistentNotes(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "set_persistent_notes",
    {
      title: "Set Notes",
      description: "Replace the free-text notes kept across days.",
      inputSchema: {
        text: z.string(),
      },
    },
    async ({ text }) => replyWith(async () => {
      await tracker.setPersistentNotes(text);
      return text.trim() ? "Notes saved." : "Notes cleared.";
    }),
  );
}

export function registerUpdateSettings(server: McpServer, tracker: QuestTracker): void {
  server.registerTool(
    "update_settings",
    {
      title: "Update Settings",
      description: "Replace the energy categories (highest first), time slots or quest categories.",
      inputSchema: {
        energy_categories: z.array(z.string()).optional().describe("Highest energy first"),
        time_slots: z.array(z.string()).optional(),
        quest_categories: z.array(z.string()).optional(),
      },
    },
    async (patch) => replyWith(async () => {
      const settings = await tracker.updateSettings(patch);
      return [
        `Energy: ${settings.energy_categories.join(", ")}.`,
        `Time slots: ${settings.time_slots.join(", ")}.`,
        `Categories: ${settings.quest_categories.join(", ")}.`,
      ].join(" ");
    }),
  );
}
