import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Store } from "../store.js";
import type { QuestTracker } from "../tracker.js";
import { registerAddQuest } from "./addQuest.js";
import { registerExportBackup, registerRestoreBackup, registerRestoreSnapshot } from "./backup.js";
import {
  registerCompleteQuest, registerSkipQuest, registerUncompleteQuest, registerUnskipQuest,
} from "./completeQuest.js";
import { registerDeleteQuest, registerMoveQuest, registerUpdateQuest } from "./editQuest.js";
import {
  registerCheckIn, registerLogReading, registerLogReflection, registerSetPersistentNotes,
  registerUpdateSettings,
} from "./journal.js";
import { registerAdjustProgress, registerSetProgress } from "./progress.js";
import { registerAddReminder, registerDeleteReminder, registerUpdateReminder } from "./reminders.js";

export function registerQuestTools(server: McpServer, tracker: QuestTracker, store: Store): void {
  registerAddQuest(server, tracker);
  registerUpdateQuest(server, tracker);
  registerDeleteQuest(server, tracker);
  registerMoveQuest(server, tracker);
  registerCompleteQuest(server, tracker);
  registerUncompleteQuest(server, tracker);
  registerAdjustProgress(server, tracker);
  registerSetProgress(server, tracker);
  registerSkipQuest(server, tracker);
  registerUnskipQuest(server, tracker);
  registerCheckIn(server, tracker);
  registerLogReflection(server, tracker);
  registerLogReading(server, tracker);
  registerSetPersistentNotes(server, tracker);
  registerUpdateSettings(server, tracker);
  registerAddReminder(server, tracker);
  registerUpdateReminder(server, tracker);
  registerDeleteReminder(server, tracker);
  registerExportBackup(server, store, tracker);
  registerRestoreBackup(server, store);
  registerRestoreSnapshot(server, store);
}
