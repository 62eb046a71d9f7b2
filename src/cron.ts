import cron from "node-cron";
import { autoBackup } from "./backup.js";
import { systemClock } from "./clock.js";
import { closeDb, MongoStore } from "./db.js";
import { loadConfig } from "./config.js";
import { runReminderPoll } from "./cron/reminderPoll.js";
import { ReminderRepository } from "./reminders.js";

const config = loadConfig();

if (config.store !== "mongo") {
  console.error("[cron] Scheduled jobs need the mongo store; QUEST_LOG_STORE is", config.store);
  process.exit(1);
}

const store = new MongoStore(config.mongoUri);
const reminders = new ReminderRepository(store);

console.log(`[cron] Polling reminders at: ${config.reminderSchedule}`);

const task = cron.schedule(config.reminderSchedule, async () => {
  try {
    const { fired } = await runReminderPoll(reminders, new Date(), reminder => {
      console.log(`[cron] Reminder: ${reminder.title} (${reminder.time})`);
    });
    if (fired.length > 0) console.log(`[cron] Fired ${fired.length} reminder(s)`);
  } catch (err) {
    console.error("[cron] Reminder poll failed:", err);
  }
});

console.log(`[cron] Daily snapshot at: ${config.snapshotSchedule} (keeping ${config.snapshotKeep})`);

const snapshotTask = cron.schedule(config.snapshotSchedule, async () => {
  try {
    const result = await autoBackup(store, systemClock, config.snapshotKeep);
    if (result.created) console.log(`[cron] Snapshot taken for ${result.date}`);
    if (result.pruned.length > 0) console.log(`[cron] Dropped snapshots: ${result.pruned.join(", ")}`);
  } catch (err) {
    console.error("[cron] Snapshot failed:", err);
  }
});

process.on("SIGTERM", () => {
  task.stop();
  snapshotTask.stop();
  closeDb().catch(err => console.error("[cron] Failed to close MongoDB:", err));
});
