import type { ReminderRepository } from "../reminders.js";
import type { ReminderDocument } from "../types.js";

export interface ReminderPollResult {
  fired: ReminderDocument[];
}

/**
 * Fires every reminder due at `now` exactly once per day. Delivery is the
 * caller's concern; `notify` runs after the triggers are recorded.
 */
export async function runReminderPoll(
  reminders: ReminderRepository,
  now: Date,
  notify: (reminder: ReminderDocument) => Promise<void> | void,
): Promise<ReminderPollResult> {
  const fired = await reminders.collectDue(now);
  for (const reminder of fired) {
    try {
      await notify(reminder);
    } catch (err) {
      console.error(`[cron] Reminder "${reminder.title}" failed to deliver:`, err);
    }
  }
  return { fired };
}
