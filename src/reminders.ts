import { randomUUID } from "node:crypto";
import { WEEKDAYS } from "./constants.js";
import { daysBetween, localDateString, localTimeString, weekdayOf } from "./dates.js";
import { loadReminders, saveReminders } from "./documents.js";
import type { Store } from "./store.js";
import type { NewReminder, ReminderDocument, ReminderPatch, Weekday } from "./types.js";

export class ReminderRepository {
  constructor(private readonly store: Store) {}

  async list(): Promise<ReminderDocument[]> {
    return loadReminders(this.store);
  }

  async add(input: NewReminder): Promise<ReminderDocument> {
    const reminders = await this.list();
    const reminder: ReminderDocument = {
      id: randomUUID(),
      title: input.title,
      time: input.time,
      repeat_days: input.repeat_days ?? [],
      start_date: input.start_date,
      active: true,
    };
    await saveReminders(this.store, [...reminders, reminder]);
    return reminder;
  }

  async update(id: string, patch: ReminderPatch): Promise<ReminderDocument | null> {
    const reminders = await this.list();
    const existing = reminders.find(r => r.id === id);
    if (!existing) return null;
    const updated: ReminderDocument = { ...existing, ...patch, id: existing.id };
    await saveReminders(this.store, reminders.map(r => (r.id === id ? updated : r)));
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const reminders = await this.list();
    const remaining = reminders.filter(r => r.id !== id);
    if (remaining.length === reminders.length) return false;
    await saveReminders(this.store, remaining);
    return true;
  }

  /**
   * Returns the reminders due at `now` and records them as triggered for
   * the day, so a second poll in the same minute fires nothing.
   */
  async collectDue(now: Date): Promise<ReminderDocument[]> {
    const reminders = await this.list();
    const due = dueReminders(reminders, now);
    if (due.length === 0) return [];

    const today = localDateString(now);
    const dueIds = new Set(due.map(r => r.id));
    await saveReminders(
      this.store,
      reminders.map(r => (dueIds.has(r.id) ? { ...r, last_triggered: today } : r)),
    );
    return due;
  }
}

// --- Queries ---

/** Active, started, and either one-shot or repeating on this weekday. */
export function isScheduledOn(reminder: ReminderDocument, date: string): boolean {
  if (!reminder.active) return false;
  if (reminder.start_date && daysBetween(reminder.start_date, date) < 0) return false;
  return reminder.repeat_days.length === 0 || reminder.repeat_days.includes(weekdayOf(date));
}

export function dueReminders(reminders: ReminderDocument[], now: Date): ReminderDocument[] {
  const today = localDateString(now);
  const time = localTimeString(now);
  return reminders.filter(r =>
    isScheduledOn(r, today) && r.time === time && r.last_triggered !== today,
  );
}

export function todayReminders(reminders: ReminderDocument[], now: Date): ReminderDocument[] {
  const today = localDateString(now);
  return reminders
    .filter(r => isScheduledOn(r, today))
    .sort((a, b) => a.time.localeCompare(b.time));
}

export function upcomingToday(reminders: ReminderDocument[], now: Date): ReminderDocument[] {
  const time = localTimeString(now);
  return todayReminders(reminders, now).filter(r => r.time > time);
}

const WORKWEEK: Weekday[] = ["Mon", "Tue", "Wed", "Thu", "Fri"];
const WEEKEND: Weekday[] = ["Sat", "Sun"];

export function formatRepeatDays(days: Weekday[]): string {
  if (days.length === 0) return "Once";
  const unique = new Set(days);
  if (unique.size === 7) return "Daily";
  if (unique.size === 5 && WORKWEEK.every(d => unique.has(d))) return "Weekdays";
  if (unique.size === 2 && WEEKEND.every(d => unique.has(d))) return "Weekends";
  return WEEKDAYS.filter(d => unique.has(d)).join("/");
}

export function formatTimeUntil(time: string, now: Date): string {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time);
  if (!match) return "";
  const diff = Number(match[1]) * 60 + Number(match[2]) - (now.getHours() * 60 + now.getMinutes());

  if (diff <= 0) return "now";
  if (diff < 60) return `in ${diff} min`;
  const hours = Math.floor(diff / 60);
  const minutes = diff % 60;
  return minutes > 0 ? `in ${hours}h ${minutes}m` : `in ${hours}h`;
}
