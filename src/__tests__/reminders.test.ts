import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  ReminderRepository, dueReminders, formatRepeatDays, formatTimeUntil, isScheduledOn,
  todayReminders, upcomingToday,
} from "../reminders.js";
import { runReminderPoll } from "../cron/reminderPoll.js";
import { MemoryStore } from "../store.js";
import type { ReminderDocument } from "../types.js";

// Monday 2025-03-10, built in the host's zone like the poll does
const at = (hour: number, minute: number) => new Date(2025, 2, 10, hour, minute);

function reminder(overrides: Partial<ReminderDocument> = {}): ReminderDocument {
  return { id: "r1", title: "Water plants", time: "09:00", repeat_days: [], active: true, ...overrides };
}

describe("isScheduledOn", () => {
  it("fires one-off reminders on any day", () => {
    expect(isScheduledOn(reminder(), "2025-03-10")).toBe(true);
  });

  it("respects repeat days, start date and the active flag", () => {
    expect(isScheduledOn(reminder({ repeat_days: ["Mon"] }), "2025-03-10")).toBe(true);
    expect(isScheduledOn(reminder({ repeat_days: ["Tue"] }), "2025-03-10")).toBe(false);
    expect(isScheduledOn(reminder({ start_date: "2025-03-11" }), "2025-03-10")).toBe(false);
    expect(isScheduledOn(reminder({ active: false }), "2025-03-10")).toBe(false);
  });
});

describe("reminder queries", () => {
  const list = [
    reminder({ id: "late", time: "18:30" }),
    reminder({ id: "early", time: "07:15" }),
    reminder({ id: "now", time: "09:00" }),
    reminder({ id: "tuesday", time: "10:00", repeat_days: ["Tue"] }),
  ];

  it("finds reminders due this minute that have not fired today", () => {
    expect(dueReminders(list, at(9, 0)).map(r => r.id)).toEqual(["now"]);
    const fired = list.map(r => (r.id === "now" ? { ...r, last_triggered: "2025-03-10" } : r));
    expect(dueReminders(fired, at(9, 0))).toEqual([]);
  });

  it("lists today's reminders by time", () => {
    expect(todayReminders(list, at(9, 0)).map(r => r.id)).toEqual(["early", "now", "late"]);
  });

  it("lists only reminders still ahead", () => {
    expect(upcomingToday(list, at(9, 0)).map(r => r.id)).toEqual(["late"]);
  });
});

describe("formatting", () => {
  it("names common repeat patterns", () => {
    expect(formatRepeatDays([])).toBe("Once");
    expect(formatRepeatDays(["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"])).toBe("Daily");
    expect(formatRepeatDays(["Fri", "Mon", "Tue", "Wed", "Thu"])).toBe("Weekdays");
    expect(formatRepeatDays(["Sat", "Sun"])).toBe("Weekends");
    expect(formatRepeatDays(["Wed", "Mon"])).toBe("Mon/Wed");
  });

  it("describes the time until a reminder", () => {
    expect(formatTimeUntil("09:00", at(9, 0))).toBe("now");
    expect(formatTimeUntil("09:05", at(9, 0))).toBe("in 5 min");
    expect(formatTimeUntil("11:10", at(9, 0))).toBe("in 2h 10m");
    expect(formatTimeUntil("11:00", at(9, 0))).toBe("in 2h");
  });
});

describe("ReminderRepository", () => {
  let repo: ReminderRepository;

  beforeEach(() => {
    repo = new ReminderRepository(new MemoryStore());
  });

  it("adds, updates and deletes", async () => {
    const added = await repo.add({ title: "Stretch", time: "08:00", repeat_days: ["Mon"] });
    expect(added.active).toBe(true);

    const updated = await repo.update(added.id, { active: false });
    expect(updated?.active).toBe(false);

    expect(await repo.delete(added.id)).toBe(true);
    expect(await repo.list()).toEqual([]);
  });

  it("ignores unknown ids", async () => {
    expect(await repo.update("missing", { title: "x" })).toBeNull();
    expect(await repo.delete("missing")).toBe(false);
  });

  it("fires a due reminder once per day", async () => {
    await repo.add({ title: "Stretch", time: "09:00" });
    const delivered: string[] = [];
    const notify = (r: ReminderDocument) => {
      delivered.push(r.title);
    };

    expect((await runReminderPoll(repo, at(9, 0), notify)).fired).toHaveLength(1);
    expect((await runReminderPoll(repo, at(9, 0), notify)).fired).toHaveLength(0);
    expect(delivered).toEqual(["Stretch"]);
    expect((await repo.list())[0].last_triggered).toBe("2025-03-10");
  });

  it("keeps polling when one delivery fails", async () => {
    await repo.add({ title: "First", time: "09:00" });
    await repo.add({ title: "Second", time: "09:00" });
    const delivered: string[] = [];
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { fired } = await runReminderPoll(repo, at(9, 0), r => {
      if (r.title === "First") throw new Error("offline");
      delivered.push(r.title);
    });
    expect(fired).toHaveLength(2);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe('[cron] Reminder "First" failed to deliver:');
    spy.mockRestore();
    expect(delivered).toEqual(["Second"]);
  });
});
