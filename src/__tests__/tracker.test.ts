import { describe, it, expect, beforeEach } from "vitest";
import { fixedClock } from "../clock.js";
import type { FixedClock } from "../clock.js";
import { addDays } from "../dates.js";
import { loadDailyLogs } from "../documents.js";
import { MemoryStore } from "../store.js";
import { QuestTracker } from "../tracker.js";
import { InvalidInputError } from "../validation.js";

const TODAY = "2025-03-10";

describe("QuestTracker", () => {
  let store: MemoryStore;
  let clock: FixedClock;
  let tracker: QuestTracker;

  beforeEach(() => {
    store = new MemoryStore();
    clock = fixedClock(TODAY);
    tracker = new QuestTracker(store, clock);
  });

  describe("adding and editing quests", () => {
    it("rejects blank titles", async () => {
      await expect(tracker.addQuest("daily", { title: "  " })).rejects.toThrow(InvalidInputError);
    });

    it("rejects unknown energy levels and time slots", async () => {
      await expect(tracker.addQuest("daily", { title: "Run", energy_required: "Hyper" }))
        .rejects.toThrow('Unknown energy level "Hyper". Use one of: Energetic, Average, Down, Any');
      await expect(tracker.addQuest("daily", { title: "Run", time_slot: "Brunch" }))
        .rejects.toThrow('Unknown time slot "Brunch". Use one of: Morning, Afternoon, Evening, Night');
    });

    it("trims titles", async () => {
      const quest = await tracker.addQuest("daily", { title: "  Run  ", energy_required: "Energetic" });
      expect(quest.title).toBe("Run");
      expect(quest.energy_required).toBe("Energetic");
    });

    it("completes the quest when a shrunken target is already met", async () => {
      const quest = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.setProgress(quest.id, 6);
      const updated = await tracker.updateQuest(quest.id, { progress_target: 4 });
      expect(updated?.progress_target).toBe(4);
      expect(updated?.progress_current).toBe(4);
      expect(updated?.completed).toBe(true);
      expect(updated?.completion_history).toEqual([TODAY]);
      expect((await loadDailyLogs(store))[TODAY].quests_completed).toBe(1);
      expect((await tracker.settings()).streak_data.current).toBe(1);
    });

    it("keeps progress below a target that is still out of reach", async () => {
      const quest = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.setProgress(quest.id, 3);
      const updated = await tracker.updateQuest(quest.id, { progress_target: 5 });
      expect(updated?.progress_current).toBe(3);
      expect(updated?.completed).toBe(false);
      expect((await loadDailyLogs(store))[TODAY]).toBeUndefined();
    });

    it("returns null for unknown ids", async () => {
      expect(await tracker.updateQuest("missing", { title: "x" })).toBeNull();
      expect(await tracker.deleteQuest("missing")).toBe(false);
      expect(await tracker.complete("missing")).toBeNull();
      expect(await tracker.increment("missing")).toBeNull();
    });
  });

  describe("completion", () => {
    it("updates the daily log and overall streak", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await tracker.addQuest("weekly", { title: "Call home" });

      const outcome = await tracker.complete(walk.id);
      expect(outcome?.changed).toBe(true);
      expect(outcome?.quest.streak).toBe(1);
      expect(outcome?.global_streak).toEqual({ current: 1, longest: 1, last_completed_date: TODAY });

      const logs = await loadDailyLogs(store);
      expect(logs[TODAY]).toMatchObject({ quests_total: 2, quests_completed: 1 });
    });

    it("reports a repeat completion as unchanged", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await tracker.complete(walk.id);
      const writes = store.writes.get("quests");
      const again = await tracker.complete(walk.id);
      expect(again?.changed).toBe(false);
      expect(again?.quest.completion_history).toEqual([TODAY]);
      expect(store.writes.get("quests")).toBe(writes);
    });

    it("celebrates a seven-day streak", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      let milestone: number | null = null;
      for (let i = 0; i < 7; i++) {
        clock.set(addDays(TODAY, i));
        const outcome = await tracker.complete(walk.id);
        milestone = outcome?.milestone ?? null;
      }
      expect(milestone).toBe(7);
      expect((await tracker.settings()).streak_data.current).toBe(7);
    });

    it("backfills an earlier date", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await tracker.complete(walk.id, "2025-03-08");
      const logs = await loadDailyLogs(store);
      expect(logs["2025-03-08"]).toMatchObject({ quests_total: 1, quests_completed: 1 });
      expect(logs[TODAY]).toBeUndefined();
    });

    it("rejects malformed dates", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await expect(tracker.complete(walk.id, "10/03/2025")).rejects.toThrow("Please enter date in YYYY-MM-DD format");
    });

    it("refuses to record a future date", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await expect(tracker.complete(walk.id, "2025-03-11")).rejects.toThrow("Cannot record 2025-03-11: it is in the future");
      await expect(tracker.uncomplete(walk.id, "2025-12-31")).rejects.toThrow(InvalidInputError);
      await expect(tracker.logReading({ pages_read: 5, time_spent: 60 }, "2025-03-11"))
        .rejects.toThrow(InvalidInputError);
      expect((await tracker.getQuest(walk.id))?.quest.completion_history).toEqual([]);
      expect(await loadDailyLogs(store)).toEqual({});
    });

    it("keeps counting the overall streak after a future date is refused", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      const read = await tracker.addQuest("daily", { title: "Read" });
      await expect(tracker.complete(walk.id, "2025-12-31")).rejects.toThrow(InvalidInputError);

      await tracker.complete(read.id);
      clock.set("2025-03-11");
      await tracker.complete(read.id);
      clock.set("2025-03-12");
      const outcome = await tracker.complete(read.id);
      expect(outcome?.quest.streak).toBe(3);
      expect(outcome?.global_streak).toEqual({ current: 3, longest: 3, last_completed_date: "2025-03-12" });
    });

    it("allows skipping a later day", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      expect((await tracker.skip(walk.id, "2025-03-12"))?.skipped_date).toBe("2025-03-12");
    });

    it("uncompletes and recomputes the day", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await tracker.complete(walk.id);
      const outcome = await tracker.uncomplete(walk.id);
      expect(outcome?.changed).toBe(true);
      expect((await loadDailyLogs(store))[TODAY].quests_completed).toBe(0);
      expect((await tracker.uncomplete(walk.id))?.changed).toBe(false);
    });

    it("leaves stored quests untouched when the save fails", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      store.failNextSave = { name: "quests", error: new Error("disk full") };
      await expect(tracker.complete(walk.id)).rejects.toThrow("disk full");
      expect((await tracker.getQuest(walk.id))?.quest.completion_history).toEqual([]);
      expect((await loadDailyLogs(store))[TODAY]).toBeUndefined();
    });
  });

  describe("progressive quests", () => {
    it("completes at the target and counts the day", async () => {
      const read = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.setProgress(read.id, 9);
      expect((await loadDailyLogs(store))[TODAY]).toBeUndefined();

      const outcome = await tracker.increment(read.id);
      expect(outcome?.quest.progress_current).toBe(10);
      expect(outcome?.quest.completed).toBe(true);
      expect(outcome?.newlyCompleted).toBe(true);
      expect((await loadDailyLogs(store))[TODAY].quests_completed).toBe(1);
    });

    it("stays completed when counting up after a manual tick", async () => {
      const read = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.complete(read.id);

      const outcome = await tracker.increment(read.id);
      expect(outcome?.quest.progress_current).toBe(1);
      expect(outcome?.quest.completed).toBe(true);
      expect(outcome?.newlyUncompleted).toBe(false);
      expect((await loadDailyLogs(store))[TODAY].quests_completed).toBe(1);
    });

    it("uncompletes when progress drops below the target", async () => {
      const read = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.setProgress(read.id, 10);
      const outcome = await tracker.decrement(read.id);
      expect(outcome?.quest.completed).toBe(false);
      expect(outcome?.newlyUncompleted).toBe(true);
      expect((await loadDailyLogs(store))[TODAY].quests_completed).toBe(0);
    });

    it("resets progress on a new day", async () => {
      const read = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await tracker.setProgress(read.id, 3);
      clock.set("2025-03-11");
      expect((await tracker.getQuest(read.id))?.quest.progress_current).toBe(0);
      expect((await tracker.increment(read.id))?.quest.progress_current).toBe(1);
    });

    it("refuses progress on a single-tick quest", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      await expect(tracker.increment(walk.id)).rejects.toThrow('"Walk" is not a progressive quest');
    });

    it("validates set values", async () => {
      const read = await tracker.addQuest("daily", { title: "Read", is_progressive: true, progress_target: 10 });
      await expect(tracker.setProgress(read.id, -2)).rejects.toThrow("Progress cannot be negative");
    });
  });

  describe("visibility", () => {
    beforeEach(async () => {
      await tracker.addQuest("daily", { title: "Run", energy_required: "Energetic" });
      await tracker.addQuest("daily", { title: "Read", energy_required: "Average" });
      await tracker.addQuest("daily", { title: "Rest", energy_required: "Down" });
    });

    const titles = async () => (await tracker.visibleQuests()).pending.map(q => q.title);

    it("uses the middle energy until the user checks in", async () => {
      expect(await titles()).toEqual(["Read", "Rest"]);
    });

    it("follows today's check-in and forgets it tomorrow", async () => {
      await tracker.checkIn("Down");
      expect(await titles()).toEqual(["Rest"]);
      await tracker.checkIn("Energetic");
      expect(await titles()).toEqual(["Run", "Read", "Rest"]);

      clock.set("2025-03-11");
      expect(await tracker.currentEnergy()).toBeUndefined();
      expect(await titles()).toEqual(["Read", "Rest"]);
    });

    it("hides a skipped quest for the day only", async () => {
      const quests = await tracker.listQuests();
      const read = quests.daily[1];
      await tracker.skip(read.id);
      expect(await titles()).toEqual(["Rest"]);

      clock.set("2025-03-11");
      expect(await titles()).toEqual(["Read", "Rest"]);
    });

    it("splits pending and done", async () => {
      const rest = (await tracker.listQuests()).daily[2];
      await tracker.complete(rest.id);
      const visible = await tracker.visibleQuests();
      expect(visible.pending.map(q => q.title)).toEqual(["Read"]);
      expect(visible.done.map(q => q.title)).toEqual(["Rest"]);
    });
  });

  describe("check-ins and journal", () => {
    it("records energy with its time slot", async () => {
      const result = await tracker.checkIn("Average", 14);
      expect(result).toEqual({ energy: "Average", hour: 14, time_slot: "Afternoon", entries_today: 1 });

      const log = (await loadDailyLogs(store))[TODAY];
      expect(log.energy_level).toBe("Average");
      expect(log.energy_entries).toEqual([{ hour: 14, energy: "Average", time_slot: "Afternoon" }]);
    });

    it("uses the clock's hour by default", async () => {
      expect((await tracker.checkIn("Down")).time_slot).toBe("Morning");
    });

    it("rejects unknown energy", async () => {
      await expect(tracker.checkIn("Sleepy")).rejects.toThrow('Unknown energy level "Sleepy"');
    });

    it("keeps the latest reflections newest first", async () => {
      await tracker.saveReflection("First day");
      clock.set("2025-03-11");
      await tracker.saveReflection("  Second day  ");
      expect(await tracker.pastReflections()).toEqual([
        { date: "2025-03-11", text: "Second day" },
        { date: TODAY, text: "First day" },
      ]);
      await expect(tracker.saveReflection("   ")).rejects.toThrow("Reflection cannot be empty");
    });

    it("logs reading for the weekly stats", async () => {
      await tracker.logReading({ pages_read: 12, time_spent: 900, current_book: "Field Notes" });
      const stats = await tracker.readingStats();
      expect(stats.total_pages).toBe(12);
      expect(stats.days_read).toBe(1);
    });

    it("keeps persistent notes in settings", async () => {
      await tracker.setPersistentNotes("  Drink water  ");
      expect((await tracker.settings()).persistent_notes).toBe("Drink water");
    });
  });

  describe("settings", () => {
    it("replaces lists and clears today's energy when its category goes away", async () => {
      await tracker.checkIn("Down");
      const settings = await tracker.updateSettings({ energy_categories: ["High", "Low"] });
      expect(settings.energy_categories).toEqual(["High", "Low"]);
      expect(settings.today_energy).toBeUndefined();
    });

    it("rejects empty or duplicate lists", async () => {
      await expect(tracker.updateSettings({ time_slots: [" "] })).rejects.toThrow("time_slots cannot be empty");
      await expect(tracker.updateSettings({ quest_categories: ["Work", "Work"] }))
        .rejects.toThrow("quest_categories contains duplicates");
    });
  });

  describe("reminders", () => {
    it("validates and normalises the time", async () => {
      const reminder = await tracker.addReminder({ title: "Stretch", time: "7:30", repeat_days: ["Mon"] });
      expect(reminder.time).toBe("07:30");
      await expect(tracker.addReminder({ title: "Bad", time: "25:00" })).rejects.toThrow("Hour must be 00-23");
    });

    it("lets a rescheduled reminder fire again", async () => {
      const reminder = await tracker.addReminder({ title: "Stretch", time: "07:30" });
      await tracker.reminders.update(reminder.id, { last_triggered: TODAY });
      const updated = await tracker.updateReminder(reminder.id, { time: "18:00" });
      expect(updated?.last_triggered).toBeUndefined();
    });
  });

  describe("analytics", () => {
    it("builds a weekly review from the logs", async () => {
      const walk = await tracker.addQuest("daily", { title: "Walk" });
      for (let i = 0; i < 3; i++) {
        clock.set(addDays(TODAY, i));
        await tracker.complete(walk.id);
      }
      const review = await tracker.weeklyReview();
      expect(review.stats.completed).toBe(3);
      expect(review.stats.completion_rate).toBe(100);
      expect(review.insight?.kind).toBe("great_week");
      expect(review.reading_insight).toBeNull();

      const { heatmap, stats } = await tracker.heatmap(1);
      expect(heatmap.max_completions).toBe(1);
      expect(stats.current_streak).toBe(3);
    });
  });
});
