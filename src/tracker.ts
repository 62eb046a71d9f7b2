import type { Clock } from "./clock.js";
import { daysBetween } from "./dates.js";
import { ANY_ENERGY, HEATMAP_DEFAULT_WEEKS, MAX_REFLECTION_LENGTH } from "./constants.js";
import {
  emptyDailyLog, loadDailyLogs, loadSettings, saveDailyLogs, saveSettings,
} from "./documents.js";
import {
  buildHeatmap, energyInsight, heatmapStats, monthlySummary, moodSeries,
  readingInsight, readingWeeklyStats, weeklyStats,
} from "./engine/analytics.js";
import type {
  Heatmap, HeatmapStats, Insight, MonthlySummary, MoodSeries, ReadingWeeklyStats, WeeklyStats,
} from "./engine/analytics.js";
import {
  advanceGlobalStreak, completeQuest, decrementProgress, incrementProgress,
  isCompletedOnDate, reconcileWithToday, recomputeDailyLog, setProgress,
  skipQuest, streakMilestone, uncompleteQuest, unskipQuest,
} from "./engine/completion.js";
import type { ProgressResult } from "./engine/completion.js";
import { filterByEnergy } from "./engine/energyFilter.js";
import { hourToTimeSlot } from "./engine/timeSlots.js";
import { QuestRepository, findInPartitions, replaceInPartitions } from "./questRepository.js";
import type { FoundQuest } from "./questRepository.js";
import { ReminderRepository, todayReminders, upcomingToday } from "./reminders.js";
import type { Store } from "./store.js";
import type {
  Cadence, DailyLog, NewQuest, NewReminder, Quest, QuestPartitions, QuestPatch, ReadingEntry,
  ReminderDocument, ReminderPatch, StreakData, UserSettings,
} from "./types.js";
import {
  InvalidInputError, required, sanitizeTextInput, validateDate, validateProgressValue, validateTime,
  validateTitle,
} from "./validation.js";

export interface CompletionOutcome {
  quest: Quest;
  /** False when the call was a no-op (already in the requested state). */
  changed: boolean;
  milestone: number | null;
  global_streak: StreakData;
}

export interface ProgressOutcome extends ProgressResult {
  milestone: number | null;
}

export interface CheckInResult {
  energy: string;
  hour: number;
  time_slot: string;
  entries_today: number;
}

export interface VisibleQuests {
  date: string;
  energy: string | undefined;
  pending: Quest[];
  done: Quest[];
}

export interface WeeklyReview {
  stats: WeeklyStats;
  insight: Insight | null;
  reading_insight: Insight | null;
  mood: MoodSeries;
}

export interface Reflection {
  date: string;
  text: string;
}

export interface ReminderAgenda {
  today: ReminderDocument[];
  upcoming: ReminderDocument[];
}

export type SettingsPatch = Partial<Pick<UserSettings, "energy_categories" | "time_slots" | "quest_categories">>;

/**
 * One user's quest log. Every mutation loads the documents it touches,
 * reconciles quests with the current date, runs the engine and saves.
 * Store failures propagate unchanged; nothing is retried.
 */
export class QuestTracker {
  readonly quests: QuestRepository;
  readonly reminders: ReminderRepository;

  constructor(
    private readonly store: Store,
    readonly clock: Clock,
  ) {
    this.quests = new QuestRepository(store, () => clock.today());
    this.reminders = new ReminderRepository(store);
  }

  /** Defaults to today; only skips and views may name a later date. */
  private resolveDate(date: string | undefined, allowFuture: boolean = false): string {
    if (date === undefined) return this.clock.today();
    const day = required(validateDate(date));
    if (!allowFuture && daysBetween(this.clock.today(), day) > 0) {
      throw new InvalidInputError(`Cannot record ${day}: it is in the future`);
    }
    return day;
  }

  // --- Quests ---

  async listQuests(): Promise<QuestPartitions> {
    const today = this.clock.today();
    const quests = await this.quests.listAll();
    return {
      daily: quests.daily.map(q => reconcileWithToday(q, today)),
      weekly: quests.weekly.map(q => reconcileWithToday(q, today)),
      monthly: quests.monthly.map(q => reconcileWithToday(q, today)),
    };
  }

  async getQuest(id: string): Promise<FoundQuest | null> {
    return findInPartitions(await this.listQuests(), id);
  }

  async addQuest(cadence: Cadence, input: NewQuest): Promise<Quest> {
    const settings = await loadSettings(this.store);
    const title = required(validateTitle(input.title));
    this.checkEnergy(settings, input.energy_required);
    this.checkTimeSlot(settings, input.time_slot);
    if (input.is_progressive && input.progress_target !== undefined && input.progress_target < 1) {
      throw new InvalidInputError("Progress target must be at least 1");
    }
    return this.quests.add(cadence, { ...input, title });
  }

  async updateQuest(id: string, patch: QuestPatch): Promise<Quest | null> {
    const found = await this.quests.findById(id);
    if (!found) return null;

    const settings = await loadSettings(this.store);
    const cleaned: QuestPatch = { ...patch };
    if (patch.title !== undefined) cleaned.title = required(validateTitle(patch.title));
    this.checkEnergy(settings, patch.energy_required);
    this.checkTimeSlot(settings, patch.time_slot);
    if (patch.progress_target !== undefined) {
      if (patch.progress_target < 1) throw new InvalidInputError("Progress target must be at least 1");
      cleaned.progress_current = Math.min(found.quest.progress_current, patch.progress_target);
    }
    const updated = await this.quests.update(found.cadence, id, cleaned);
    if (!updated || !updated.is_progressive || patch.progress_target === undefined) return updated;

    // A new target may meet today's count; settle completion the way a progress step does
    const settled = await this.applyProgress(id, (quest, today) => setProgress(quest, quest.progress_current, today));
    return settled ? settled.quest : updated;
  }

  async deleteQuest(id: string): Promise<boolean> {
    const found = await this.quests.findById(id);
    if (!found) return false;
    return this.quests.delete(found.cadence, id);
  }

  async moveQuest(id: string, to: Cadence): Promise<Quest | null> {
    return this.quests.move(id, to);
  }

  private checkEnergy(settings: UserSettings, energy: string | undefined): void {
    if (energy === undefined || energy === ANY_ENERGY) return;
    if (!settings.energy_categories.includes(energy)) {
      throw new InvalidInputError(
        `Unknown energy level "${energy}". Use one of: ${[...settings.energy_categories, ANY_ENERGY].join(", ")}`,
      );
    }
  }

  private checkTimeSlot(settings: UserSettings, slot: string | undefined): void {
    if (slot === undefined) return;
    if (!settings.time_slots.includes(slot)) {
      throw new InvalidInputError(`Unknown time slot "${slot}". Use one of: ${settings.time_slots.join(", ")}`);
    }
  }

  // --- Completion ---

  /** Loads, reconciles and transforms one quest; null when the id is unknown. */
  private async withQuest<T extends { quest: Quest }>(
    id: string,
    apply: (quest: Quest, today: string) => T,
  ): Promise<{ result: T; quests: QuestPartitions; changed: boolean } | null> {
    const today = this.clock.today();
    const all = await this.quests.listAll();
    const found = findInPartitions(all, id);
    if (!found) return null;

    const result = apply(reconcileWithToday(found.quest, today), today);
    const changed = result.quest !== found.quest;
    const quests = changed ? replaceInPartitions(all, result.quest) : all;
    if (changed) await this.quests.saveAll(quests);
    return { result, quests, changed };
  }

  /** Recomputes the day's log and advances the global streak. */
  private async recordCompletion(quests: QuestPartitions, date: string): Promise<StreakData> {
    await this.recomputeLog(quests, date);
    const settings = await loadSettings(this.store);
    const next = advanceGlobalStreak(settings.streak_data, date);
    if (next !== settings.streak_data) {
      await saveSettings(this.store, { ...settings, streak_data: next });
    }
    return next;
  }

  private async recomputeLog(quests: QuestPartitions, date: string): Promise<DailyLog> {
    const logs = await loadDailyLogs(this.store);
    const log = recomputeDailyLog(quests, date, logs[date]);
    await saveDailyLogs(this.store, { ...logs, [date]: log });
    return log;
  }

  async complete(id: string, date?: string): Promise<CompletionOutcome | null> {
    const day = this.resolveDate(date);
    const outcome = await this.withQuest(id, quest => {
      const updated = completeQuest(quest, day);
      return { quest: updated, newly: updated !== quest };
    });
    if (!outcome) return null;

    const { result, quests } = outcome;
    if (!result.newly) {
      const settings = await loadSettings(this.store);
      return { quest: result.quest, changed: false, milestone: null, global_streak: settings.streak_data };
    }
    const globalStreak = await this.recordCompletion(quests, day);
    return {
      quest: result.quest,
      changed: true,
      milestone: streakMilestone(result.quest.streak),
      global_streak: globalStreak,
    };
  }

  async uncomplete(id: string, date?: string): Promise<{ quest: Quest; changed: boolean } | null> {
    const day = this.resolveDate(date);
    const outcome = await this.withQuest(id, quest => {
      const updated = uncompleteQuest(quest, day);
      return { quest: updated, newly: updated !== quest };
    });
    if (!outcome) return null;

    if (outcome.result.newly) await this.recomputeLog(outcome.quests, day);
    return { quest: outcome.result.quest, changed: outcome.result.newly };
  }

  private async applyProgress(
    id: string,
    step: (quest: Quest, today: string) => ProgressResult,
  ): Promise<ProgressOutcome | null> {
    const outcome = await this.withQuest(id, (quest, today) => {
      if (!quest.is_progressive) {
        throw new InvalidInputError(`"${quest.title}" is not a progressive quest`);
      }
      return step(quest, today);
    });
    if (!outcome) return null;

    const { result, quests } = outcome;
    const today = this.clock.today();
    if (result.newlyCompleted) await this.recordCompletion(quests, today);
    else if (result.newlyUncompleted) await this.recomputeLog(quests, today);
    return {
      ...result,
      milestone: result.newlyCompleted ? streakMilestone(result.quest.streak) : null,
    };
  }

  async increment(id: string): Promise<ProgressOutcome | null> {
    return this.applyProgress(id, incrementProgress);
  }

  async decrement(id: string): Promise<ProgressOutcome | null> {
    return this.applyProgress(id, decrementProgress);
  }

  async setProgress(id: string, value: number): Promise<ProgressOutcome | null> {
    const checked = required(validateProgressValue(value));
    return this.applyProgress(id, (quest, today) => setProgress(quest, checked, today));
  }

  async skip(id: string, date?: string): Promise<Quest | null> {
    const day = this.resolveDate(date, true);
    const outcome = await this.withQuest(id, quest => ({ quest: skipQuest(quest, day) }));
    return outcome ? outcome.result.quest : null;
  }

  async unskip(id: string): Promise<Quest | null> {
    const outcome = await this.withQuest(id, quest => ({ quest: unskipQuest(quest) }));
    return outcome ? outcome.result.quest : null;
  }

  // --- Energy ---

  /** The declared energy, if it was declared today. */
  async currentEnergy(): Promise<string | undefined> {
    const settings = await loadSettings(this.store);
    return settings.today_date === this.clock.today() ? settings.today_energy : undefined;
  }

  async visibleQuests(date?: string, cadence?: Cadence): Promise<VisibleQuests> {
    const day = this.resolveDate(date, true);
    const settings = await loadSettings(this.store);
    const energy = settings.today_date === this.clock.today() ? settings.today_energy : undefined;
    const quests = await this.listQuests();
    const pool = cadence ? quests[cadence] : [...quests.daily, ...quests.weekly, ...quests.monthly];
    const visible = filterByEnergy(pool, energy, day, settings.energy_categories);
    return {
      date: day,
      energy,
      pending: visible.filter(q => !isCompletedOnDate(q, day)),
      done: visible.filter(q => isCompletedOnDate(q, day)),
    };
  }

  async checkIn(energy: string, hour?: number): Promise<CheckInResult> {
    const settings = await loadSettings(this.store);
    if (!settings.energy_categories.includes(energy)) {
      throw new InvalidInputError(
        `Unknown energy level "${energy}". Use one of: ${settings.energy_categories.join(", ")}`,
      );
    }
    const today = this.clock.today();
    const at = hour ?? this.clock.hour();
    if (!Number.isInteger(at) || at < 0 || at > 23) throw new InvalidInputError("Hour must be 00-23");
    const slot = hourToTimeSlot(at, settings.time_slots);

    await saveSettings(this.store, { ...settings, today_energy: energy, today_date: today });

    const logs = await loadDailyLogs(this.store);
    const log = logs[today] ?? emptyDailyLog();
    const entries = [...log.energy_entries, { hour: at, energy, time_slot: slot }];
    await saveDailyLogs(this.store, { ...logs, [today]: { ...log, energy_level: energy, energy_entries: entries } });

    return { energy, hour: at, time_slot: slot, entries_today: entries.length };
  }

  // --- Journal ---

  private async updateLog(date: string, change: (log: DailyLog) => DailyLog): Promise<DailyLog> {
    const logs = await loadDailyLogs(this.store);
    const updated = change(logs[date] ?? emptyDailyLog());
    await saveDailyLogs(this.store, { ...logs, [date]: updated });
    return updated;
  }

  async saveReflection(text: string): Promise<string> {
    const reflection = sanitizeTextInput(text, MAX_REFLECTION_LENGTH);
    if (!reflection) throw new InvalidInputError("Reflection cannot be empty");
    const today = this.clock.today();
    await this.updateLog(today, log => ({ ...log, reflection, reflection_time: this.clock.now() }));
    return today;
  }

  async pastReflections(limit: number = 5): Promise<Reflection[]> {
    const logs = await loadDailyLogs(this.store);
    const reflections: Reflection[] = [];
    for (const [date, log] of Object.entries(logs)) {
      if (log.reflection) reflections.push({ date, text: log.reflection });
    }
    return reflections.sort((a, b) => b.date.localeCompare(a.date)).slice(0, limit);
  }

  async logReading(reading: Omit<ReadingEntry, "last_updated">, date?: string): Promise<ReadingEntry> {
    if (reading.pages_read < 0 || reading.time_spent < 0) {
      throw new InvalidInputError("Pages and time cannot be negative");
    }
    const day = this.resolveDate(date);
    const entry: ReadingEntry = { ...reading, last_updated: this.clock.now() };
    await this.updateLog(day, log => ({ ...log, reading: entry }));
    return entry;
  }

  // --- Settings ---

  async settings(): Promise<UserSettings> {
    return loadSettings(this.store);
  }

  async updateSettings(patch: SettingsPatch): Promise<UserSettings> {
    const settings = await loadSettings(this.store);
    const next = { ...settings };
    for (const key of ["energy_categories", "time_slots", "quest_categories"] as const) {
      const list = patch[key];
      if (list === undefined) continue;
      const names = list.map(name => sanitizeTextInput(name, 40)).filter(Boolean);
      if (names.length === 0) throw new InvalidInputError(`${key} cannot be empty`);
      if (new Set(names).size !== names.length) throw new InvalidInputError(`${key} contains duplicates`);
      next[key] = names;
    }
    if (next.today_energy && !next.energy_categories.includes(next.today_energy)) {
      next.today_energy = undefined;
      next.today_date = undefined;
    }
    await saveSettings(this.store, next);
    return next;
  }

  async setPersistentNotes(text: string): Promise<void> {
    const settings = await loadSettings(this.store);
    await saveSettings(this.store, { ...settings, persistent_notes: sanitizeTextInput(text, MAX_REFLECTION_LENGTH) });
  }

  // --- Reminders ---

  async addReminder(input: NewReminder): Promise<ReminderDocument> {
    return this.reminders.add({
      ...input,
      title: required(validateTitle(input.title)),
      time: required(validateTime(input.time)),
      start_date: input.start_date === undefined ? undefined : required(validateDate(input.start_date)),
    });
  }

  async updateReminder(id: string, patch: ReminderPatch): Promise<ReminderDocument | null> {
    const cleaned: ReminderPatch = { ...patch };
    if (patch.title !== undefined) cleaned.title = required(validateTitle(patch.title));
    if (patch.time !== undefined) {
      cleaned.time = required(validateTime(patch.time));
      // A new time may fire again today
      cleaned.last_triggered = undefined;
    }
    if (patch.start_date !== undefined) cleaned.start_date = required(validateDate(patch.start_date));
    return this.reminders.update(id, cleaned);
  }

  async deleteReminder(id: string): Promise<boolean> {
    return this.reminders.delete(id);
  }

  async reminderAgenda(): Promise<ReminderAgenda> {
    const reminders = await this.reminders.list();
    const now = new Date(this.clock.now());
    return { today: todayReminders(reminders, now), upcoming: upcomingToday(reminders, now) };
  }

  // --- Analytics ---

  async heatmap(weeks: number = HEATMAP_DEFAULT_WEEKS): Promise<{ heatmap: Heatmap; stats: HeatmapStats }> {
    const logs = await loadDailyLogs(this.store);
    const today = this.clock.today();
    return { heatmap: buildHeatmap(logs, today, weeks), stats: heatmapStats(logs, today, weeks) };
  }

  async weeklyReview(): Promise<WeeklyReview> {
    const logs = await loadDailyLogs(this.store);
    const settings = await loadSettings(this.store);
    const today = this.clock.today();
    const stats = weeklyStats(logs, today);
    return {
      stats,
      insight: energyInsight(logs, settings, stats, today),
      reading_insight: readingInsight(logs, today),
      mood: moodSeries(logs, settings, today),
    };
  }

  async monthlySummary(): Promise<MonthlySummary> {
    return monthlySummary(await loadDailyLogs(this.store), this.clock.today());
  }

  async readingStats(): Promise<ReadingWeeklyStats> {
    return readingWeeklyStats(await loadDailyLogs(this.store), this.clock.today());
  }
}
