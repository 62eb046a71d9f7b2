import {
  ENERGY_INSIGHT_GAP, GREAT_WEEK_RATE, HEATMAP_DEFAULT_WEEKS, HEATMAP_MAX_WEEKS,
  MISSED_QUESTS_WARNING, READING_INSIGHT_GAP, READING_INSIGHT_MIN_DAYS,
  READING_INSIGHT_WINDOW_DAYS,
} from "../constants.js";
import { trailingDates, weekdayOf } from "../dates.js";
import type { DailyLog, DailyLogMap, UserSettings, Weekday } from "../types.js";
import { hourToTimeSlot } from "./timeSlots.js";

// Read-only aggregation over daily logs. Nothing here mutates its inputs.

function completionRatio(log: DailyLog): number {
  return log.quests_total > 0 ? log.quests_completed / log.quests_total : 0;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? Math.floor((part * 100) / whole) : 0;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((s, v) => s + v, 0) / values.length : 0;
}

// --- Heatmap ---

export type HeatLevel = "none" | "low" | "mid" | "high";

export interface HeatThresholds {
  t1: number;
  t2: number;
  t3: number;
}

export interface HeatmapDay {
  date: string;
  weekday: Weekday;
  count: number;
  level: HeatLevel;
}

export interface Heatmap {
  weeks: HeatmapDay[][];
  max_completions: number;
  thresholds: HeatThresholds;
}

export function heatThresholds(maxCompletions: number): HeatThresholds {
  if (maxCompletions <= 0) return { t1: 1, t2: 1, t3: 1 };
  if (maxCompletions <= 4) return { t1: 1, t2: 2, t3: 3 };
  return {
    t1: Math.ceil(maxCompletions / 4),
    t2: Math.ceil(maxCompletions / 2),
    t3: Math.ceil((3 * maxCompletions) / 4),
  };
}

export function heatLevel(count: number, thresholds: HeatThresholds): HeatLevel {
  if (count <= 0) return "none";
  if (count <= thresholds.t1) return "low";
  if (count <= thresholds.t2) return "mid";
  return "high";
}

function clampWeeks(weeks: number): number {
  return Math.max(1, Math.min(HEATMAP_MAX_WEEKS, Math.floor(weeks)));
}

/** Trailing 7-day buckets ending today, oldest bucket first. */
export function buildHeatmap(logs: DailyLogMap, today: string, weeks: number = HEATMAP_DEFAULT_WEEKS): Heatmap {
  const dates = trailingDates(today, clampWeeks(weeks) * 7);
  const counts = dates.map(date => logs[date]?.quests_completed ?? 0);
  const maxCompletions = Math.max(0, ...counts);
  const thresholds = heatThresholds(maxCompletions);

  const result: HeatmapDay[][] = [];
  dates.forEach((date, i) => {
    if (i % 7 === 0) result.push([]);
    result[result.length - 1].push({
      date,
      weekday: weekdayOf(date),
      count: counts[i],
      level: heatLevel(counts[i], thresholds),
    });
  });

  return { weeks: result, max_completions: maxCompletions, thresholds };
}

export interface HeatmapStats {
  total_completions: number;
  days_with_activity: number;
  total_days: number;
  current_streak: number;
  longest_streak: number;
  average_per_active_day: number;
}

export function heatmapStats(logs: DailyLogMap, today: string, weeks: number = HEATMAP_DEFAULT_WEEKS): HeatmapStats {
  const dates = trailingDates(today, clampWeeks(weeks) * 7);
  let total = 0;
  let active = 0;
  let run = 0;
  let longest = 0;

  for (const date of dates) {
    const count = logs[date]?.quests_completed ?? 0;
    total += count;
    if (count > 0) {
      active++;
      run++;
      longest = Math.max(longest, run);
    } else {
      run = 0;
    }
  }

  let current = 0;
  for (let i = dates.length - 1; i >= 0; i--) {
    if ((logs[dates[i]]?.quests_completed ?? 0) > 0) current++;
    else break;
  }

  return {
    total_completions: total,
    days_with_activity: active,
    total_days: dates.length,
    current_streak: current,
    longest_streak: longest,
    average_per_active_day: active > 0 ? Math.floor(total / active) : 0,
  };
}

// --- Weekly review ---

export interface BestDay {
  date: string;
  weekday: Weekday;
  completed: number;
  total: number;
}

export interface WeeklyStats {
  completed: number;
  total: number;
  completion_rate: number;
  missed: number;
  best_day: BestDay | null;
}

export function weeklyStats(logs: DailyLogMap, today: string): WeeklyStats {
  let completed = 0;
  let total = 0;
  let best: BestDay | null = null;
  let bestRate = 0;

  for (const date of trailingDates(today, 7)) {
    const log = logs[date];
    if (!log) continue;
    completed += log.quests_completed;
    total += log.quests_total;

    if (log.quests_total > 0) {
      const rate = completionRatio(log);
      const bestCompleted = best?.completed ?? 0;
      if (rate > bestRate || (rate === bestRate && log.quests_completed > bestCompleted)) {
        bestRate = rate;
        best = { date, weekday: weekdayOf(date), completed: log.quests_completed, total: log.quests_total };
      }
    }
  }

  return {
    completed,
    total,
    completion_rate: percent(completed, total),
    missed: total - completed,
    best_day: best,
  };
}

export type InsightKind = "energy_gap" | "great_week" | "reduce_load" | "reading";

export interface Insight {
  kind: InsightKind;
  message: string;
}

/**
 * First match wins: an energy gap between the highest and lowest
 * categories, then a great week, then a nudge to lighten the load.
 */
export function energyInsight(
  logs: DailyLogMap,
  settings: UserSettings,
  weekly: WeeklyStats,
  today: string,
): Insight | null {
  const categories = settings.energy_categories;
  const high = categories[0];
  const low = categories[categories.length - 1];

  const highRates: number[] = [];
  const lowRates: number[] = [];
  for (const date of trailingDates(today, 7)) {
    const log = logs[date];
    if (!log) continue;
    if (log.energy_level === high) highRates.push(completionRatio(log));
    else if (log.energy_level === low) lowRates.push(completionRatio(log));
  }

  const highMean = mean(highRates);
  const lowMean = mean(lowRates);
  if (highMean > lowMean + ENERGY_INSIGHT_GAP) {
    const gap = Math.floor((highMean - lowMean) * 100);
    return { kind: "energy_gap", message: `You complete ${gap}% more on ${high} days.` };
  }

  if (weekly.completion_rate >= GREAT_WEEK_RATE) {
    return { kind: "great_week", message: "Great week! You're hitting your goals consistently." };
  }

  if (weekly.missed > MISSED_QUESTS_WARNING) {
    return { kind: "reduce_load", message: "Consider reducing quest count or breaking tasks smaller." };
  }

  return null;
}

/** Suppressed unless both reading and non-reading days have enough samples. */
export function readingInsight(logs: DailyLogMap, today: string): Insight | null {
  const readingRates: number[] = [];
  const otherRates: number[] = [];

  for (const date of trailingDates(today, READING_INSIGHT_WINDOW_DAYS)) {
    const log = logs[date];
    if (!log) continue;
    if ((log.reading?.pages_read ?? 0) > 0) readingRates.push(completionRatio(log));
    else otherRates.push(completionRatio(log));
  }

  if (readingRates.length < READING_INSIGHT_MIN_DAYS || otherRates.length < READING_INSIGHT_MIN_DAYS) {
    return null;
  }

  const readingMean = mean(readingRates);
  const otherMean = mean(otherRates);
  if (readingMean > otherMean + READING_INSIGHT_GAP) {
    const gap = Math.floor((readingMean - otherMean) * 100);
    return { kind: "reading", message: `Days with reading show ${gap}% higher completion.` };
  }
  return null;
}

// --- Mood ---

export interface MoodDay {
  date: string;
  weekday: Weekday;
  energy_level: string | null;
  /** Energy per configured time slot; null where nothing was recorded. */
  slots: Record<string, string | null>;
}

export interface MoodSeries {
  categories: string[];
  /** 10 for the highest category, stepping down evenly. */
  scores: Record<string, number>;
  days: MoodDay[];
}

export function energyScores(categories: string[]): Record<string, number> {
  const n = categories.length;
  const scores: Record<string, number> = {};
  categories.forEach((name, i) => {
    scores[name] = Math.floor(((n - i) * 10) / n);
  });
  return scores;
}

export function moodSeries(logs: DailyLogMap, settings: UserSettings, today: string): MoodSeries {
  const slotNames = settings.time_slots;

  const days = trailingDates(today, 7).map((date): MoodDay => {
    const log = logs[date];
    const slots: Record<string, string | null> = {};
    for (const name of slotNames) slots[name] = null;

    const entries = log?.energy_entries ?? [];
    if (entries.length > 0) {
      for (const entry of entries) {
        const slot = slotNames.includes(entry.time_slot)
          ? entry.time_slot
          : hourToTimeSlot(entry.hour, slotNames);
        slots[slot] = entry.energy;
      }
    } else if (log?.energy_level) {
      for (const name of slotNames) slots[name] = log.energy_level;
    }

    return { date, weekday: weekdayOf(date), energy_level: log?.energy_level ?? null, slots };
  });

  return { categories: settings.energy_categories, scores: energyScores(settings.energy_categories), days };
}

// --- Summaries ---

export interface MonthlySummary {
  month: string;
  days_logged: number;
  quests_completed: number;
  quests_assigned: number;
  completion_rate: number;
  reading_pages: number;
  reading_hours: number;
}

export function monthlySummary(logs: DailyLogMap, today: string): MonthlySummary {
  const month = today.slice(0, 7);
  let days = 0;
  let completed = 0;
  let assigned = 0;
  let pages = 0;
  let seconds = 0;

  for (const [date, log] of Object.entries(logs)) {
    if (!date.startsWith(`${month}-`)) continue;
    days++;
    completed += log.quests_completed;
    assigned += log.quests_total;
    pages += log.reading?.pages_read ?? 0;
    seconds += log.reading?.time_spent ?? 0;
  }

  return {
    month,
    days_logged: days,
    quests_completed: completed,
    quests_assigned: assigned,
    completion_rate: percent(completed, assigned),
    reading_pages: pages,
    reading_hours: Math.floor(seconds / 3600),
  };
}

export interface ReadingDay {
  date: string;
  weekday: Weekday;
  pages: number;
  time: number;
}

export interface ReadingWeeklyStats {
  total_pages: number;
  total_time: number;
  days_read: number;
  average_pages_per_day: number;
  daily: ReadingDay[];
}

export function readingWeeklyStats(logs: DailyLogMap, today: string): ReadingWeeklyStats {
  const daily = trailingDates(today, 7).map((date): ReadingDay => ({
    date,
    weekday: weekdayOf(date),
    pages: logs[date]?.reading?.pages_read ?? 0,
    time: logs[date]?.reading?.time_spent ?? 0,
  }));
  const totalPages = daily.reduce((s, d) => s + d.pages, 0);
  const daysRead = daily.filter(d => d.pages > 0).length;

  return {
    total_pages: totalPages,
    total_time: daily.reduce((s, d) => s + d.time, 0),
    days_read: daysRead,
    average_pages_per_day: daysRead > 0 ? Math.floor(totalPages / daysRead) : 0,
    daily,
  };
}
