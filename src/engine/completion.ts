import { CADENCES, STREAK_MILESTONES } from "../constants.js";
import { daysBetween, previousDay } from "../dates.js";
import { emptyDailyLog } from "../documents.js";
import { clamp } from "../validation.js";
import type { DailyLog, Quest, QuestPartitions, StreakData } from "../types.js";

// Completion state machine for a single quest, keyed by (quest, date).
// Every function returns a new object and leaves its input untouched, so a
// failed save upstream never leaves a half-applied change in memory.

export interface ProgressResult {
  quest: Quest;
  newlyCompleted: boolean;
  newlyUncompleted: boolean;
}

export function isCompletedOnDate(quest: Quest, date: string): boolean {
  if (quest.completion_history.includes(date)) return true;
  // Records written before per-date history existed
  return quest.completed && quest.completed_date === date;
}

/** Length of the run of consecutive history dates ending at `end`. */
function runEndingAt(history: string[], end: string): number {
  const dates = new Set(history);
  let run = 0;
  let cursor = end;
  while (dates.has(cursor)) {
    run++;
    cursor = previousDay(cursor);
  }
  return run;
}

function insertDate(history: string[], date: string): string[] {
  return [...history, date].sort();
}

export function completeQuest(quest: Quest, date: string): Quest {
  if (isCompletedOnDate(quest, date)) return quest;

  const history = insertDate(quest.completion_history, date);
  const last = quest.completed_date;

  if (last && daysBetween(last, date) < 0) {
    // Backfilling an older date: the most recent completion stays the anchor
    return {
      ...quest,
      completion_history: history,
      streak: Math.max(quest.streak, runEndingAt(history, last)),
    };
  }

  let streak: number;
  if (last && last === previousDay(date)) {
    streak = quest.streak + 1;
  } else if (last !== date) {
    streak = 1;
  } else {
    streak = quest.streak;
  }

  return {
    ...quest,
    completion_history: history,
    streak,
    completed: true,
    completed_date: date,
  };
}

/** Does not roll `streak` back; the next completion recomputes it. */
export function uncompleteQuest(quest: Quest, date: string): Quest {
  if (!isCompletedOnDate(quest, date)) return quest;

  const history = quest.completion_history.filter(d => d !== date);
  if (quest.completed_date !== date) {
    return { ...quest, completion_history: history };
  }
  const { completed_date: _cleared, ...rest } = quest;
  return { ...rest, completion_history: history, completed: false };
}

// --- Progressive quests ---

/** Lazy daily reset: progress counted on an earlier day reads as zero. */
export function reconcileProgress(quest: Quest, today: string): Quest {
  if (!quest.is_progressive) return quest;
  if (quest.progress_last_date === today || quest.progress_current === 0) return quest;
  return { ...quest, progress_current: 0 };
}

export function setProgress(quest: Quest, value: number, today: string): ProgressResult {
  if (!quest.is_progressive) {
    return { quest, newlyCompleted: false, newlyUncompleted: false };
  }

  const base = reconcileProgress(quest, today);
  const target = base.progress_target;
  const current = clamp(value, 0, target);
  const wasComplete = isCompletedOnDate(base, today);

  let updated: Quest = { ...base, progress_current: current, progress_last_date: today };
  let newlyCompleted = false;
  let newlyUncompleted = false;

  if (current >= target && !wasComplete) {
    updated = completeQuest(updated, today);
    newlyCompleted = true;
  } else if (current < target && current < base.progress_current && wasComplete) {
    // Only a drop un-completes; counting up on a quest ticked done keeps it done
    updated = uncompleteQuest(updated, today);
    newlyUncompleted = true;
  }

  return { quest: updated, newlyCompleted, newlyUncompleted };
}

export function incrementProgress(quest: Quest, today: string): ProgressResult {
  return setProgress(quest, reconcileProgress(quest, today).progress_current + 1, today);
}

export function decrementProgress(quest: Quest, today: string): ProgressResult {
  return setProgress(quest, reconcileProgress(quest, today).progress_current - 1, today);
}

// --- Skip ---

export function skipQuest(quest: Quest, date: string): Quest {
  return { ...quest, skipped_date: date };
}

export function unskipQuest(quest: Quest): Quest {
  if (quest.skipped_date === undefined) return quest;
  const { skipped_date: _cleared, ...rest } = quest;
  return rest;
}

export function isSkippedOn(quest: Quest, date: string): boolean {
  return quest.skipped_date === date;
}

/**
 * Brings a quest up to date with `today` without persisting anything:
 * stale progress reads as zero and a skip from an earlier day is dropped.
 */
export function reconcileWithToday(quest: Quest, today: string): Quest {
  const reconciled = reconcileProgress(quest, today);
  if (reconciled.skipped_date && daysBetween(reconciled.skipped_date, today) > 0) {
    return unskipQuest(reconciled);
  }
  return reconciled;
}

// --- Aggregates ---

/**
 * Full recompute of a day's totals over every quest in every partition.
 * Idempotent; the other fields of an existing log are carried over.
 */
export function recomputeDailyLog(quests: QuestPartitions, date: string, existing?: DailyLog): DailyLog {
  let total = 0;
  let completed = 0;
  for (const cadence of CADENCES) {
    for (const quest of quests[cadence]) {
      total++;
      if (isCompletedOnDate(quest, date)) completed++;
    }
  }
  return { ...(existing ?? emptyDailyLog()), quests_total: total, quests_completed: completed };
}

/** Advances the cross-quest streak at most once per calendar day. */
export function advanceGlobalStreak(streak: StreakData, date: string): StreakData {
  const last = streak.last_completed_date;
  if (last === date) return streak;
  if (last && daysBetween(last, date) < 0) return streak;

  const current = last === previousDay(date) ? streak.current + 1 : 1;
  return {
    current,
    longest: Math.max(streak.longest, current),
    last_completed_date: date,
  };
}

export function streakMilestone(streak: number): number | null {
  return STREAK_MILESTONES.includes(streak) ? streak : null;
}
