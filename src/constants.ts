import type { Cadence, Weekday } from "./types.js";

export const CADENCES: Cadence[] = ["daily", "weekly", "monthly"];

/** Sentinel energy requirement: the quest shows at every energy level. */
export const ANY_ENERGY = "Any";

// Index 0 is the highest-energy category
export const DEFAULT_ENERGY_CATEGORIES = ["Energetic", "Average", "Down"];

export const DEFAULT_TIME_SLOTS = ["Morning", "Afternoon", "Evening", "Night"];

export const DEFAULT_QUEST_CATEGORIES = ["Health", "Work", "Personal", "Learning"];

export const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const satisfies readonly Weekday[];

// Streak lengths that earn a celebration
export const STREAK_MILESTONES = [7, 14, 30, 60, 100, 365];

export const HEATMAP_DEFAULT_WEEKS = 12;

/** Heatmap lookups never read further back than this. */
export const HEATMAP_MAX_WEEKS = 13;

// Insight thresholds (fractions of a completion rate)
export const ENERGY_INSIGHT_GAP = 0.3;
export const READING_INSIGHT_GAP = 0.2;
export const READING_INSIGHT_WINDOW_DAYS = 14;
export const READING_INSIGHT_MIN_DAYS = 3;
export const GREAT_WEEK_RATE = 80;
export const MISSED_QUESTS_WARNING = 5;

export const MAX_TITLE_LENGTH = 200;
export const MAX_REFLECTION_LENGTH = 2000;

export const BACKUP_VERSION = 1;
/** Daily snapshots kept before the oldest is dropped. */
export const SNAPSHOT_KEEP_DEFAULT = 7;
