// --- Quests ---

export type Cadence = "daily" | "weekly" | "monthly";

export interface Quest {
  id: string;
  title: string;
  cadence: Cadence;
  energy_required: string;
  time_slot?: string;
  category?: string;
  created: string;

  is_progressive: boolean;
  progress_current: number;
  progress_target: number;
  progress_unit?: string;
  progress_last_date?: string;

  // Legacy single-flag completion, kept as a projection of completion_history
  completed: boolean;
  completed_date?: string;

  completion_history: string[];
  streak: number;
  skipped_date?: string;
}

export type QuestPartitions = Record<Cadence, Quest[]>;

/** Fields a caller may supply when creating a quest. */
export interface NewQuest {
  title: string;
  energy_required?: string;
  time_slot?: string;
  category?: string;
  is_progressive?: boolean;
  progress_target?: number;
  progress_unit?: string;
}

export type QuestPatch = Partial<Omit<Quest, "id" | "cadence">>;

// --- Daily Logs ---

export interface EnergyEntry {
  hour: number;
  energy: string;
  time_slot: string;
}

export interface ReadingEntry {
  pages_read: number;
  time_spent: number;
  current_book?: string;
  sessions?: number;
  last_updated?: number;
}

export interface DailyLog {
  quests_total: number;
  quests_completed: number;
  energy_level?: string;
  energy_entries: EnergyEntry[];
  reflection?: string;
  reflection_time?: number;
  reading?: ReadingEntry;
}

/** Keyed by YYYY-MM-DD. */
export type DailyLogMap = Record<string, DailyLog>;

// --- User Settings ---

export interface StreakData {
  current: number;
  longest: number;
  last_completed_date?: string;
}

export interface UserSettings {
  energy_categories: string[];
  time_slots: string[];
  quest_categories: string[];
  today_energy?: string;
  today_date?: string;
  streak_data: StreakData;
  persistent_notes?: string;
}

// --- Reminders ---

export type Weekday = "Sun" | "Mon" | "Tue" | "Wed" | "Thu" | "Fri" | "Sat";

export interface ReminderDocument {
  id: string;
  title: string;
  time: string;
  repeat_days: Weekday[];
  start_date?: string;
  active: boolean;
  last_triggered?: string;
}

export interface NewReminder {
  title: string;
  time: string;
  repeat_days?: Weekday[];
  start_date?: string;
}

export type ReminderPatch = Partial<Omit<ReminderDocument, "id">>;
