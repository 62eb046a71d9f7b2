import { z } from "zod";
import {
  ANY_ENERGY, CADENCES, DEFAULT_ENERGY_CATEGORIES, DEFAULT_QUEST_CATEGORIES,
  DEFAULT_TIME_SLOTS, WEEKDAYS,
} from "./constants.js";
import type { Store } from "./store.js";
import type {
  Cadence, DailyLog, DailyLogMap, Quest, QuestPartitions, ReminderDocument,
  UserSettings, Weekday,
} from "./types.js";

// Stored documents carry no schema guarantees: older records lack fields,
// and the BSON layer may hand back null where undefined was written. Every
// loader below normalises through these schemas so engine code can rely on
// the shapes in types.ts.

const optionalString = z.string().nullish().transform(v => v ?? undefined).catch(undefined);
const optionalNumber = z.number().nullish().transform(v => v ?? undefined).catch(undefined);
const id = z.union([z.string(), z.number()]).transform(v => String(v));
const count = z.number().int().min(0).catch(0);

const questSchema = z.object({
  id,
  title: z.string().catch(""),
  energy_required: z.string().nullish().transform(v => v ?? ANY_ENERGY),
  time_slot: optionalString,
  category: optionalString,
  created: z.string().catch(""),
  is_progressive: z.boolean().catch(false),
  progress_current: count,
  progress_target: z.number().int().min(1).catch(1),
  progress_unit: optionalString,
  progress_last_date: optionalString,
  completed: z.boolean().catch(false),
  completed_date: optionalString,
  completion_history: z.array(z.string()).catch([]),
  streak: count,
  skipped_date: optionalString,
});

const energyEntrySchema = z.object({
  hour: z.number().int().min(0).max(23),
  energy: z.string(),
  time_slot: z.string().catch(""),
});

const dailyLogSchema = z.object({
  quests_total: count,
  quests_completed: count,
  energy_level: optionalString,
  energy_entries: z.array(energyEntrySchema).catch([]),
  reflection: optionalString,
  reflection_time: optionalNumber,
  reading: z.object({
    pages_read: count,
    time_spent: count,
    current_book: optionalString,
    sessions: optionalNumber,
    last_updated: optionalNumber,
  }).nullish().transform(v => v ?? undefined),
});

const nameList = (fallback: string[]) => z.array(z.string().min(1)).min(1).catch(fallback);

const settingsSchema = z.object({
  energy_categories: nameList(DEFAULT_ENERGY_CATEGORIES),
  time_slots: nameList(DEFAULT_TIME_SLOTS),
  quest_categories: nameList(DEFAULT_QUEST_CATEGORIES),
  today_energy: optionalString,
  today_date: optionalString,
  streak_data: z.object({
    current: count,
    longest: count,
    last_completed_date: optionalString,
  }).catch({ current: 0, longest: 0, last_completed_date: undefined }),
  persistent_notes: optionalString,
});

const reminderSchema = z.object({
  id,
  title: z.string().catch(""),
  time: z.string(),
  repeat_days: z.array(z.string()).catch([])
    .transform(days => days.filter((d): d is Weekday => WEEKDAYS.some(w => w === d))),
  start_date: optionalString,
  active: z.boolean().catch(true),
  last_triggered: optionalString,
});

function asRecord(raw: unknown): Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw)
    ? Object.fromEntries(Object.entries(raw))
    : {};
}

function asArray(raw: unknown): unknown[] {
  return Array.isArray(raw) ? raw : [];
}

function sortedUnique(dates: string[]): string[] {
  return [...new Set(dates)].sort();
}

// --- Normalisers ---

export function normalizeQuest(raw: unknown, cadence: Cadence): Quest | null {
  const parsed = questSchema.safeParse(raw);
  if (!parsed.success) return null;
  const quest = parsed.data;
  return {
    ...quest,
    cadence,
    progress_current: Math.min(quest.progress_current, quest.progress_target),
    completion_history: sortedUnique(quest.completion_history),
  };
}

export function normalizeQuests(raw: unknown): QuestPartitions {
  const doc = asRecord(raw);
  const partitions: QuestPartitions = { daily: [], weekly: [], monthly: [] };
  for (const cadence of CADENCES) {
    for (const item of asArray(doc[cadence])) {
      const quest = normalizeQuest(item, cadence);
      if (quest) partitions[cadence].push(quest);
      else console.error(`[quest-log] Dropping malformed ${cadence} quest record`);
    }
  }
  return partitions;
}

export function emptyDailyLog(): DailyLog {
  return { quests_total: 0, quests_completed: 0, energy_entries: [] };
}

export function normalizeDailyLogs(raw: unknown): DailyLogMap {
  const logs: DailyLogMap = {};
  for (const [date, entry] of Object.entries(asRecord(raw))) {
    const parsed = dailyLogSchema.safeParse(entry ?? {});
    logs[date] = parsed.success ? parsed.data : emptyDailyLog();
  }
  return logs;
}

export function normalizeSettings(raw: unknown): UserSettings {
  return settingsSchema.parse(asRecord(raw));
}

export function normalizeReminders(raw: unknown): ReminderDocument[] {
  const reminders: ReminderDocument[] = [];
  for (const item of asArray(raw)) {
    const parsed = reminderSchema.safeParse(item);
    if (parsed.success) reminders.push(parsed.data);
  }
  return reminders;
}

// --- Load / save per collection ---

export async function loadQuests(store: Store): Promise<QuestPartitions> {
  return normalizeQuests(await store.load("quests"));
}

export async function saveQuests(store: Store, quests: QuestPartitions): Promise<void> {
  // cadence is implied by the partition and not stored on the record
  const doc: Record<Cadence, Omit<Quest, "cadence">[]> = { daily: [], weekly: [], monthly: [] };
  for (const cadence of CADENCES) {
    doc[cadence] = quests[cadence].map(({ cadence: _cadence, ...rest }) => rest);
  }
  await store.save("quests", doc);
}

export async function loadDailyLogs(store: Store): Promise<DailyLogMap> {
  return normalizeDailyLogs(await store.load("daily_logs"));
}

export async function saveDailyLogs(store: Store, logs: DailyLogMap): Promise<void> {
  await store.save("daily_logs", logs);
}

export async function loadSettings(store: Store): Promise<UserSettings> {
  return normalizeSettings(await store.load("user_settings"));
}

export async function saveSettings(store: Store, settings: UserSettings): Promise<void> {
  await store.save("user_settings", settings);
}

export async function loadReminders(store: Store): Promise<ReminderDocument[]> {
  return normalizeReminders(await store.load("reminders"));
}

export async function saveReminders(store: Store, reminders: ReminderDocument[]): Promise<void> {
  await store.save("reminders", reminders);
}
