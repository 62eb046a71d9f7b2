import { z } from "zod";
import { BACKUP_VERSION, SNAPSHOT_KEEP_DEFAULT } from "./constants.js";
import type { Clock } from "./clock.js";
import {
  loadDailyLogs, loadQuests, loadReminders, loadSettings,
  normalizeDailyLogs, normalizeQuests, normalizeReminders, normalizeSettings,
  saveDailyLogs, saveQuests, saveReminders, saveSettings,
} from "./documents.js";
import type { Store } from "./store.js";
import type { DailyLogMap, QuestPartitions, ReminderDocument, UserSettings } from "./types.js";
import type { Validated } from "./validation.js";

export interface Backup {
  version: number;
  created_at: string;
  data: {
    settings: UserSettings;
    quests: QuestPartitions;
    logs: DailyLogMap;
    reminders: ReminderDocument[];
  };
}

export type BackupSection = "settings" | "quests" | "logs" | "reminders";

const backupSchema = z.object({
  version: z.number(),
  created_at: z.string().optional(),
  data: z.object({
    settings: z.object({
      energy_categories: z.array(z.string()).optional(),
      time_slots: z.array(z.string()).optional(),
    }).passthrough().optional(),
    quests: z.object({
      daily: z.array(z.unknown()).optional(),
      weekly: z.array(z.unknown()).optional(),
      monthly: z.array(z.unknown()).optional(),
    }).optional(),
    logs: z.record(z.string(), z.unknown()).optional(),
    reminders: z.array(z.unknown()).optional(),
  }),
});

type ParsedBackup = z.infer<typeof backupSchema>;

export async function createBackup(store: Store, clock: Clock): Promise<Backup> {
  return {
    version: BACKUP_VERSION,
    created_at: new Date(clock.now()).toISOString(),
    data: {
      settings: await loadSettings(store),
      quests: await loadQuests(store),
      logs: await loadDailyLogs(store),
      reminders: await loadReminders(store),
    },
  };
}

export function validateBackup(raw: unknown): Validated<ParsedBackup> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, error: "Invalid backup data" };
  }
  const parsed = backupSchema.safeParse(raw);
  if (!parsed.success) {
    const [section, ...rest] = parsed.error.issues[0].path;
    if (section === "version") return { ok: false, error: "Backup version not found or invalid" };
    if (rest.length === 0) return { ok: false, error: "No data found in backup" };
    return { ok: false, error: `Invalid ${rest.join(".")} format` };
  }
  if (parsed.data.version > BACKUP_VERSION) {
    return { ok: false, error: "Backup is from a newer version" };
  }
  return { ok: true, value: parsed.data };
}

/** Overwrites each section present in the backup; absent sections are kept. */
export async function restoreBackup(store: Store, raw: unknown): Promise<Validated<BackupSection[]>> {
  const result = validateBackup(raw);
  if (!result.ok) return result;

  const { data } = result.value;
  const restored: BackupSection[] = [];

  if (data.settings) {
    await saveSettings(store, normalizeSettings(data.settings));
    restored.push("settings");
  }
  if (data.quests) {
    await saveQuests(store, normalizeQuests(data.quests));
    restored.push("quests");
  }
  if (data.logs) {
    await saveDailyLogs(store, normalizeDailyLogs(data.logs));
    restored.push("logs");
  }
  if (data.reminders) {
    await saveReminders(store, normalizeReminders(data.reminders));
    restored.push("reminders");
  }

  return { ok: true, value: restored };
}

// --- Daily snapshots ---

const snapshotsSchema = z.array(z.object({
  date: z.string(),
  backup: z.unknown(),
}));

export type Snapshot = z.infer<typeof snapshotsSchema>[number];

export interface SnapshotResult {
  created: boolean;
  date: string;
  /** Dates dropped to stay within the retention limit, oldest first. */
  pruned: string[];
}

async function loadSnapshots(store: Store): Promise<Snapshot[]> {
  const parsed = snapshotsSchema.safeParse(await store.load("backup_snapshots") ?? []);
  return parsed.success ? parsed.data : [];
}

/**
 * Takes at most one snapshot per day and keeps the newest `keep` of them.
 * Snapshots live in their own collection, so restoring one leaves the rest.
 */
export async function autoBackup(
  store: Store,
  clock: Clock,
  keep: number = SNAPSHOT_KEEP_DEFAULT,
): Promise<SnapshotResult> {
  const date = clock.today();
  const snapshots = await loadSnapshots(store);
  if (snapshots.some(s => s.date === date)) return { created: false, date, pruned: [] };

  const all = [...snapshots, { date, backup: await createBackup(store, clock) }]
    .sort((a, b) => a.date.localeCompare(b.date));
  const excess = Math.max(0, all.length - Math.max(1, keep));
  await store.save("backup_snapshots", all.slice(excess));
  return { created: true, date, pruned: all.slice(0, excess).map(s => s.date) };
}

/** Snapshot dates, newest first. */
export async function listSnapshots(store: Store): Promise<string[]> {
  return (await loadSnapshots(store)).map(s => s.date).sort((a, b) => b.localeCompare(a));
}

export async function restoreSnapshot(store: Store, date: string): Promise<Validated<BackupSection[]>> {
  const snapshot = (await loadSnapshots(store)).find(s => s.date === date);
  if (!snapshot) return { ok: false, error: `No snapshot for ${date}` };
  return restoreBackup(store, snapshot.backup);
}
