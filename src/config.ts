import { HEATMAP_DEFAULT_WEEKS, HEATMAP_MAX_WEEKS, SNAPSHOT_KEEP_DEFAULT } from "./constants.js";

export type StoreKind = "mongo" | "memory";

export interface Config {
  mongoUri: string;
  store: StoreKind;
  reminderSchedule: string;
  heatmapWeeks: number;
  snapshotSchedule: string;
  snapshotKeep: number;
}

type Env = Record<string, string | undefined>;

function parseStoreKind(value: string | undefined): StoreKind {
  if (!value || value === "mongo") return "mongo";
  if (value === "memory") return "memory";
  throw new Error(`QUEST_LOG_STORE must be "mongo" or "memory", got "${value}"`);
}

function parseWeeks(value: string | undefined): number {
  const weeks = parseInt(value || String(HEATMAP_DEFAULT_WEEKS), 10);
  if (Number.isNaN(weeks) || weeks < 1) return HEATMAP_DEFAULT_WEEKS;
  return Math.min(weeks, HEATMAP_MAX_WEEKS);
}

function parseKeep(value: string | undefined): number {
  const keep = parseInt(value || String(SNAPSHOT_KEEP_DEFAULT), 10);
  return Number.isNaN(keep) || keep < 1 ? SNAPSHOT_KEEP_DEFAULT : keep;
}

/** Reads settings from the environment, falling back to defaults. */
export function loadConfig(env: Env = process.env): Config {
  return {
    mongoUri: env.MONGO_URI || "mongodb://mongodb:27017/questlog",
    store: parseStoreKind(env.QUEST_LOG_STORE),
    reminderSchedule: env.REMINDER_SCHEDULE || "* * * * *",
    heatmapWeeks: parseWeeks(env.HEATMAP_WEEKS),
    snapshotSchedule: env.SNAPSHOT_SCHEDULE || "0 3 * * *",
    snapshotKeep: parseKeep(env.SNAPSHOT_KEEP),
  };
}
