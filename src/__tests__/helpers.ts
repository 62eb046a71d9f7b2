import type { DailyLog, Quest } from "../types.js";

export function makeQuest(overrides: Partial<Quest> = {}): Quest {
  return {
    id: "q1",
    title: "Stretch",
    cadence: "daily",
    energy_required: "Any",
    created: "2025-03-01",
    is_progressive: false,
    progress_current: 0,
    progress_target: 1,
    completed: false,
    completion_history: [],
    streak: 0,
    ...overrides,
  };
}

export function makeLog(completed: number, total: number, overrides: Partial<DailyLog> = {}): DailyLog {
  return { quests_total: total, quests_completed: completed, energy_entries: [], ...overrides };
}
