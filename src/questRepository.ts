import { randomUUID } from "node:crypto";
import { ANY_ENERGY, CADENCES } from "./constants.js";
import { loadQuests, saveQuests } from "./documents.js";
import type { Store } from "./store.js";
import type { Cadence, NewQuest, Quest, QuestPartitions, QuestPatch } from "./types.js";

export interface FoundQuest {
  quest: Quest;
  cadence: Cadence;
}

export function findInPartitions(quests: QuestPartitions, id: string): FoundQuest | null {
  for (const cadence of CADENCES) {
    const quest = quests[cadence].find(q => q.id === id);
    if (quest) return { quest, cadence };
  }
  return null;
}

/** Returns new partitions with the quest of the same id replaced. */
export function replaceInPartitions(quests: QuestPartitions, updated: Quest): QuestPartitions {
  return {
    ...quests,
    [updated.cadence]: quests[updated.cadence].map(q => (q.id === updated.id ? updated : q)),
  };
}

/**
 * CRUD over the quests collection. Updating or deleting an id that is not
 * in the partition is a no-op; repeated taps on a deleted quest are normal.
 */
export class QuestRepository {
  constructor(
    private readonly store: Store,
    private readonly today: () => string,
  ) {}

  async listAll(): Promise<QuestPartitions> {
    return loadQuests(this.store);
  }

  async findById(id: string): Promise<FoundQuest | null> {
    return findInPartitions(await this.listAll(), id);
  }

  async add(cadence: Cadence, input: NewQuest): Promise<Quest> {
    const quests = await this.listAll();
    const isProgressive = input.is_progressive ?? false;
    const quest: Quest = {
      id: randomUUID(),
      title: input.title,
      cadence,
      energy_required: input.energy_required ?? ANY_ENERGY,
      time_slot: input.time_slot,
      category: input.category,
      created: this.today(),
      is_progressive: isProgressive,
      progress_current: 0,
      progress_target: isProgressive ? Math.max(1, input.progress_target ?? 1) : 1,
      progress_unit: input.progress_unit,
      completed: false,
      completion_history: [],
      streak: 0,
    };
    await saveQuests(this.store, { ...quests, [cadence]: [...quests[cadence], quest] });
    return quest;
  }

  async update(cadence: Cadence, id: string, patch: QuestPatch): Promise<Quest | null> {
    const quests = await this.listAll();
    const existing = quests[cadence].find(q => q.id === id);
    if (!existing) return null;

    const updated: Quest = { ...existing, ...patch, id: existing.id, cadence: existing.cadence };
    await saveQuests(this.store, replaceInPartitions(quests, updated));
    return updated;
  }

  /** Writes partitions already changed by the engine. */
  async saveAll(quests: QuestPartitions): Promise<void> {
    await saveQuests(this.store, quests);
  }

  async delete(cadence: Cadence, id: string): Promise<boolean> {
    const quests = await this.listAll();
    const remaining = quests[cadence].filter(q => q.id !== id);
    if (remaining.length === quests[cadence].length) return false;
    await saveQuests(this.store, { ...quests, [cadence]: remaining });
    return true;
  }

  /** Moves a quest to another cadence, keeping its id and history. */
  async move(id: string, to: Cadence): Promise<Quest | null> {
    const quests = await this.listAll();
    const found = findInPartitions(quests, id);
    if (!found) return null;
    if (found.cadence === to) return found.quest;

    const moved: Quest = { ...found.quest, cadence: to };
    await saveQuests(this.store, {
      ...quests,
      [found.cadence]: quests[found.cadence].filter(q => q.id !== id),
      [to]: [...quests[to], moved],
    });
    return moved;
  }
}
