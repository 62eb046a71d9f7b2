import { ANY_ENERGY } from "../constants.js";
import type { Quest } from "../types.js";
import { isSkippedOn } from "./completion.js";

/** Maps each energy category to its rank; 0 is the highest energy. */
export function energyRank(categories: string[]): Map<string, number> {
  return new Map(categories.map((name, index) => [name, index]));
}

/**
 * Quests visible for the user's declared energy on `today`.
 *
 * A quest shows when it needs no particular energy, when the user is at the
 * top energy level, or when its required energy ranks at or below the
 * user's current one. Raising the declared energy never hides a quest.
 * Quests skipped for `today` are always excluded.
 */
export function filterByEnergy(
  quests: Quest[],
  currentEnergy: string | undefined,
  today: string,
  categories: string[],
): Quest[] {
  const index = energyRank(categories);
  const middle = Math.floor(categories.length / 2);
  const currentRank = (currentEnergy !== undefined ? index.get(currentEnergy) : undefined) ?? middle;
  const isHighEnergy = currentRank === 0;

  return quests.filter(quest => {
    if (isSkippedOn(quest, today)) return false;
    const required = quest.energy_required;
    if (!required || required === ANY_ENERGY) return true;
    if (isHighEnergy) return true;
    const requiredRank = index.get(required);
    return requiredRank !== undefined && requiredRank >= currentRank;
  });
}
