import { describe, it, expect } from "vitest";
import { filterByEnergy } from "../engine/energyFilter.js";
import { hourToTimeSlot } from "../engine/timeSlots.js";
import { makeQuest } from "./helpers.js";

const CATEGORIES = ["Energetic", "Average", "Down"];
const TODAY = "2025-03-10";

function visibleIds(energy: string | undefined, categories: string[] = CATEGORIES): string[] {
  const quests = [
    makeQuest({ id: "any", energy_required: "Any" }),
    makeQuest({ id: "energetic", energy_required: "Energetic" }),
    makeQuest({ id: "average", energy_required: "Average" }),
    makeQuest({ id: "down", energy_required: "Down" }),
  ];
  return filterByEnergy(quests, energy, TODAY, categories).map(q => q.id);
}

describe("filterByEnergy", () => {
  it("shows everything at the top energy", () => {
    expect(visibleIds("Energetic")).toEqual(["any", "energetic", "average", "down"]);
  });

  it("hides quests that need more energy than declared", () => {
    expect(visibleIds("Average")).toEqual(["any", "average", "down"]);
    expect(visibleIds("Down")).toEqual(["any", "down"]);
  });

  it("treats unset energy as the middle category", () => {
    expect(visibleIds(undefined)).toEqual(visibleIds("Average"));
  });

  it("never hides more quests as declared energy rises", () => {
    const down = visibleIds("Down");
    const average = visibleIds("Average");
    const energetic = visibleIds("Energetic");
    expect(down.every(id => average.includes(id))).toBe(true);
    expect(average.every(id => energetic.includes(id))).toBe(true);
  });

  it("follows custom category names", () => {
    const categories = ["High", "Average", "Low"];
    const quest = makeQuest({ id: "1", energy_required: "Average" });
    expect(filterByEnergy([quest], "Low", TODAY, categories)).toEqual([]);
    expect(filterByEnergy([quest], "High", TODAY, categories)).toEqual([quest]);
    expect(filterByEnergy([quest], "Average", TODAY, categories)).toEqual([quest]);
  });

  it("shows a quest with an unknown requirement only at top energy", () => {
    const quest = makeQuest({ energy_required: "Sleepy" });
    expect(filterByEnergy([quest], "Energetic", TODAY, CATEGORIES)).toHaveLength(1);
    expect(filterByEnergy([quest], "Average", TODAY, CATEGORIES)).toHaveLength(0);
  });

  it("excludes quests skipped today and brings them back tomorrow", () => {
    const quest = makeQuest({ skipped_date: TODAY });
    expect(filterByEnergy([quest], "Energetic", TODAY, CATEGORIES)).toEqual([]);
    expect(filterByEnergy([quest], "Energetic", "2025-03-11", CATEGORIES)).toEqual([quest]);
  });
});

describe("hourToTimeSlot", () => {
  const four = ["Morning", "Afternoon", "Evening", "Night"];

  it("splits four slots at 5, 12, 17 and 21", () => {
    expect(hourToTimeSlot(5, four)).toBe("Morning");
    expect(hourToTimeSlot(12, four)).toBe("Afternoon");
    expect(hourToTimeSlot(20, four)).toBe("Evening");
    expect(hourToTimeSlot(21, four)).toBe("Night");
    expect(hourToTimeSlot(3, four)).toBe("Night");
  });

  it("splits three slots at 5, 12 and 18", () => {
    const three = ["AM", "PM", "Late"];
    expect(hourToTimeSlot(17, three)).toBe("PM");
    expect(hourToTimeSlot(18, three)).toBe("Late");
  });

  it("uses equal buckets for other counts", () => {
    expect(hourToTimeSlot(11, ["First", "Second"])).toBe("First");
    expect(hourToTimeSlot(12, ["First", "Second"])).toBe("Second");
  });
});
