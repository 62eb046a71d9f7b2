/**
 * Maps an hour of day onto one of the configured time slots.
 *
 * Four slots split the day at 5, 12, 17 and 21; three slots at 5, 12 and 18
 * (the last slot wraps past midnight in both). Any other count divides the
 * day into equal buckets from midnight.
 */
export function hourToTimeSlot(hour: number, slots: string[]): string {
  if (slots.length === 0) return "";

  if (slots.length === 4) {
    if (hour >= 5 && hour < 12) return slots[0];
    if (hour >= 12 && hour < 17) return slots[1];
    if (hour >= 17 && hour < 21) return slots[2];
    return slots[3];
  }

  if (slots.length === 3) {
    if (hour >= 5 && hour < 12) return slots[0];
    if (hour >= 12 && hour < 18) return slots[1];
    return slots[2];
  }

  const hoursPerSlot = 24 / slots.length;
  const index = Math.floor(hour / hoursPerSlot);
  return slots[Math.min(index, slots.length - 1)];
}
