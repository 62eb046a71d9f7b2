import { localDateString } from "./dates.js";

export interface Clock {
  /** Current calendar date, YYYY-MM-DD. */
  today(): string;
  /** Epoch milliseconds. */
  now(): number;
  /** Hour of day, 0-23. */
  hour(): number;
}

export const systemClock: Clock = {
  today: () => localDateString(new Date()),
  now: () => Date.now(),
  hour: () => new Date().getHours(),
};

/** A clock pinned to one date and hour; `set` moves it. */
export interface FixedClock extends Clock {
  set(date: string, hour?: number): void;
}

export function fixedClock(date: string, hour: number = 9): FixedClock {
  let currentDate = date;
  let currentHour = hour;
  return {
    today: () => currentDate,
    now: () => Date.parse(`${currentDate}T${String(currentHour).padStart(2, "0")}:00:00Z`),
    hour: () => currentHour,
    set(nextDate: string, nextHour?: number) {
      currentDate = nextDate;
      if (nextHour !== undefined) currentHour = nextHour;
    },
  };
}
