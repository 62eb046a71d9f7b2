import { MAX_TITLE_LENGTH } from "./constants.js";
import { isDateString } from "./dates.js";

/** Input rejected at the boundary; the message is shown to the user as-is. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export type Validated<T> = { ok: true; value: T } | { ok: false; error: string };

export function sanitizeTextInput(text: string | undefined, maxLength: number = 500): string {
  if (!text) return "";
  return text.trim().slice(0, maxLength);
}

export function validateTitle(title: string | undefined): Validated<string> {
  const value = sanitizeTextInput(title, MAX_TITLE_LENGTH);
  if (!value) return { ok: false, error: "Title cannot be empty" };
  return { ok: true, value };
}

/** HH:MM, 24-hour. Normalises "8:05" to "08:05". */
export function validateTime(time: string | undefined): Validated<string> {
  if (!time) return { ok: false, error: "Please enter a time" };
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  if (!match) return { ok: false, error: "Please enter time in HH:MM format" };
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23) return { ok: false, error: "Hour must be 00-23" };
  if (minute > 59) return { ok: false, error: "Minutes must be 00-59" };
  return { ok: true, value: `${String(hour).padStart(2, "0")}:${match[2]}` };
}

export function validateDate(date: string | undefined): Validated<string> {
  if (!date) return { ok: false, error: "Please enter a date" };
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    return { ok: false, error: "Please enter date in YYYY-MM-DD format" };
  }
  if (!isDateString(date)) return { ok: false, error: `Invalid date: ${date} does not exist` };
  return { ok: true, value: date };
}

export function validateProgressValue(value: number): Validated<number> {
  if (!Number.isInteger(value)) return { ok: false, error: "Progress must be a whole number" };
  if (value < 0) return { ok: false, error: "Progress cannot be negative" };
  return { ok: true, value };
}

/** Unwraps a validation result or throws InvalidInputError. */
export function required<T>(result: Validated<T>): T {
  if (!result.ok) throw new InvalidInputError(result.error);
  return result.value;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
