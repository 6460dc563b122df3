import { ValidationError } from "./errors.js";
import type { TimeOfDay } from "./types.js";

const MINUTES_PER_DAY = 24 * 60;
const SEGMENT_PATTERN = /^\d{1,2}$/;

export const TIME_FORMAT_HINT = "Invalid time format. Please use HH:MM (e.g., 14:30)";

export function validateTime(input: string): boolean {
  return tryParseTime(input) !== null;
}

export function parseTime(input: string): TimeOfDay {
  const parsed = tryParseTime(input);
  if (!parsed) {
    throw new ValidationError(TIME_FORMAT_HINT);
  }
  return parsed;
}

function tryParseTime(input: string): TimeOfDay | null {
  const parts = input.trim().split(":");
  if (parts.length !== 2) return null;

  const [hourPart, minutePart] = parts;
  if (!SEGMENT_PATTERN.test(hourPart) || !SEGMENT_PATTERN.test(minutePart)) return null;

  const hour = Number(hourPart);
  const minute = Number(minutePart);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function formatTime(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

export function timeOfDayOf(date: Date): TimeOfDay {
  return { hour: date.getHours(), minute: date.getMinutes() };
}

export function matchesTime(time: TimeOfDay, date: Date): boolean {
  return time.hour === date.getHours() && time.minute === date.getMinutes();
}

/** Wall-clock time of day `minutes` after `date`, seconds dropped. */
export function addMinutes(date: Date, minutes: number): TimeOfDay {
  const total = (date.getHours() * 60 + date.getMinutes() + minutes) % MINUTES_PER_DAY;
  const wrapped = total < 0 ? total + MINUTES_PER_DAY : total;
  return { hour: Math.floor(wrapped / 60), minute: wrapped % 60 };
}

export function minuteKey(date: Date): string {
  const day = [
    String(date.getFullYear()),
    String(date.getMonth() + 1).padStart(2, "0"),
    String(date.getDate()).padStart(2, "0"),
  ].join("-");
  return `${day} ${formatTime(timeOfDayOf(date))}`;
}

/** First instant at or after the start of `from`'s minute whose wall-clock time is `time`. */
export function nextOccurrence(time: TimeOfDay, from: Date): Date {
  const minuteStart = new Date(from);
  minuteStart.setSeconds(0, 0);

  const candidate = new Date(minuteStart);
  candidate.setHours(time.hour, time.minute, 0, 0);
  if (candidate < minuteStart) {
    candidate.setDate(candidate.getDate() + 1);
  }
  return candidate;
}
