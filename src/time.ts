import { TimeWindow } from "./types";

// All instants are local wall-clock values; nothing here converts timezones.

const MINUTE_MS = 60_000;
const BOOKING_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

/**
 * The wall-clock instant `minutes` after midnight on `day`. Minutes past
 * 1440 roll into the next day. On a clock-change day this differs from
 * adding elapsed minutes to midnight.
 */
export function atMinuteOfDay(day: Date, minutes: number): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 0, minutes, 0, 0);
}

/**
 * Parses a portal booking date ("dd/mm/yyyy") into local midnight.
 * Returns null for anything that is not a real calendar day.
 */
export function parseBookingDate(value: string): Date | null {
  const match = value.trim().match(BOOKING_DATE_PATTERN);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return null;
  }

  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  const date = new Date(year, month - 1, day, 0, 0, 0, 0);

  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }

  return date;
}

export function formatBookingDate(date: Date): string {
  const day = date.getDate().toString().padStart(2, "0");
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  return `${day}/${month}/${date.getFullYear()}`;
}

/** "0815" -> minutes after midnight, or null. */
export function parseTimeLabel(label: string): number | null {
  const match = label.trim().match(/^(\d{2}):?(\d{2})$/);
  if (!match || !match[1] || !match[2]) {
    return null;
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return hours * 60 + minutes;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function dayWindow(day: Date): TimeWindow {
  const start = startOfDay(day);
  const end = new Date(start.getFullYear(), start.getMonth(), start.getDate() + 1);
  return { start, end };
}

export function addDays(date: Date, days: number): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate() + days,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

/** Whole calendar days from `from` to `to`, ignoring time of day. */
export function dayOffset(from: Date, to: Date): number {
  const a = startOfDay(from);
  const b = startOfDay(to);
  return Math.round((b.getTime() - a.getTime()) / (24 * 60 * MINUTE_MS));
}

/** 5400000 -> "01:30" */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.floor(ms / MINUTE_MS);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours.toString().padStart(2, "0")}:${minutes.toString().padStart(2, "0")}`;
}

export function formatLocal(date: Date): string {
  const hh = date.getHours().toString().padStart(2, "0");
  const mm = date.getMinutes().toString().padStart(2, "0");
  return `${formatBookingDate(date)} ${hh}:${mm}`;
}
