import { Interval } from '../types/index.js';

// Calendar dates (`YYYY-MM-DD`) and times of day (`HH:mm`) are read as UTC.

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^(?:([01]\d|2[0-3]):([0-5]\d)|(24):(00))$/;

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function isTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Minutes since midnight for `HH:mm`; `24:00` is end of day.
 * Throws on malformed input, which validation should have stopped earlier.
 */
export function minutesOfDay(value: string): number {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  const [, hours, minutes, endHours] = match;
  return endHours === undefined ? Number(hours) * 60 + Number(minutes) : 24 * 60;
}

export function startOfCalendarDate(date: string): Date {
  if (!isCalendarDate(date)) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  return new Date(`${date}T00:00:00.000Z`);
}

export function toCalendarDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return toCalendarDate(new Date(startOfCalendarDate(date).getTime() + days * DAY_MS));
}

export function dayOfWeek(date: string): number {
  return startOfCalendarDate(date).getUTCDay();
}

export function atTimeOfDay(date: string, time: string): Date {
  return new Date(startOfCalendarDate(date).getTime() + minutesOfDay(time) * 60_000);
}

export function windowOn(date: string, startTime: string, endTime: string): Interval {
  return { start: atTimeOfDay(date, startTime), end: atTimeOfDay(date, endTime) };
}

/** Inclusive list of dates from `from` to `to`; empty when `to` precedes `from`. */
export function eachCalendarDate(from: string, to: string): string[] {
  const dates: string[] = [];
  for (let date = from; date <= to; date = addDays(date, 1)) {
    dates.push(date);
  }
  return dates;
}

export function daysBetween(from: string, to: string): number {
  return Math.round((startOfCalendarDate(to).getTime() - startOfCalendarDate(from).getTime()) / DAY_MS);
}

/** The first and last calendar dates a non-empty interval touches. */
export function calendarSpan(interval: Interval): { from: string; to: string } {
  return {
    from: toCalendarDate(interval.start),
    to: toCalendarDate(new Date(interval.end.getTime() - 1)),
  };
}

/** `[from 00:00, to + 1 day 00:00)` */
export function dateRangeInterval(from: string, to: string): Interval {
  return { start: startOfCalendarDate(from), end: startOfCalendarDate(addDays(to, 1)) };
}
