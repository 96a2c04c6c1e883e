import { Interval } from '../types/index.js';

/**
 * Interval arithmetic over half-open `[start, end)` ranges.
 * Callers reject zero-length and inverted intervals before they get here.
 */

export function overlaps(a: Interval, b: Interval): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

export function contains(window: Interval, interval: Interval): boolean {
  return (
    window.start.getTime() <= interval.start.getTime() &&
    interval.end.getTime() <= window.end.getTime()
  );
}

export function durationMinutes(interval: Interval): number {
  return (interval.end.getTime() - interval.start.getTime()) / 60_000;
}

/**
 * Union of the given intervals, sorted ascending, with overlapping and
 * adjacent intervals coalesced.
 */
export function mergeIntervals(intervals: readonly Interval[]): Interval[] {
  const sorted = [...intervals].sort(
    (a, b) => a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime()
  );

  const merged: Interval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start.getTime() <= last.end.getTime()) {
      if (interval.end.getTime() > last.end.getTime()) {
        merged[merged.length - 1] = { start: last.start, end: interval.end };
      }
      continue;
    }
    merged.push({ start: interval.start, end: interval.end });
  }
  return merged;
}

/**
 * What is left of `window` once every blocked interval is removed.
 */
export function subtractIntervals(window: Interval, blocked: readonly Interval[]): Interval[] {
  const remaining: Interval[] = [];
  let cursor = window.start.getTime();
  const windowEnd = window.end.getTime();

  for (const block of mergeIntervals(blocked)) {
    const blockStart = block.start.getTime();
    const blockEnd = block.end.getTime();
    if (blockEnd <= cursor) continue;
    if (blockStart >= windowEnd) break;

    if (blockStart > cursor) {
      remaining.push({ start: new Date(cursor), end: new Date(blockStart) });
    }
    cursor = Math.max(cursor, blockEnd);
  }

  if (cursor < windowEnd) {
    remaining.push({ start: new Date(cursor), end: new Date(windowEnd) });
  }
  return remaining;
}

export function subtractFromAll(windows: readonly Interval[], blocked: readonly Interval[]): Interval[] {
  return mergeIntervals(windows.flatMap((window) => subtractIntervals(window, blocked)));
}
