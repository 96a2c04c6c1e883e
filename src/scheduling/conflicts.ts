import { Appointment, ErrorCode, Interval } from '../types/index.js';
import { SchedulingError, slotUnavailable } from './errors.js';
import { contains, durationMinutes, overlaps } from './intervals.js';

export interface ConflictPolicy {
  granularityMinutes: number;
  minDurationMinutes: number;
  maxDurationMinutes: number;
  /** `null` turns the lead-time floor off. */
  leadTimeMinutes: number | null;
}

export interface ConflictCheckInput {
  veterinarianId: string;
  interval: Interval;
  availability: readonly Interval[];
  scheduled: readonly Appointment[];
  now: Date;
  enforceLeadTime: boolean;
}

export type ConflictCheckResult = { ok: true } | { ok: false; error: SchedulingError };

const OK: ConflictCheckResult = { ok: true };

function fail(error: SchedulingError): ConflictCheckResult {
  return { ok: false, error };
}

// Calendar dates are `YYYY-MM-DD`, so instants stay within four-digit years.
function hasCalendarYear(instant: Date): boolean {
  const year = instant.getUTCFullYear();
  return year >= 0 && year <= 9999;
}

function describe(interval: Interval): Record<string, unknown> {
  return { start: interval.start.toISOString(), end: interval.end.toISOString() };
}

/**
 * Shape checks that need no calendar data: valid instants, ordering,
 * granularity alignment and length bounds. Runs before any availability is
 * resolved, so the maximum length also caps how many days a pre-check reads.
 */
export function checkIntervalShape(interval: Interval, policy: ConflictPolicy): ConflictCheckResult {
  const { start, end } = interval;
  if (isNaN(start.getTime()) || isNaN(end.getTime())) {
    return fail(new SchedulingError(ErrorCode.INVALID_WINDOW, 'start and end must be valid instants'));
  }
  if (!hasCalendarYear(start) || !hasCalendarYear(end)) {
    return fail(
      new SchedulingError(ErrorCode.INVALID_WINDOW, 'start and end must fall in years 0000 to 9999')
    );
  }

  if (start.getTime() >= end.getTime()) {
    return fail(
      new SchedulingError(ErrorCode.INVALID_DURATION, 'start must be before end', describe(interval))
    );
  }

  const granularityMs = policy.granularityMinutes * 60_000;
  if (start.getTime() % granularityMs !== 0) {
    return fail(
      new SchedulingError(
        ErrorCode.INVALID_WINDOW,
        `start must align to ${policy.granularityMinutes}-minute boundaries`,
        { ...describe(interval), granularity_minutes: policy.granularityMinutes }
      )
    );
  }

  const minutes = durationMinutes(interval);
  if (minutes % policy.granularityMinutes !== 0) {
    return fail(
      new SchedulingError(
        ErrorCode.INVALID_DURATION,
        `duration must be a multiple of ${policy.granularityMinutes} minutes`,
        { duration_minutes: minutes, granularity_minutes: policy.granularityMinutes }
      )
    );
  }

  if (minutes < policy.minDurationMinutes) {
    return fail(
      new SchedulingError(
        ErrorCode.INVALID_DURATION,
        `duration must be at least ${policy.minDurationMinutes} minutes`,
        { duration_minutes: minutes, min_duration_minutes: policy.minDurationMinutes }
      )
    );
  }

  if (minutes > policy.maxDurationMinutes) {
    return fail(
      new SchedulingError(
        ErrorCode.INVALID_DURATION,
        `duration must be at most ${policy.maxDurationMinutes} minutes`,
        { duration_minutes: minutes, max_duration_minutes: policy.maxDurationMinutes }
      )
    );
  }

  return OK;
}

/**
 * Read-only pre-check of a proposed interval. It reserves nothing; the
 * coordinator repeats the overlap test inside the commit.
 */
export function detectConflicts(input: ConflictCheckInput, policy: ConflictPolicy): ConflictCheckResult {
  const { interval } = input;

  const shape = checkIntervalShape(interval, policy);
  if (!shape.ok) return shape;

  if (input.enforceLeadTime && policy.leadTimeMinutes !== null) {
    const earliest = new Date(input.now.getTime() + policy.leadTimeMinutes * 60_000);
    if (interval.start.getTime() < earliest.getTime()) {
      return fail(
        new SchedulingError(ErrorCode.INVALID_WINDOW, 'Appointment starts before the booking lead time', {
          ...describe(interval),
          earliest_start: earliest.toISOString(),
        })
      );
    }
  }

  // A single window must hold the whole interval; both ends landing in
  // different windows is still a gap.
  if (!input.availability.some((window) => contains(window, interval))) {
    return fail(
      new SchedulingError(
        ErrorCode.OUTSIDE_AVAILABILITY,
        'Requested time is outside the veterinarian availability',
        { veterinarian_id: input.veterinarianId, ...describe(interval) }
      )
    );
  }

  const clash = input.scheduled.find(
    (appointment) =>
      appointment.veterinarianId === input.veterinarianId &&
      appointment.status === 'scheduled' &&
      overlaps(appointment, interval)
  );
  if (clash) {
    return fail(slotUnavailable(interval));
  }

  return OK;
}
