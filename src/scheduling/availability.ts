import { AvailabilityException, AvailabilityRule, Interval } from '../types/index.js';
import { dayOfWeek, eachCalendarDate, windowOn } from './calendar.js';
import { mergeIntervals, subtractFromAll } from './intervals.js';

export interface AvailabilityQuery {
  veterinarianId: string;
  date: string;
  rules: readonly AvailabilityRule[];
  exceptions: readonly AvailabilityException[];
}

export interface AvailabilityRangeQuery {
  veterinarianId: string;
  from: string;
  to: string;
  rules: readonly AvailabilityRule[];
  exceptions: readonly AvailabilityException[];
}

function ruleAppliesOn(rule: AvailabilityRule, date: string, weekday: number): boolean {
  return (
    rule.dayOfWeek === weekday &&
    rule.effectiveFrom <= date &&
    (rule.effectiveUntil === null || date <= rule.effectiveUntil)
  );
}

/**
 * Bookable windows for one veterinarian on one date, before existing
 * appointments are taken out.
 *
 * Matching weekly rules are unioned, `removed` exceptions for the date are
 * cut out, then `added` exceptions are unioned back in. The result is
 * sorted and coalesced; a date with nothing configured yields `[]`.
 */
export function resolveAvailability(query: AvailabilityQuery): Interval[] {
  const { veterinarianId, date } = query;
  const weekday = dayOfWeek(date);

  const recurring = query.rules
    .filter((rule) => rule.veterinarianId === veterinarianId && ruleAppliesOn(rule, date, weekday))
    .map((rule) => windowOn(date, rule.startTime, rule.endTime));

  const dated = query.exceptions.filter(
    (exception) => exception.veterinarianId === veterinarianId && exception.date === date
  );
  const removed = dated
    .filter((exception) => exception.kind === 'removed')
    .map((exception) => windowOn(date, exception.startTime, exception.endTime));
  const added = dated
    .filter((exception) => exception.kind === 'added')
    .map((exception) => windowOn(date, exception.startTime, exception.endTime));

  return mergeIntervals([...subtractFromAll(mergeIntervals(recurring), removed), ...added]);
}

/**
 * Same as {@link resolveAvailability} over an inclusive date range. Windows
 * that meet at midnight are joined.
 */
export function resolveAvailabilityRange(query: AvailabilityRangeQuery): Interval[] {
  return mergeIntervals(
    eachCalendarDate(query.from, query.to).flatMap((date) =>
      resolveAvailability({
        veterinarianId: query.veterinarianId,
        date,
        rules: query.rules,
        exceptions: query.exceptions,
      })
    )
  );
}
