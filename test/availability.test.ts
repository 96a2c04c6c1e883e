import { describe, expect, it } from 'vitest';
import { AvailabilityException, AvailabilityRule, Interval } from '../src/types/index.js';
import { resolveAvailability, resolveAvailabilityRange } from '../src/scheduling/availability.js';
import { MONDAY, NEXT_MONDAY, VET, times } from './helpers.js';

function rule(overrides: Partial<AvailabilityRule> = {}): AvailabilityRule {
  return {
    id: 'rule-1',
    veterinarianId: VET,
    dayOfWeek: 1,
    startTime: '09:00',
    endTime: '17:00',
    effectiveFrom: '2026-01-01',
    effectiveUntil: null,
    createdAt: new Date(0),
    ...overrides,
  };
}

function exception(overrides: Partial<AvailabilityException> = {}): AvailabilityException {
  return {
    id: 'exc-1',
    veterinarianId: VET,
    date: MONDAY,
    kind: 'removed',
    startTime: '12:00',
    endTime: '13:00',
    reason: null,
    createdAt: new Date(0),
    ...overrides,
  };
}

function resolve(
  date: string,
  rules: AvailabilityRule[],
  exceptions: AvailabilityException[] = []
): Interval[] {
  return resolveAvailability({ veterinarianId: VET, date, rules, exceptions });
}

describe('resolveAvailability', () => {
  it('produces the weekly window on a matching weekday', () => {
    const windows = resolve(MONDAY, [rule()]);

    expect(windows.map((w) => w.start.toISOString())).toEqual(['2026-11-02T09:00:00.000Z']);
    expect(windows.map((w) => w.end.toISOString())).toEqual(['2026-11-02T17:00:00.000Z']);
  });

  it('returns nothing on a weekday without rules', () => {
    expect(resolve('2026-11-03', [rule()])).toEqual([]);
  });

  it('keeps a lunch gap between two rules and joins adjacent ones', () => {
    const split = [rule({ id: 'am', endTime: '12:00' }), rule({ id: 'pm', startTime: '13:00' })];
    const adjacent = [rule({ id: 'am', endTime: '12:00' }), rule({ id: 'pm', startTime: '12:00' })];

    expect(times(resolve(MONDAY, split))).toEqual(['09:00-12:00', '13:00-17:00']);
    expect(times(resolve(MONDAY, adjacent))).toEqual(['09:00-17:00']);
  });

  it('honours the inclusive effective date range', () => {
    expect(resolve(MONDAY, [rule({ effectiveFrom: '2026-11-03' })])).toEqual([]);
    expect(times(resolve(MONDAY, [rule({ effectiveUntil: MONDAY })]))).toEqual(['09:00-17:00']);
    expect(resolve(NEXT_MONDAY, [rule({ effectiveUntil: MONDAY })])).toEqual([]);
  });

  it("ignores another veterinarian's rules and exceptions", () => {
    const windows = resolve(
      MONDAY,
      [rule({ veterinarianId: 'vet-2', startTime: '07:00' }), rule()],
      [exception({ veterinarianId: 'vet-2' })]
    );

    expect(times(windows)).toEqual(['09:00-17:00']);
  });

  it('cuts a removed exception out of that date only', () => {
    const exceptions = [exception()];

    expect(times(resolve(MONDAY, [rule()], exceptions))).toEqual(['09:00-12:00', '13:00-17:00']);
    expect(times(resolve(NEXT_MONDAY, [rule()], exceptions))).toEqual(['09:00-17:00']);
  });

  it('opens an added window on a day without rules', () => {
    const windows = resolve('2026-11-07', [rule()], [
      exception({ date: '2026-11-07', kind: 'added', startTime: '10:00', endTime: '14:00' }),
    ]);

    expect(times(windows)).toEqual(['10:00-14:00']);
  });

  it('joins an added window to an adjacent recurring one', () => {
    const windows = resolve(MONDAY, [rule()], [
      exception({ kind: 'added', startTime: '17:00', endTime: '19:00' }),
    ]);

    expect(times(windows)).toEqual(['09:00-19:00']);
  });

  it('lets an added window win over a removed one', () => {
    const windows = resolve(MONDAY, [rule()], [
      exception({ id: 'off', kind: 'removed', startTime: '12:00', endTime: '13:00' }),
      exception({ id: 'on', kind: 'added', startTime: '12:00', endTime: '12:30' }),
    ]);

    expect(times(windows)).toEqual(['09:00-12:30', '13:00-17:00']);
  });
});

describe('resolveAvailabilityRange', () => {
  it('joins windows that meet at midnight', () => {
    const windows = resolveAvailabilityRange({
      veterinarianId: VET,
      from: '2026-11-01',
      to: '2026-11-02',
      rules: [
        rule({ id: 'sun', dayOfWeek: 0, startTime: '20:00', endTime: '24:00' }),
        rule({ id: 'mon', dayOfWeek: 1, startTime: '00:00', endTime: '02:00' }),
      ],
      exceptions: [],
    });

    expect(windows).toHaveLength(1);
    expect(windows[0]?.start.toISOString()).toBe('2026-11-01T20:00:00.000Z');
    expect(windows[0]?.end.toISOString()).toBe('2026-11-02T02:00:00.000Z');
  });

  it('collects one window per matching day', () => {
    const windows = resolveAvailabilityRange({
      veterinarianId: VET,
      from: MONDAY,
      to: NEXT_MONDAY,
      rules: [rule()],
      exceptions: [],
    });

    expect(windows.map((w) => w.start.toISOString())).toEqual([
      '2026-11-02T09:00:00.000Z',
      '2026-11-09T09:00:00.000Z',
    ]);
  });
});
