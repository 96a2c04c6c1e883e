import {
  Appointment,
  Interval,
  SchedulingEvent,
  SchedulingResult,
} from '../src/types/index.js';
import { SqliteDatabase, SqliteSchedulingStore, openDatabase } from '../src/db/sqlite.js';
import { SchedulingError } from '../src/scheduling/errors.js';
import { SchedulingEventSink } from '../src/scheduling/events.js';
import { SchedulingStore } from '../src/scheduling/store.js';
import { BookingCoordinator, BookingPolicy } from '../src/services/booking.service.js';
import { SchedulingService } from '../src/services/scheduling.service.js';

export const VET = 'vet-1';
export const PET = 'pet-1';

// 2026-11-02 and 2026-11-09 are Mondays; 2026-11-01 is a Sunday.
export const MONDAY = '2026-11-02';
export const NEXT_MONDAY = '2026-11-09';
export const DEFAULT_NOW = new Date('2026-11-01T08:00:00.000Z');

export const TEST_POLICY: BookingPolicy = {
  granularityMinutes: 5,
  minDurationMinutes: 15,
  maxDurationMinutes: 480,
  leadTimeMinutes: 0,
  rescheduleChecksLeadTime: true,
  maxCommitAttempts: 3,
};

export function at(date: string, time: string): Date {
  return new Date(`${date}T${time}:00.000Z`);
}

export function interval(date: string, start: string, end: string): Interval {
  return { start: at(date, start), end: at(date, end) };
}

/** `HH:mm-HH:mm` per interval, for intervals within one day */
export function times(intervals: readonly Interval[]): string[] {
  return intervals.map(
    (i) => `${i.start.toISOString().slice(11, 16)}-${i.end.toISOString().slice(11, 16)}`
  );
}

export function makeAppointment(overrides: Partial<Appointment> = {}): Appointment {
  return {
    id: 'appt-1',
    veterinarianId: VET,
    petId: PET,
    start: at(MONDAY, '10:00'),
    end: at(MONDAY, '10:30'),
    status: 'scheduled',
    version: 1,
    createdAt: DEFAULT_NOW,
    updatedAt: DEFAULT_NOW,
    ...overrides,
  };
}

export class RecordingEventSink implements SchedulingEventSink {
  readonly events: SchedulingEvent[] = [];

  publish(event: SchedulingEvent): void {
    this.events.push(event);
  }
}

/** Lets fire-and-forget event publication settle. */
export function flushEvents(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function unwrap<T>(result: SchedulingResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

export function errorCodeOf<T>(result: SchedulingResult<T>): string | null {
  return result.success ? null : result.error.code;
}

export async function rejectionOf(promise: Promise<unknown>): Promise<SchedulingError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SchedulingError) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject with a SchedulingError');
}

export function thrownBy(fn: () => unknown): SchedulingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchedulingError) return error;
    throw error;
  }
  throw new Error('Expected a SchedulingError to be thrown');
}

export interface HarnessOptions {
  now?: Date;
  policy?: Partial<BookingPolicy>;
  db?: SqliteDatabase;
  store?: SchedulingStore;
  events?: SchedulingEventSink;
}

export function createHarness(options: HarnessOptions = {}) {
  let now = options.now ?? DEFAULT_NOW;
  const clock = () => now;
  const db = options.db ?? openDatabase(':memory:', { busyTimeoutMs: 50 });
  const store = options.store ?? new SqliteSchedulingStore(db);
  const policy: BookingPolicy = { ...TEST_POLICY, ...options.policy };
  const coordinator = new BookingCoordinator(store, policy, clock);
  const recorder = new RecordingEventSink();
  const scheduling = new SchedulingService({
    store,
    coordinator,
    events: options.events ?? recorder,
    granularityMinutes: policy.granularityMinutes,
    maxSlotRangeDays: 31,
    clock,
  });

  return {
    db,
    store,
    coordinator,
    scheduling,
    events: recorder.events,
    setNow(next: Date) {
      now = next;
    },
    /** Weekly rule for VET, effective from 2026-01-01 */
    async addRule(dayOfWeek: number, startTime: string, endTime: string) {
      return unwrap(
        await scheduling.addAvailabilityRule({
          veterinarianId: VET,
          dayOfWeek,
          startTime,
          endTime,
          effectiveFrom: '2026-01-01',
          effectiveUntil: null,
        })
      );
    },
    async book(date: string, start: string, end: string, petId = PET) {
      return unwrap(
        await scheduling.createAppointment({
          veterinarianId: VET,
          petId,
          start: at(date, start),
          end: at(date, end),
        })
      );
    },
  };
}
