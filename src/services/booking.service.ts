import { randomUUID } from 'crypto';
import { Appointment, Clock, ErrorCode, Interval } from '../types/index.js';
import { resolveAvailabilityRange } from '../scheduling/availability.js';
import { calendarSpan } from '../scheduling/calendar.js';
import { ConflictPolicy, checkIntervalShape, detectConflicts } from '../scheduling/conflicts.js';
import {
  SchedulingError,
  appointmentNotFound,
  concurrentModification,
  slotUnavailable,
} from '../scheduling/errors.js';
import {
  LifecycleEvent,
  applyTransition,
  assertReschedulable,
  transitionRule,
} from '../scheduling/lifecycle.js';
import { SchedulingStore, TransientStoreError } from '../scheduling/store.js';

export interface BookingPolicy extends ConflictPolicy {
  maxCommitAttempts: number;
  rescheduleChecksLeadTime: boolean;
}

export interface BookingRequest {
  veterinarianId: string;
  petId: string;
  start: Date;
  end: Date;
}

export interface TransitionOutcome {
  appointment: Appointment;
  /** false when the request was already satisfied (repeat cancel) */
  changed: boolean;
}

type CommitAttempt<T> = { committed: true; value: T } | { committed: false };

const RETRY: CommitAttempt<never> = { committed: false };

/**
 * Check-then-commit for one veterinarian timeline.
 *
 * Every attempt re-reads state and re-runs conflict detection, then hands
 * the write to a conditional store primitive that repeats the overlap and
 * version tests atomically. Losing the commit race retries against fresh
 * state, up to `maxCommitAttempts`.
 */
export class BookingCoordinator {
  constructor(
    private readonly store: SchedulingStore,
    private readonly policy: BookingPolicy,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(request: BookingRequest): Promise<Appointment> {
    const interval: Interval = { start: request.start, end: request.end };

    return this.commitWithRetry<Appointment>(
      'create',
      () => slotUnavailable(interval),
      async () => {
        const now = this.clock();
        await this.precheck(request.veterinarianId, interval, { now, enforceLeadTime: true });

        const appointment: Appointment = {
          id: randomUUID(),
          veterinarianId: request.veterinarianId,
          petId: request.petId,
          start: interval.start,
          end: interval.end,
          status: 'scheduled',
          version: 1,
          createdAt: now,
          updatedAt: now,
        };

        const outcome = await this.store.insertAppointmentIfFree(appointment);
        return outcome === 'committed' ? { committed: true, value: appointment } : RETRY;
      }
    );
  }

  async reschedule(
    appointmentId: string,
    interval: Interval,
    expectedVersion: number
  ): Promise<Appointment> {
    return this.commitWithRetry<Appointment>(
      'reschedule',
      () => slotUnavailable(interval),
      async () => {
        const now = this.clock();
        const current = await this.requireAppointment(appointmentId);
        if (current.version !== expectedVersion) {
          throw concurrentModification(appointmentId, expectedVersion, current.version);
        }
        assertReschedulable(current);

        await this.precheck(current.veterinarianId, interval, {
          now,
          enforceLeadTime: this.policy.rescheduleChecksLeadTime,
          excludeAppointmentId: current.id,
        });

        const next: Appointment = {
          ...current,
          start: interval.start,
          end: interval.end,
          version: current.version + 1,
          updatedAt: now,
        };
        const outcome = await this.store.updateAppointmentIfCurrent(next, expectedVersion, {
          requireFree: true,
        });
        if (outcome === 'not_found') {
          throw appointmentNotFound(appointmentId);
        }
        // version_mismatch and conflict both go round again; the next read
        // turns a mismatch into CONCURRENT_MODIFICATION.
        return outcome === 'committed' ? { committed: true, value: next } : RETRY;
      }
    );
  }

  /**
   * Cancelling an already cancelled appointment returns it untouched, even
   * after the visit has started.
   */
  async cancel(appointmentId: string, expectedVersion?: number): Promise<TransitionOutcome> {
    return this.transition(appointmentId, 'cancel', expectedVersion);
  }

  async complete(appointmentId: string, expectedVersion?: number): Promise<TransitionOutcome> {
    return this.transition(appointmentId, 'complete', expectedVersion);
  }

  async markNoShow(appointmentId: string, expectedVersion?: number): Promise<TransitionOutcome> {
    return this.transition(appointmentId, 'mark_no_show', expectedVersion);
  }

  private async transition(
    appointmentId: string,
    event: LifecycleEvent,
    expectedVersion: number | undefined
  ): Promise<TransitionOutcome> {
    return this.commitWithRetry<TransitionOutcome>(
      event,
      () =>
        new SchedulingError(
          ErrorCode.CONCURRENT_MODIFICATION,
          'Appointment kept changing while the update was attempted',
          { appointment_id: appointmentId }
        ),
      async () => {
        const current = await this.requireAppointment(appointmentId);
        if (event === 'cancel' && current.status === 'cancelled') {
          return { committed: true, value: { appointment: current, changed: false } };
        }
        // A terminal status outranks a stale version.
        transitionRule(current, event);
        if (expectedVersion !== undefined && current.version !== expectedVersion) {
          throw concurrentModification(appointmentId, expectedVersion, current.version);
        }

        const next = applyTransition(current, event, this.clock());
        const outcome = await this.store.updateAppointmentIfCurrent(next, current.version, {
          requireFree: false,
        });
        if (outcome === 'not_found') {
          throw appointmentNotFound(appointmentId);
        }
        return outcome === 'committed'
          ? { committed: true, value: { appointment: next, changed: true } }
          : RETRY;
      }
    );
  }

  private async requireAppointment(appointmentId: string): Promise<Appointment> {
    const appointment = await this.store.findAppointment(appointmentId);
    if (!appointment) {
      throw appointmentNotFound(appointmentId);
    }
    return appointment;
  }

  /**
   * Loads the veterinarian's rules, exceptions and overlapping bookings for
   * the dates the interval touches and throws the first conflict found.
   */
  private async precheck(
    veterinarianId: string,
    interval: Interval,
    options: { now: Date; enforceLeadTime: boolean; excludeAppointmentId?: string }
  ): Promise<void> {
    const shape = checkIntervalShape(interval, this.policy);
    if (!shape.ok) {
      throw shape.error;
    }

    const { from, to } = calendarSpan(interval);
    const [rules, exceptions, scheduled] = await Promise.all([
      this.store.findRules(veterinarianId),
      this.store.findExceptions(veterinarianId, from, to),
      this.store.findScheduledOverlapping(veterinarianId, interval, options.excludeAppointmentId),
    ]);

    const result = detectConflicts(
      {
        veterinarianId,
        interval,
        availability: resolveAvailabilityRange({ veterinarianId, from, to, rules, exceptions }),
        scheduled,
        now: options.now,
        enforceLeadTime: options.enforceLeadTime,
      },
      this.policy
    );
    if (!result.ok) {
      throw result.error;
    }
  }

  /**
   * Runs `attempt` until it commits, throws a domain error, or the attempt
   * budget runs out. Transient store failures end in BUSY, lost races in
   * the operation's own exhaustion error.
   */
  private async commitWithRetry<T>(
    operation: string,
    exhausted: () => SchedulingError,
    attempt: () => Promise<CommitAttempt<T>>
  ): Promise<T> {
    let lastFailure: 'conflict' | 'busy' = 'conflict';

    for (let attemptNumber = 1; attemptNumber <= this.policy.maxCommitAttempts; attemptNumber++) {
      try {
        const result = await attempt();
        if (result.committed) {
          return result.value;
        }
        lastFailure = 'conflict';
        console.warn(`Scheduling ${operation}: commit attempt ${attemptNumber} lost a race, retrying`);
      } catch (error: unknown) {
        if (!(error instanceof TransientStoreError)) {
          throw error;
        }
        lastFailure = 'busy';
        console.warn(`Scheduling ${operation}: commit attempt ${attemptNumber} failed, store busy`);
      }
    }

    if (lastFailure === 'busy') {
      throw new SchedulingError(ErrorCode.BUSY, 'Scheduling is busy, please retry shortly', {
        attempts: this.policy.maxCommitAttempts,
      });
    }
    throw exhausted();
  }
}
