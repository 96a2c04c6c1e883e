import { randomUUID } from 'crypto';
import {
  Appointment,
  AvailabilityException,
  AvailabilityRule,
  Clock,
  CreateAppointmentInput,
  ErrorCode,
  ListAvailableSlotsInput,
  NewAvailabilityException,
  NewAvailabilityRule,
  RescheduleAppointmentInput,
  SchedulingOperation,
  SchedulingResult,
  TimeSlot,
  TransitionAppointmentInput,
  VeterinarianAvailability,
} from '../types/index.js';
import { resolveAvailabilityRange } from '../scheduling/availability.js';
import { dateRangeInterval, daysBetween, isCalendarDate, minutesOfDay } from '../scheduling/calendar.js';
import { SchedulingError, appointmentNotFound, isSchedulingError } from '../scheduling/errors.js';
import { SchedulingEventSink, toSchedulingEvent } from '../scheduling/events.js';
import { subtractFromAll } from '../scheduling/intervals.js';
import { SchedulingStore } from '../scheduling/store.js';
import { BookingCoordinator, TransitionOutcome } from './booking.service.js';

export interface SchedulingServiceOptions {
  store: SchedulingStore;
  coordinator: BookingCoordinator;
  events: SchedulingEventSink;
  granularityMinutes: number;
  maxSlotRangeDays: number;
  clock?: Clock;
}

/**
 * Public scheduling operations. Callers are expected to have authorized the
 * request and checked that the veterinarian and pet exist.
 *
 * Every operation resolves to a `SchedulingResult`; domain failures come
 * back as `{ success: false }` and anything else is rethrown.
 */
export class SchedulingService {
  private readonly store: SchedulingStore;
  private readonly coordinator: BookingCoordinator;
  private readonly events: SchedulingEventSink;
  private readonly granularityMinutes: number;
  private readonly maxSlotRangeDays: number;
  private readonly clock: Clock;

  constructor(options: SchedulingServiceOptions) {
    this.store = options.store;
    this.coordinator = options.coordinator;
    this.events = options.events;
    this.granularityMinutes = options.granularityMinutes;
    this.maxSlotRangeDays = options.maxSlotRangeDays;
    this.clock = options.clock ?? (() => new Date());
  }

  async createAppointment(input: CreateAppointmentInput): Promise<SchedulingResult<Appointment>> {
    return this.run(async () => {
      const appointment = await this.coordinator.create(input);
      this.emit('created', appointment);
      return appointment;
    });
  }

  async rescheduleAppointment(input: RescheduleAppointmentInput): Promise<SchedulingResult<Appointment>> {
    return this.run(async () => {
      const appointment = await this.coordinator.reschedule(
        input.appointmentId,
        { start: input.start, end: input.end },
        input.expectedVersion
      );
      this.emit('rescheduled', appointment);
      return appointment;
    });
  }

  async cancelAppointment(input: TransitionAppointmentInput): Promise<SchedulingResult<Appointment>> {
    return this.run(async () =>
      this.settle('cancelled', await this.coordinator.cancel(input.appointmentId, input.expectedVersion))
    );
  }

  async completeAppointment(input: TransitionAppointmentInput): Promise<SchedulingResult<Appointment>> {
    return this.run(async () =>
      this.settle('completed', await this.coordinator.complete(input.appointmentId, input.expectedVersion))
    );
  }

  async markNoShow(input: TransitionAppointmentInput): Promise<SchedulingResult<Appointment>> {
    return this.run(async () =>
      this.settle('no_show', await this.coordinator.markNoShow(input.appointmentId, input.expectedVersion))
    );
  }

  async getAppointment(appointmentId: string): Promise<SchedulingResult<Appointment>> {
    return this.run(async () => {
      const appointment = await this.store.findAppointment(appointmentId);
      if (!appointment) {
        throw appointmentNotFound(appointmentId);
      }
      return appointment;
    });
  }

  /**
   * Free windows between `from` and `to` (inclusive dates): resolved
   * availability minus every scheduled appointment. Read-only.
   */
  async listAvailableSlots(input: ListAvailableSlotsInput): Promise<SchedulingResult<TimeSlot[]>> {
    return this.run(async () => {
      const { veterinarianId, from, to } = input;
      this.assertDateRange(from, to);

      const [rules, exceptions, scheduled] = await Promise.all([
        this.store.findRules(veterinarianId),
        this.store.findExceptions(veterinarianId, from, to),
        this.store.findScheduledOverlapping(veterinarianId, dateRangeInterval(from, to)),
      ]);

      const windows = resolveAvailabilityRange({ veterinarianId, from, to, rules, exceptions });
      return subtractFromAll(windows, scheduled);
    });
  }

  async listAvailability(
    veterinarianId: string,
    from: string,
    to: string
  ): Promise<SchedulingResult<VeterinarianAvailability>> {
    return this.run(async () => {
      this.assertDateRange(from, to);
      const [rules, exceptions] = await Promise.all([
        this.store.findRules(veterinarianId),
        this.store.findExceptions(veterinarianId, from, to),
      ]);
      return { rules, exceptions };
    });
  }

  async addAvailabilityRule(input: NewAvailabilityRule): Promise<SchedulingResult<AvailabilityRule>> {
    return this.run(async () => {
      if (!Number.isInteger(input.dayOfWeek) || input.dayOfWeek < 0 || input.dayOfWeek > 6) {
        throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'dayOfWeek must be between 0 (Sunday) and 6');
      }
      if (!isCalendarDate(input.effectiveFrom)) {
        throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'effectiveFrom must be a YYYY-MM-DD date');
      }
      if (input.effectiveUntil !== null) {
        if (!isCalendarDate(input.effectiveUntil) || input.effectiveUntil < input.effectiveFrom) {
          throw new SchedulingError(
            ErrorCode.INVALID_WINDOW,
            'effectiveUntil must be a YYYY-MM-DD date on or after effectiveFrom'
          );
        }
      }
      this.assertTimeWindow(input.startTime, input.endTime);

      const rule: AvailabilityRule = { id: randomUUID(), ...input, createdAt: this.clock() };
      await this.store.insertRule(rule);
      return rule;
    });
  }

  async addAvailabilityException(
    input: NewAvailabilityException
  ): Promise<SchedulingResult<AvailabilityException>> {
    return this.run(async () => {
      if (!isCalendarDate(input.date)) {
        throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'date must be a YYYY-MM-DD date');
      }
      this.assertTimeWindow(input.startTime, input.endTime);

      const exception: AvailabilityException = { id: randomUUID(), ...input, createdAt: this.clock() };
      await this.store.insertException(exception);
      return exception;
    });
  }

  async removeAvailabilityRule(veterinarianId: string, ruleId: string): Promise<SchedulingResult<{ id: string }>> {
    return this.run(async () => {
      if (!(await this.store.deleteRule(veterinarianId, ruleId))) {
        throw new SchedulingError(ErrorCode.NOT_FOUND, 'Availability rule not found', { rule_id: ruleId });
      }
      return { id: ruleId };
    });
  }

  async removeAvailabilityException(
    veterinarianId: string,
    exceptionId: string
  ): Promise<SchedulingResult<{ id: string }>> {
    return this.run(async () => {
      if (!(await this.store.deleteException(veterinarianId, exceptionId))) {
        throw new SchedulingError(ErrorCode.NOT_FOUND, 'Availability exception not found', {
          exception_id: exceptionId,
        });
      }
      return { id: exceptionId };
    });
  }

  private settle(operation: SchedulingOperation, outcome: TransitionOutcome): Appointment {
    if (outcome.changed) {
      this.emit(operation, outcome.appointment);
    }
    return outcome.appointment;
  }

  private assertDateRange(from: string, to: string): void {
    if (!isCalendarDate(from) || !isCalendarDate(to)) {
      throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'from and to must be YYYY-MM-DD dates');
    }
    if (to < from) {
      throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'to must not be before from', { from, to });
    }
    if (daysBetween(from, to) + 1 > this.maxSlotRangeDays) {
      throw new SchedulingError(
        ErrorCode.INVALID_WINDOW,
        `Date range may cover at most ${this.maxSlotRangeDays} days`,
        { from, to }
      );
    }
  }

  private assertTimeWindow(startTime: string, endTime: string): void {
    let start: number;
    let end: number;
    try {
      start = minutesOfDay(startTime);
      end = minutesOfDay(endTime);
    } catch {
      throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'startTime and endTime must be HH:mm', {
        start_time: startTime,
        end_time: endTime,
      });
    }

    if (start >= end) {
      throw new SchedulingError(ErrorCode.INVALID_WINDOW, 'startTime must be before endTime', {
        start_time: startTime,
        end_time: endTime,
      });
    }
    if (start % this.granularityMinutes !== 0 || end % this.granularityMinutes !== 0) {
      throw new SchedulingError(
        ErrorCode.INVALID_WINDOW,
        `Window must align to ${this.granularityMinutes}-minute boundaries`,
        { start_time: startTime, end_time: endTime }
      );
    }
  }

  /**
   * Hands the event to the sink without waiting; a failing sink is logged
   * and never undoes the committed change.
   */
  private emit(operation: SchedulingOperation, appointment: Appointment): void {
    const event = toSchedulingEvent(operation, appointment, this.clock());
    void Promise.resolve()
      .then(() => this.events.publish(event))
      .catch((error: unknown) => {
        console.error(`Failed to publish ${operation} event for appointment ${appointment.id}:`, error);
      });
  }

  private async run<T>(operation: () => Promise<T>): Promise<SchedulingResult<T>> {
    try {
      return { success: true, data: await operation() };
    } catch (error: unknown) {
      if (isSchedulingError(error)) {
        return { success: false, error: error.toErrorBody() };
      }
      throw error;
    }
  }
}
