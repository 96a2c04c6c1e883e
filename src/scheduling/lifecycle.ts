import { Appointment, AppointmentStatus, ErrorCode } from '../types/index.js';
import { SchedulingError } from './errors.js';

/**
 * Appointment lifecycle
 *
 * Valid transitions:
 * - scheduled → completed (once the visit has started)
 * - scheduled → cancelled (until the visit starts)
 * - scheduled → no_show (once the visit window has passed)
 *
 * completed, cancelled and no_show are terminal.
 */
export type LifecycleEvent = 'complete' | 'cancel' | 'mark_no_show';

export interface TransitionRule {
  to: AppointmentStatus;
  guard?: (appointment: Appointment, now: Date) => string | null;
}

const TRANSITIONS: Record<AppointmentStatus, Partial<Record<LifecycleEvent, TransitionRule>>> = {
  scheduled: {
    complete: {
      to: 'completed',
      guard: (appointment, now) =>
        now.getTime() < appointment.start.getTime() ? 'Visit has not started yet' : null,
    },
    cancel: {
      to: 'cancelled',
      guard: (appointment, now) =>
        now.getTime() >= appointment.start.getTime() ? 'Visit has already started' : null,
    },
    mark_no_show: {
      to: 'no_show',
      guard: (appointment, now) =>
        now.getTime() < appointment.end.getTime() ? 'Visit time has not passed yet' : null,
    },
  },
  completed: {},
  cancelled: {},
  no_show: {},
};

export function assertReschedulable(appointment: Appointment): void {
  if (appointment.status !== 'scheduled') {
    throw new SchedulingError(
      ErrorCode.INVALID_TRANSITION,
      `Cannot reschedule an appointment that is ${appointment.status}`,
      { appointment_id: appointment.id, status: appointment.status }
    );
  }
}

/** The table entry for `event`, ignoring time guards. */
export function transitionRule(appointment: Appointment, event: LifecycleEvent): TransitionRule {
  const rule = TRANSITIONS[appointment.status][event];
  if (!rule) {
    throw new SchedulingError(
      ErrorCode.INVALID_TRANSITION,
      `Cannot ${event.replace(/_/g, ' ')} an appointment that is ${appointment.status}`,
      { appointment_id: appointment.id, status: appointment.status, event }
    );
  }
  return rule;
}

/**
 * Apply `event` and return the next appointment state with its version
 * bumped. Throws INVALID_TRANSITION for anything not in the table.
 */
export function applyTransition(appointment: Appointment, event: LifecycleEvent, now: Date): Appointment {
  const rule = transitionRule(appointment, event);

  const blocked = rule.guard?.(appointment, now) ?? null;
  if (blocked !== null) {
    throw new SchedulingError(ErrorCode.INVALID_TRANSITION, blocked, {
      appointment_id: appointment.id,
      status: appointment.status,
      event,
    });
  }

  return {
    ...appointment,
    status: rule.to,
    version: appointment.version + 1,
    updatedAt: now,
  };
}
