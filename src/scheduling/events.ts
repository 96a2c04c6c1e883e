import { Appointment, SchedulingEvent, SchedulingOperation } from '../types/index.js';

export interface SchedulingEventSink {
  publish(event: SchedulingEvent): Promise<void> | void;
}

export function toSchedulingEvent(
  operation: SchedulingOperation,
  appointment: Appointment,
  timestamp: Date
): SchedulingEvent {
  return {
    operation,
    appointmentId: appointment.id,
    veterinarianId: appointment.veterinarianId,
    petId: appointment.petId,
    interval: { start: appointment.start.toISOString(), end: appointment.end.toISOString() },
    timestamp: timestamp.toISOString(),
  };
}

/**
 * Writes one JSON line per event to stdout for a log shipper to pick up.
 */
export class ConsoleEventSink implements SchedulingEventSink {
  publish(event: SchedulingEvent): void {
    console.log(JSON.stringify({ type: 'scheduling_event', ...event }));
  }
}
