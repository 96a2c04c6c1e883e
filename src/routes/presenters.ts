import {
  Appointment,
  AvailabilityException,
  AvailabilityRule,
  TimeSlot,
  VeterinarianAvailability,
} from '../types/index.js';

export function presentAppointment(appointment: Appointment) {
  return {
    appointment_id: appointment.id,
    veterinarian_id: appointment.veterinarianId,
    pet_id: appointment.petId,
    start: appointment.start.toISOString(),
    end: appointment.end.toISOString(),
    status: appointment.status,
    version: appointment.version,
    created_at: appointment.createdAt.toISOString(),
    updated_at: appointment.updatedAt.toISOString(),
  };
}

export function presentSlots(slots: TimeSlot[]) {
  return slots.map((slot) => ({ start: slot.start.toISOString(), end: slot.end.toISOString() }));
}

export function presentRule(rule: AvailabilityRule) {
  return {
    rule_id: rule.id,
    veterinarian_id: rule.veterinarianId,
    day_of_week: rule.dayOfWeek,
    start_time: rule.startTime,
    end_time: rule.endTime,
    effective_from: rule.effectiveFrom,
    effective_until: rule.effectiveUntil,
  };
}

export function presentException(exception: AvailabilityException) {
  return {
    exception_id: exception.id,
    veterinarian_id: exception.veterinarianId,
    date: exception.date,
    kind: exception.kind,
    start_time: exception.startTime,
    end_time: exception.endTime,
    reason: exception.reason,
  };
}

export function presentAvailability(availability: VeterinarianAvailability) {
  return {
    rules: availability.rules.map(presentRule),
    exceptions: availability.exceptions.map(presentException),
  };
}

export function presentRemoved(removed: { id: string }) {
  return { id: removed.id, removed: true };
}
