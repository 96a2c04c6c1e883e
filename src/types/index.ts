export type AppointmentStatus = 'scheduled' | 'completed' | 'cancelled' | 'no_show';

export interface Appointment {
  id: string;
  veterinarianId: string;
  petId: string;
  start: Date;
  end: Date;
  status: AppointmentStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Half-open `[start, end)` */
export interface Interval {
  start: Date;
  end: Date;
}

export type TimeSlot = Interval;

/**
 * Recurring weekly availability. `dayOfWeek` follows `Date#getUTCDay`
 * (0 = Sunday). Dates are `YYYY-MM-DD`, times `HH:mm`.
 */
export interface AvailabilityRule {
  id: string;
  veterinarianId: string;
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  effectiveFrom: string;
  effectiveUntil: string | null;
  createdAt: Date;
}

export type AvailabilityExceptionKind = 'added' | 'removed';

export interface AvailabilityException {
  id: string;
  veterinarianId: string;
  date: string;
  kind: AvailabilityExceptionKind;
  startTime: string;
  endTime: string;
  reason: string | null;
  createdAt: Date;
}

export interface IdempotencyRecord {
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_body: string;
  created_at: string;
}

export interface CreateAppointmentInput {
  veterinarianId: string;
  petId: string;
  start: Date;
  end: Date;
}

export interface RescheduleAppointmentInput {
  appointmentId: string;
  start: Date;
  end: Date;
  expectedVersion: number;
}

export interface TransitionAppointmentInput {
  appointmentId: string;
  expectedVersion?: number;
}

export interface ListAvailableSlotsInput {
  veterinarianId: string;
  from: string;
  to: string;
}

export interface NewAvailabilityRule {
  veterinarianId: string;
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  effectiveFrom: string;
  effectiveUntil: string | null;
}

export interface NewAvailabilityException {
  veterinarianId: string;
  date: string;
  kind: AvailabilityExceptionKind;
  startTime: string;
  endTime: string;
  reason: string | null;
}

export interface VeterinarianAvailability {
  rules: AvailabilityRule[];
  exceptions: AvailabilityException[];
}

export enum ErrorCode {
  INVALID_DURATION = 'INVALID_DURATION',
  INVALID_WINDOW = 'INVALID_WINDOW',
  OUTSIDE_AVAILABILITY = 'OUTSIDE_AVAILABILITY',
  SLOT_UNAVAILABLE = 'SLOT_UNAVAILABLE',
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  NOT_FOUND = 'NOT_FOUND',
  BUSY = 'BUSY',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MISSING_IDEMPOTENCY_KEY = 'MISSING_IDEMPOTENCY_KEY',
  IDEMPOTENCY_KEY_MISMATCH = 'IDEMPOTENCY_KEY_MISMATCH',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorBody;
}

export type SchedulingResult<T> =
  | { success: true; data: T }
  | { success: false; error: ErrorBody };

export type SchedulingOperation = 'created' | 'rescheduled' | 'cancelled' | 'completed' | 'no_show';

export interface SchedulingEvent {
  operation: SchedulingOperation;
  appointmentId: string;
  veterinarianId: string;
  petId: string;
  interval: { start: string; end: string };
  timestamp: string;
}

export type Clock = () => Date;
