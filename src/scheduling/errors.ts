import { ErrorBody, ErrorCode } from '../types/index.js';

export type SchedulingErrorCode =
  | ErrorCode.INVALID_DURATION
  | ErrorCode.INVALID_WINDOW
  | ErrorCode.OUTSIDE_AVAILABILITY
  | ErrorCode.SLOT_UNAVAILABLE
  | ErrorCode.CONCURRENT_MODIFICATION
  | ErrorCode.INVALID_TRANSITION
  | ErrorCode.NOT_FOUND
  | ErrorCode.BUSY;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.INVALID_DURATION]: 400,
  [ErrorCode.INVALID_WINDOW]: 400,
  [ErrorCode.OUTSIDE_AVAILABILITY]: 422,
  [ErrorCode.SLOT_UNAVAILABLE]: 409,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,
  [ErrorCode.INVALID_TRANSITION]: 409,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.BUSY]: 503,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.MISSING_IDEMPOTENCY_KEY]: 400,
  [ErrorCode.IDEMPOTENCY_KEY_MISMATCH]: 422,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function httpStatusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Expected, recoverable outcome of a scheduling operation.
 * Messages never carry storage details.
 */
export class SchedulingError extends Error {
  public readonly code: SchedulingErrorCode;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(code: SchedulingErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SchedulingError';
    this.code = code;
    this.statusCode = httpStatusFor(code);
    this.details = details;
  }

  toErrorBody(): ErrorBody {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, details: this.details };
  }
}

export function appointmentNotFound(appointmentId: string): SchedulingError {
  return new SchedulingError(ErrorCode.NOT_FOUND, 'Appointment not found', {
    appointment_id: appointmentId,
  });
}

export function concurrentModification(
  appointmentId: string,
  expectedVersion: number,
  actualVersion: number
): SchedulingError {
  return new SchedulingError(
    ErrorCode.CONCURRENT_MODIFICATION,
    'Appointment was modified by another request',
    { appointment_id: appointmentId, expected_version: expectedVersion, actual_version: actualVersion }
  );
}

export function slotUnavailable(interval: { start: Date; end: Date }): SchedulingError {
  return new SchedulingError(ErrorCode.SLOT_UNAVAILABLE, 'This time slot is already booked', {
    start: interval.start.toISOString(),
    end: interval.end.toISOString(),
  });
}

export function isSchedulingError(error: unknown): error is SchedulingError {
  return error instanceof SchedulingError;
}
