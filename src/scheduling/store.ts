import {
  Appointment,
  AvailabilityException,
  AvailabilityRule,
  Interval,
} from '../types/index.js';

/**
 * - committed: the write happened
 * - conflict: a scheduled appointment of the same veterinarian overlaps
 * - version_mismatch: the stored version is not the expected one
 * - not_found: no appointment with that id
 */
export type CommitOutcome = 'committed' | 'conflict' | 'version_mismatch' | 'not_found';

/**
 * Storage port for the scheduler. The two conditional writes must run the
 * overlap test and the write as one atomic step per veterinarian.
 */
export interface SchedulingStore {
  findAppointment(id: string): Promise<Appointment | null>;
  findScheduledOverlapping(
    veterinarianId: string,
    interval: Interval,
    excludeAppointmentId?: string
  ): Promise<Appointment[]>;

  findRules(veterinarianId: string): Promise<AvailabilityRule[]>;
  findExceptions(veterinarianId: string, from: string, to: string): Promise<AvailabilityException[]>;
  insertRule(rule: AvailabilityRule): Promise<void>;
  insertException(exception: AvailabilityException): Promise<void>;
  deleteRule(veterinarianId: string, ruleId: string): Promise<boolean>;
  deleteException(veterinarianId: string, exceptionId: string): Promise<boolean>;

  /** Insert only if no scheduled appointment of the veterinarian overlaps. */
  insertAppointmentIfFree(appointment: Appointment): Promise<CommitOutcome>;

  /**
   * Replace the stored appointment with `next` only if its version is still
   * `expectedVersion`; with `requireFree`, also only if `next` overlaps no
   * other scheduled appointment.
   */
  updateAppointmentIfCurrent(
    next: Appointment,
    expectedVersion: number,
    options: { requireFree: boolean }
  ): Promise<CommitOutcome>;
}

/**
 * A write that failed for a reason worth retrying (lock timeout, busy
 * database). Never carries the driver error message to callers.
 */
export class TransientStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransientStoreError';
  }
}
