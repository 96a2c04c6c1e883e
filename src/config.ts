import { z } from 'zod';
import { BookingPolicy } from './services/booking.service.js';

const positiveInt = (fallback: string) =>
  z.string().default(fallback).pipe(z.coerce.number().int().positive());

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

/**
 * Environment variables, validated once at boot.
 */
const EnvSchema = z.object({
  PORT: positiveInt('3000'),
  DATABASE_PATH: z.string().min(1).default('data/scheduling.db'),
  SLOT_GRANULARITY_MINUTES: positiveInt('5'),
  MIN_APPOINTMENT_MINUTES: positiveInt('15'),
  MAX_APPOINTMENT_MINUTES: positiveInt('1440'),
  /** Minutes between now and the earliest bookable start; `off` disables the floor. */
  BOOKING_LEAD_TIME_MINUTES: z
    .string()
    .default('0')
    .transform((value, ctx) => {
      if (value === 'off') return null;
      const minutes = Number(value);
      if (!Number.isInteger(minutes) || minutes < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a non-negative integer or "off"' });
        return z.NEVER;
      }
      return minutes;
    }),
  RESCHEDULE_CHECKS_LEAD_TIME: booleanFlag('true'),
  MAX_COMMIT_ATTEMPTS: positiveInt('3'),
  COMMIT_TIMEOUT_MS: positiveInt('3000'),
  MAX_SLOT_RANGE_DAYS: positiveInt('31'),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  commitTimeoutMs: number;
  maxSlotRangeDays: number;
  booking: BookingPolicy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }

  const vars = parsed.data;
  if (vars.MIN_APPOINTMENT_MINUTES % vars.SLOT_GRANULARITY_MINUTES !== 0) {
    throw new Error('MIN_APPOINTMENT_MINUTES must be a multiple of SLOT_GRANULARITY_MINUTES');
  }
  if (vars.MAX_APPOINTMENT_MINUTES < vars.MIN_APPOINTMENT_MINUTES) {
    throw new Error('MAX_APPOINTMENT_MINUTES must not be below MIN_APPOINTMENT_MINUTES');
  }

  return {
    port: vars.PORT,
    databasePath: vars.DATABASE_PATH,
    commitTimeoutMs: vars.COMMIT_TIMEOUT_MS,
    maxSlotRangeDays: vars.MAX_SLOT_RANGE_DAYS,
    booking: {
      granularityMinutes: vars.SLOT_GRANULARITY_MINUTES,
      minDurationMinutes: vars.MIN_APPOINTMENT_MINUTES,
      maxDurationMinutes: vars.MAX_APPOINTMENT_MINUTES,
      leadTimeMinutes: vars.BOOKING_LEAD_TIME_MINUTES,
      rescheduleChecksLeadTime: vars.RESCHEDULE_CHECKS_LEAD_TIME,
      maxCommitAttempts: vars.MAX_COMMIT_ATTEMPTS,
    },
  };
}
