import { z } from 'zod';
import { isCalendarDate, isTimeOfDay } from '../scheduling/calendar.js';

const instant = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO 8601 datetime' })
  .transform((value) => new Date(value));

const calendarDate = z.string().refine(isCalendarDate, { message: 'must be a YYYY-MM-DD date' });

const timeOfDay = z.string().refine(isTimeOfDay, { message: 'must be HH:mm' });

const version = z.number().int().positive();

export const CreateAppointmentBody = z.object({
  pet_id: z.string().trim().min(1, 'pet_id is required and must be a non-empty string'),
  start: instant,
  end: instant,
});

export const RescheduleAppointmentBody = z.object({
  start: instant,
  end: instant,
  expected_version: version,
});

export const TransitionAppointmentBody = z.object({
  expected_version: version.optional(),
});

export const DateRangeQuery = z.object({
  from: calendarDate,
  to: calendarDate,
});

export const AvailabilityRuleBody = z.object({
  day_of_week: z.number().int().min(0).max(6),
  start_time: timeOfDay,
  end_time: timeOfDay,
  effective_from: calendarDate,
  effective_until: calendarDate.nullable().default(null),
});

export const AvailabilityExceptionBody = z.object({
  date: calendarDate,
  kind: z.enum(['added', 'removed']),
  start_time: timeOfDay,
  end_time: timeOfDay,
  reason: z.string().trim().min(1).max(500).nullable().default(null),
});
