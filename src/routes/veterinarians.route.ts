import { Request, Response, Router } from 'express';
import { validateIdempotencyKey } from '../middleware/idempotency.js';
import { IdempotencyService } from '../services/idempotency.service.js';
import { SchedulingService } from '../services/scheduling.service.js';
import { ApiResponse, ErrorCode } from '../types/index.js';
import {
  presentAppointment,
  presentAvailability,
  presentException,
  presentRemoved,
  presentRule,
  presentSlots,
} from './presenters.js';
import { asyncRoute, parseOrReject, sendResult, toApiResponse, validationFailure } from './respond.js';
import {
  AvailabilityExceptionBody,
  AvailabilityRuleBody,
  CreateAppointmentBody,
  DateRangeQuery,
} from './schemas.js';

/**
 * Routes scoped to one veterinarian calendar.
 * Business logic lives in SchedulingService; this is HTTP mapping only.
 */
export function createVeterinarianRoutes(
  scheduling: SchedulingService,
  idempotency: IdempotencyService
): Router {
  const router = Router();

  /**
   * POST /api/veterinarians/:vetId/appointments
   *
   * Headers:
   *   Idempotency-Key: UUID (required)
   *
   * Body:
   *   pet_id: string (required)
   *   start, end: ISO 8601 datetimes, half-open [start, end)
   *
   * Responses:
   *   201: Appointment created
   *   400: INVALID_DURATION, INVALID_WINDOW or VALIDATION_ERROR
   *   409: SLOT_UNAVAILABLE
   *   422: OUTSIDE_AVAILABILITY or IDEMPOTENCY_KEY_MISMATCH
   *   503: BUSY, retry recommended
   */
  router.post(
    '/:vetId/appointments',
    validateIdempotencyKey,
    asyncRoute(async (req: Request, res: Response) => {
      const idempotencyKey = req.idempotencyKey;
      if (idempotencyKey === undefined) {
        throw new Error('Idempotency-Key was not validated before the booking handler');
      }
      const veterinarianId = req.params.vetId;
      const scope = `create-appointment:${veterinarianId}`;
      const rawBody: unknown = req.body;

      // 1. Replay or reject a reused key
      const previous = idempotency.check(idempotencyKey, scope, rawBody);
      if (previous.found) {
        if (previous.mismatch) {
          const response: ApiResponse = {
            success: false,
            error: {
              code: ErrorCode.IDEMPOTENCY_KEY_MISMATCH,
              message: 'This Idempotency-Key was already used with different request parameters',
              details: {
                hint: 'Generate a new Idempotency-Key for requests with different parameters',
              },
            },
          };
          res.status(422).json(response);
          return;
        }
        res.status(previous.status).json(previous.response);
        return;
      }

      // 2. Validate request
      const parsed = CreateAppointmentBody.safeParse(rawBody);
      if (!parsed.success) {
        const response = validationFailure(parsed.error);
        idempotency.remember(idempotencyKey, scope, rawBody, 400, response);
        res.status(400).json(response);
        return;
      }

      // 3. Book with conflict detection and an atomic commit
      const result = await scheduling.createAppointment({
        veterinarianId,
        petId: parsed.data.pet_id,
        start: parsed.data.start,
        end: parsed.data.end,
      });
      const { status, response } = toApiResponse(result, presentAppointment, 201);

      // 4. Remember the outcome, except BUSY which the client should retry
      if (response.error?.code !== ErrorCode.BUSY) {
        idempotency.remember(idempotencyKey, scope, rawBody, status, response);
      }

      res.status(status).json(response);
    })
  );

  /**
   * GET /api/veterinarians/:vetId/slots?from=YYYY-MM-DD&to=YYYY-MM-DD
   * Free windows: availability with scheduled appointments taken out.
   */
  router.get(
    '/:vetId/slots',
    asyncRoute(async (req: Request, res: Response) => {
      const query = parseOrReject(DateRangeQuery, req.query, res);
      if (!query) return;

      const result = await scheduling.listAvailableSlots({
        veterinarianId: req.params.vetId,
        from: query.from,
        to: query.to,
      });
      sendResult(res, result, presentSlots);
    })
  );

  router.get(
    '/:vetId/availability',
    asyncRoute(async (req: Request, res: Response) => {
      const query = parseOrReject(DateRangeQuery, req.query, res);
      if (!query) return;

      const result = await scheduling.listAvailability(req.params.vetId, query.from, query.to);
      sendResult(res, result, presentAvailability);
    })
  );

  router.post(
    '/:vetId/availability/rules',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(AvailabilityRuleBody, req.body, res);
      if (!body) return;

      const result = await scheduling.addAvailabilityRule({
        veterinarianId: req.params.vetId,
        dayOfWeek: body.day_of_week,
        startTime: body.start_time,
        endTime: body.end_time,
        effectiveFrom: body.effective_from,
        effectiveUntil: body.effective_until,
      });
      sendResult(res, result, presentRule, 201);
    })
  );

  router.delete(
    '/:vetId/availability/rules/:ruleId',
    asyncRoute(async (req: Request, res: Response) => {
      const result = await scheduling.removeAvailabilityRule(req.params.vetId, req.params.ruleId);
      sendResult(res, result, presentRemoved);
    })
  );

  router.post(
    '/:vetId/availability/exceptions',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(AvailabilityExceptionBody, req.body, res);
      if (!body) return;

      const result = await scheduling.addAvailabilityException({
        veterinarianId: req.params.vetId,
        date: body.date,
        kind: body.kind,
        startTime: body.start_time,
        endTime: body.end_time,
        reason: body.reason,
      });
      sendResult(res, result, presentException, 201);
    })
  );

  router.delete(
    '/:vetId/availability/exceptions/:exceptionId',
    asyncRoute(async (req: Request, res: Response) => {
      const result = await scheduling.removeAvailabilityException(
        req.params.vetId,
        req.params.exceptionId
      );
      sendResult(res, result, presentRemoved);
    })
  );

  return router;
}
