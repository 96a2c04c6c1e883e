import { Request, Response, Router } from 'express';
import { SchedulingService } from '../services/scheduling.service.js';
import { Appointment, SchedulingResult, TransitionAppointmentInput } from '../types/index.js';
import { presentAppointment } from './presenters.js';
import { asyncRoute, parseOrReject, sendResult } from './respond.js';
import { RescheduleAppointmentBody, TransitionAppointmentBody } from './schemas.js';

/**
 * Appointment routes - HTTP mapping only
 */
export function createAppointmentRoutes(scheduling: SchedulingService): Router {
  const router = Router();

  router.get(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await scheduling.getAppointment(req.params.id), presentAppointment);
    })
  );

  /**
   * POST /api/appointments/:id/reschedule
   * Body: { start, end, expected_version }
   */
  router.post(
    '/:id/reschedule',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(RescheduleAppointmentBody, req.body, res);
      if (!body) return;

      const result = await scheduling.rescheduleAppointment({
        appointmentId: req.params.id,
        start: body.start,
        end: body.end,
        expectedVersion: body.expected_version,
      });
      sendResult(res, result, presentAppointment);
    })
  );

  const transitions: Array<{
    path: string;
    run: (input: TransitionAppointmentInput) => Promise<SchedulingResult<Appointment>>;
  }> = [
    { path: 'cancel', run: (input) => scheduling.cancelAppointment(input) },
    { path: 'complete', run: (input) => scheduling.completeAppointment(input) },
    { path: 'no-show', run: (input) => scheduling.markNoShow(input) },
  ];

  // Body: { expected_version? }
  for (const { path, run } of transitions) {
    router.post(
      `/:id/${path}`,
      asyncRoute(async (req: Request, res: Response) => {
        const body = parseOrReject(TransitionAppointmentBody, req.body ?? {}, res);
        if (!body) return;

        const result = await run({ appointmentId: req.params.id, expectedVersion: body.expected_version });
        sendResult(res, result, presentAppointment);
      })
    );
  }

  return router;
}
