import { Request, Response, NextFunction } from 'express';
import { validate as isUuid } from 'uuid';
import { ApiResponse, ErrorCode } from '../types/index.js';

function rejectKey(res: Response, message: string, details: Record<string, unknown>): void {
  const response: ApiResponse = {
    success: false,
    error: { code: ErrorCode.MISSING_IDEMPOTENCY_KEY, message, details },
  };
  res.status(400).json(response);
}

/**
 * Appointment creation takes an `Idempotency-Key` UUID. A retried create
 * with the same key and body gets the first answer back instead of a
 * second appointment.
 */
export function validateIdempotencyKey(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const idempotencyKey = req.headers['idempotency-key'];

  if (!idempotencyKey || typeof idempotencyKey !== 'string') {
    rejectKey(res, 'Creating an appointment requires an Idempotency-Key header', {
      hint: 'Send a fresh UUID per appointment request and the same UUID when retrying it.',
    });
    return;
  }

  if (!isUuid(idempotencyKey)) {
    rejectKey(res, 'Idempotency-Key is not a UUID', { received: idempotencyKey });
    return;
  }

  req.idempotencyKey = idempotencyKey;
  next();
}

declare global {
  namespace Express {
    interface Request {
      idempotencyKey?: string;
    }
  }
}
