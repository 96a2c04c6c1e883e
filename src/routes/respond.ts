import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { ApiResponse, ErrorCode, SchedulingResult } from '../types/index.js';
import { httpStatusFor } from '../scheduling/errors.js';

/**
 * Express 4 does not forward rejected promises to the error handler.
 */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function validationFailure(error: z.ZodError): ApiResponse<never> {
  return {
    success: false,
    error: {
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Request validation failed',
      details: {
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    },
  };
}

/**
 * Parse `input` or answer 400 VALIDATION_ERROR and return null.
 */
export function parseOrReject<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  res: Response
): z.output<S> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    res.status(400).json(validationFailure(parsed.error));
    return null;
  }
  return parsed.data;
}

export function toApiResponse<T, R>(
  result: SchedulingResult<T>,
  present: (data: T) => R,
  successStatus = 200
): { status: number; response: ApiResponse<R> } {
  if (result.success) {
    return { status: successStatus, response: { success: true, data: present(result.data) } };
  }
  return { status: httpStatusFor(result.error.code), response: { success: false, error: result.error } };
}

export function sendResult<T, R>(
  res: Response,
  result: SchedulingResult<T>,
  present: (data: T) => R,
  successStatus = 200
): void {
  const { status, response } = toApiResponse(result, present, successStatus);
  res.status(status).json(response);
}
