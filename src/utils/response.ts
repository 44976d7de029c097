import type { Request, Response } from 'express';

export type ErrorPayload = {
  code: string;
  message: string;
  details?: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function normalizeError(body: unknown): ErrorPayload {
  if (isRecord(body)) {
    const { error } = body;
    if (isRecord(error) && typeof error.code === 'string') {
      return {
        code: error.code,
        message: typeof error.message === 'string' ? error.message : 'Unexpected error',
        details: error.details
      };
    }

    if (typeof error === 'string') {
      return {
        code: typeof body.code === 'string' ? body.code : 'ERROR',
        message: error,
        details: body.details
      };
    }

    if (isRecord(error)) {
      return {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request',
        details: error
      };
    }
  }

  if (typeof body === 'string') {
    return { code: 'ERROR', message: body };
  }

  return { code: 'ERROR', message: 'Unexpected error' };
}

export function wrapJsonResponse(req: Request, res: Response, body: unknown) {
  const requestId = req.requestId ?? req.traceId ?? null;
  if (isRecord(body) && 'request_id' in body) {
    return body;
  }

  if (res.statusCode >= 400) {
    const error = normalizeError(body);
    res.locals.normalizedError = error;
    return { request_id: requestId, error };
  }

  return { request_id: requestId, data: body };
}
