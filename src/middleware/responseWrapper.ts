import type { NextFunction, Request, Response } from 'express';
import { wrapJsonResponse } from '../utils/response.js';

/** Wraps every JSON body in the `{ request_id, data | error }` envelope. */
export function responseWrapper(req: Request, res: Response, next: NextFunction) {
  const sendJson = res.json.bind(res);
  res.json = (body: unknown) => sendJson(wrapJsonResponse(req, res, body));
  return next();
}
