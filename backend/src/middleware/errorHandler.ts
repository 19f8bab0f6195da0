import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError } from '../utils/errors.js';
import { ErrorResponse } from '../types/index.js';

// body-parser attaches a 4xx `status` to malformed-JSON errors
function clientErrorStatus(err: Error): number | null {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Maps any error to `{ detail }`; the message is shown to the end user as-is.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  let status = 500;
  let detail = 'Internal server error';

  if (err instanceof AppError) {
    status = err.status;
    detail = err.message;
  } else if (err instanceof multer.MulterError) {
    status = 400;
    detail = err.message;
  } else {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      status = clientStatus;
      detail = err.message;
    }
  }

  if (status >= 500) {
    console.error(`[API] ${req.method} ${req.path} failed:`, err);
  } else {
    console.warn(`[API] ${req.method} ${req.path} -> ${status}: ${detail}`);
  }

  const body: ErrorResponse = { detail };
  res.status(status).json(body);
}

export function notFoundHandler(_req: Request, res: Response): void {
  const body: ErrorResponse = { detail: 'Not found' };
  res.status(404).json(body);
}
