import type { Request, Response, NextFunction } from 'express';
import { HttpError } from '../errors';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) console.error(`[error] ${err.code}: ${err.message}`);
    else console.warn(`[${err.code.toLowerCase()}] ${err.message}`);
    res.status(err.status).json({
      error: err.message,
      code: err.code,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error(`[error] ${message}`);
  res.status(500).json({ error: message, code: 'INTERNAL_ERROR' });
}
