import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { log } from '../logger';
import { AppError, BadRequestError, errorMessage } from '../shared/errors';

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof ZodError) {
    const issues = err.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
    return new BadRequestError(issues.join('; '));
  }
  // express.json() parse failures carry a numeric status (400/413)
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return new AppError(err.message, err.status, 'bad_request');
  }
  return new AppError(errorMessage(err) || 'Internal Server Error');
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const e = toAppError(err);

  if (e.status >= 500) log.error({ err }, '[error] unhandled');
  else log.warn({ err: e.message }, '[warn] handled');

  res.status(e.status).json({ ok: false, error: e.code, message: e.message });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ ok: false, error: 'not_found', message: `No route for ${req.method} ${req.path}` });
}
