import { Request, Response, NextFunction } from 'express';
import { PipelineError } from '../../worker/errors.js';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof PipelineError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl} failed:`, err);
    }
    res.status(err.statusCode).json({
      message: err.statusCode < 500 ? err.message : 'Internal Server Error',
      code: err.code
    });
    return;
  }

  // Body parser errors carry an HTTP status of their own
  const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
    ? err.status
    : 500;

  console.error(`${req.method} ${req.originalUrl} failed:`, err);

  res.status(status).json({
    message: status < 500 && err instanceof Error ? err.message : 'Internal Server Error',
    error: process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined
  });
};
