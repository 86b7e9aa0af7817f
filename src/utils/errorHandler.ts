import { Request, Response, NextFunction } from 'express';
import { formatApiResponse } from './formatApiResponse';
import { logger } from './logger';
import '../types/http';

export class ApiError extends Error {
  statusCode: number;
  data?: unknown;

  constructor(message: string, statusCode = 500, data?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  // Errors from another realm fail instanceof but keep their message
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') return err.message;
  return typeof err === 'string' ? err : JSON.stringify(err);
}

// Express error-handling middleware
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = err instanceof ApiError ? err.statusCode : 500;
  const message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
  const data = err instanceof ApiError && err.data !== undefined ? err.data : null;
  if (status >= 500) {
    logger.error({ err, requestId: req.requestId, path: req.path }, 'Request failed');
  }
  res.status(status).json(formatApiResponse('error', message, data));
}
