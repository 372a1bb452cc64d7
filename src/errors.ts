import type { Response } from 'express';
import { ZodError } from 'zod';
import logger from './logger';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code?: number;

  constructor(statusCode: number, message: string, code?: number) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export const USER_EXISTS_CODE = 10001;
export const USER_NOT_FOUND_CODE = 10002;

const describeValidationError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export const handleRouteError = (res: Response, error: unknown, context: string) => {
  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      error: error.message,
      ...(error.code !== undefined ? { code: error.code } : {})
    });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({ error: describeValidationError(error) });
    return;
  }
  logger.error(`[HTTP] ${context} failed`, error);
  res.status(500).json({ error: 'Internal server error' });
};
